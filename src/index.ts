export { UserVerifier, type Lookup, type RoleUpdate } from './verifier.js';
export {
  UserRole,
  buildUser,
  fromDocument,
  isRole,
  publicUser,
  toDocument,
  userKey,
  type NewUser,
  type Role,
  type User,
  type UserDocument,
} from './users.js';
export {
  DocumentNotFoundError,
  isDocumentNotFound,
  type Document,
  type DocumentCollection,
  type DocumentQuery,
  type PatchOperation,
} from './documents.js';
export { PgDocumentCollection, type PgCollectionOptions, type Queryable } from './pgCollection.js';
export { ForbiddenError, IdentityError, StoreError, UnauthorizedError } from './errors.js';
export {
  DEFAULT_USER_HEADER,
  USER_ID_HEADER,
  extractIdentity,
  hasRole,
  resolveIdentity,
  type IdentityOptions,
} from './identity.js';
export { requireIdentity } from './express.js';
export { currentUser, identityPlugin, requireRole, type IdentityHook, type IdentityPluginOptions } from './fastify.js';
export { buildApp, type AppOptions } from './app.js';
