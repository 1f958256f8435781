import { isDocumentNotFound, type DocumentCollection } from './documents.js';
import { StoreError, errorMessage } from './errors.js';
import logger from './logger.js';
import { USER_DOCUMENT_TYPE, buildUser, fromDocument, toDocument, userKey, type NewUser, type Role, type User } from './users.js';

export type Lookup<T> = { status: 'found'; value: T } | { status: 'not_found' } | { status: 'error'; error: StoreError };

export type RoleUpdate = { status: 'updated'; user: User } | { status: 'not_found' } | { status: 'error'; error: StoreError };

function unwrap<T>(lookup: Lookup<T>): T | null {
  if (lookup.status === 'found') return lookup.value;
  if (lookup.status === 'not_found') return null;
  throw lookup.error;
}

/**
 * Looks users up in a document collection and checks their roles. Every method is one
 * store round trip, except getOrCreateUser which may take two.
 *
 * The lookups return a Lookup so callers choose how to treat store failures; the
 * get* helpers throw them as StoreError, exists() and updateRole() collapse them to false.
 */
export class UserVerifier {
  private readonly collection: DocumentCollection;

  constructor(collection: DocumentCollection) {
    if (!collection) throw new TypeError('user collection is required');
    this.collection = collection;
  }

  /** Point read on `user_<identifier>` in the `<identifier>` partition. */
  async findUser(identifier: string): Promise<Lookup<User>> {
    try {
      const doc = await this.collection.read(userKey(identifier), identifier);
      return { status: 'found', value: fromDocument(doc) };
    } catch (err) {
      if (isDocumentNotFound(err)) return { status: 'not_found' };
      return { status: 'error', error: new StoreError(`Error getting user: ${errorMessage(err)}`, { cause: err }) };
    }
  }

  async getUser(identifier: string) {
    return unwrap(await this.findUser(identifier));
  }

  async getUserByEmail(email: string) {
    return this.getUser(email);
  }

  /**
   * Usernames are not unique. When several users share one, the earliest `created_at`
   * wins, then the lowest id; users without a creation time come last.
   */
  async findUserByUsername(username: string): Promise<Lookup<User>> {
    try {
      const docs = await this.collection.query({
        where: { username, type: USER_DOCUMENT_TYPE },
        orderBy: [{ field: 'created_at', direction: 'asc' }],
        limit: 1,
      });
      const first = docs[0];
      return first ? { status: 'found', value: fromDocument(first) } : { status: 'not_found' };
    } catch (err) {
      return { status: 'error', error: new StoreError(`Error querying user: ${errorMessage(err)}`, { cause: err }) };
    }
  }

  async getUserByUsername(username: string) {
    return unwrap(await this.findUserByUsername(username));
  }

  async exists(identifier: string) {
    const lookup = await this.findUser(identifier);
    if (lookup.status === 'error') {
      logger.warn('users', 'existence check failed, reporting absent', { identifier, error: lookup.error.message });
      return false;
    }
    return lookup.status === 'found';
  }

  /** Upserts without checking for an existing user: a second call replaces the first. */
  async createUser(input: NewUser) {
    const user = buildUser(input);
    try {
      await this.collection.upsert(toDocument(user));
    } catch (err) {
      throw new StoreError(`Error creating user: ${errorMessage(err)}`, { cause: err });
    }
    logger.debug('users', 'user written', { id: user.id, role: user.role });
    return user;
  }

  /**
   * Concurrent callers that both miss will both create; the upsert keeps the stored record
   * whole and the last write wins.
   */
  async getOrCreateUser(input: NewUser) {
    const existing = await this.getUserByEmail(input.email);
    if (existing) return existing;
    return this.createUser(input);
  }

  async verifyRole(identifier: string, requiredRoles: readonly string[]) {
    const user = await this.getUser(identifier);
    if (!user) return false;
    return requiredRoles.includes(user.role);
  }

  /** Patches only the role field. */
  async changeRole(identifier: string, role: Role): Promise<RoleUpdate> {
    try {
      const doc = await this.collection.patch(userKey(identifier), identifier, [{ op: 'set', path: '/role', value: role }]);
      return { status: 'updated', user: fromDocument(doc) };
    } catch (err) {
      if (isDocumentNotFound(err)) return { status: 'not_found' };
      return { status: 'error', error: new StoreError(`Error updating role: ${errorMessage(err)}`, { cause: err }) };
    }
  }

  async updateRole(identifier: string, role: Role) {
    const result = await this.changeRole(identifier, role);
    if (result.status === 'error') {
      logger.warn('users', 'role update failed', { identifier, role, error: result.error.message });
    }
    return result.status === 'updated';
  }
}
