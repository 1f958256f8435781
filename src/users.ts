import { z } from 'zod';

export const UserRole = {
  User: 'user',
  Admin: 'admin',
  Moderator: 'moderator',
  Viewer: 'viewer',
} as const;

export type Role = (typeof UserRole)[keyof typeof UserRole];

const roles: readonly string[] = Object.values(UserRole);

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && roles.includes(value);
}

export const USER_KEY_PREFIX = 'user_';
export const USER_DOCUMENT_TYPE = 'user';

export type User = {
  id: string;
  type: typeof USER_DOCUMENT_TYPE;
  userId: string;
  email: string;
  username: string;
  // Stored documents may carry roles outside UserRole; they are kept verbatim.
  role: string;
  displayName: string;
  isActive: boolean;
  agents: string[];
  createdAt: string | null;
  updatedAt: string | null;
};

export type NewUser = {
  email: string;
  userId?: string;
  username?: string | null;
  role?: string | null;
  displayName?: string | null;
  isActive?: boolean;
  agents?: string[];
  createdAt?: string | null;
  updatedAt?: string | null;
};

export type UserDocument = {
  id: string;
  type: typeof USER_DOCUMENT_TYPE;
  user_id: string;
  email: string;
  username: string;
  role: string;
  display_name: string;
  is_active: boolean;
  agents: string[];
  created_at: string | null;
  updated_at: string | null;
};

export function userKey(userId: string) {
  return `${USER_KEY_PREFIX}${userId}`;
}

export function buildUser(input: NewUser): User {
  const userId = input.userId ?? input.email;
  const username = input.username || input.email.split('@')[0];
  return {
    id: userKey(userId),
    type: USER_DOCUMENT_TYPE,
    userId,
    email: input.email,
    username,
    role: input.role || UserRole.User,
    // falls back to the username as given, not the derived one
    displayName: input.displayName || input.username || input.email,
    isActive: input.isActive ?? true,
    agents: [...(input.agents ?? [])],
    createdAt: input.createdAt ?? null,
    updatedAt: input.updatedAt ?? null,
  };
}

export function toDocument(user: User): UserDocument {
  return {
    id: user.id,
    type: user.type,
    user_id: user.userId,
    email: user.email,
    username: user.username,
    role: user.role,
    display_name: user.displayName,
    is_active: user.isActive,
    agents: [...user.agents],
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}

const optionalText = z.string().nullish().catch(undefined);
const timestamp = z.string().nullable().catch(null);

const storedUser = z.object({
  user_id: z.string().catch(''),
  email: z.string().catch(''),
  username: optionalText,
  role: optionalText,
  display_name: optionalText,
  is_active: z.boolean().catch(true),
  agents: z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter((x): x is string => typeof x === 'string')),
  created_at: timestamp,
  updated_at: timestamp,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Rebuilds a user from a stored document. Missing or mistyped keys take their defaults. */
export function fromDocument(record: unknown): User {
  const parsed = storedUser.safeParse(isRecord(record) ? record : {});
  const data = parsed.success ? parsed.data : storedUser.parse({});
  return buildUser({
    userId: data.user_id,
    email: data.email,
    username: data.username,
    role: data.role,
    displayName: data.display_name,
    isActive: data.is_active,
    agents: data.agents,
    createdAt: data.created_at,
    updatedAt: data.updated_at,
  });
}

export function publicUser(user: User) {
  return {
    id: user.id,
    userId: user.userId,
    email: user.email,
    username: user.username,
    role: user.role,
    displayName: user.displayName,
    isActive: user.isActive,
    agents: user.agents,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
