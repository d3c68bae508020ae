import { v4 as uuidv4 } from 'uuid';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';
import { logger } from '../utils/logger';
import { LoginType, User, UserRole, USER_ROLES } from '../types';
import { NotFoundError, ValidationError } from '../errors';
import { appendAudit } from './auditService';
import { authorize } from './roleService';
import { runSerializable } from '../utils/transaction';

const MAX_DISPLAY_NAME_LENGTH = 50;

interface UserRow {
  id: string;
  email: string | null;
  name: string | null;
  oauth_name: string | null;
  wallet_address: string | null;
  login_type: LoginType;
  role: UserRole;
  active: number;
  created_at: string;
  updated_at: string;
  display_name_set_at: string | null;
}

export interface RegisterUserInput {
  email?: string;
  name?: string;
  oauthName?: string;
  walletAddress?: string;
  loginType?: LoginType;
  role?: UserRole;
}

const toUser = (row: UserRow): User => ({
  id: row.id,
  email: row.email ?? undefined,
  name: row.name ?? undefined,
  oauthName: row.oauth_name ?? undefined,
  walletAddress: row.wallet_address ?? undefined,
  loginType: row.login_type,
  role: row.role,
  active: row.active === 1,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  displayNameSetAt: row.display_name_set_at ?? undefined,
});

const clean = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export function formatWalletAddress(address: string | null | undefined): string {
  if (!address) return 'No wallet';
  if (address.length <= 10) return address;
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

// Priority: explicit name > OAuth-provided name > formatted wallet address
export const resolveDisplayName = (user: Pick<User, 'name' | 'oauthName' | 'walletAddress'>): string =>
  user.name || user.oauthName || formatWalletAddress(user.walletAddress);

export const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' && USER_ROLES.some(role => role === value);

function inferLoginType(input: RegisterUserInput): LoginType {
  if (input.loginType) return input.loginType;
  if (clean(input.walletAddress) && !clean(input.email)) return 'wallet';
  if (clean(input.oauthName)) return 'oauth';
  return 'email';
}

export function getUser(id: string, env: Env): User | null {
  const row = env.DB.prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
  return row ? toUser(row) : null;
}

export function requireUser(id: string, env: Env): User {
  const user = getUser(id, env);
  if (!user) {
    throw new NotFoundError(`User ${id} not found`);
  }
  return user;
}

export function getUserByEmail(email: string, env: Env): User | null {
  const row = env.DB.prepare<[string], UserRow>('SELECT * FROM users WHERE email = ? COLLATE NOCASE')
    .get(email.trim());
  return row ? toUser(row) : null;
}

export function getAllUsers(env: Env): User[] {
  return env.DB.prepare<[], UserRow>('SELECT * FROM users ORDER BY created_at ASC, id ASC')
    .all()
    .map(toUser);
}

/**
 * Records a user handed over by the auth provider. At least one identity
 * (email, OAuth name or wallet) is required; emails are unique ignoring case.
 */
export async function registerUser(input: RegisterUserInput, env: Env): Promise<User> {
  const email = clean(input.email)?.toLowerCase();
  const name = clean(input.name);
  const oauthName = clean(input.oauthName);
  const walletAddress = clean(input.walletAddress);

  if (!email && !oauthName && !walletAddress) {
    throw new ValidationError('An email, OAuth identity or wallet address is required');
  }
  if (email && !email.includes('@')) {
    throw new ValidationError(`Invalid email address: ${email}`);
  }
  if (name && name.length > MAX_DISPLAY_NAME_LENGTH) {
    throw new ValidationError(`Display name must be ${MAX_DISPLAY_NAME_LENGTH} characters or less`);
  }

  const now = nowIso(env.clock);
  const user: User = {
    id: uuidv4(),
    email,
    name,
    oauthName,
    walletAddress,
    loginType: inferLoginType(input),
    role: input.role ?? 'member',
    active: true,
    createdAt: now,
    updatedAt: now,
    displayNameSetAt: name ? now : undefined,
  };

  await runSerializable(env, () => {
    if (email && getUserByEmail(email, env)) {
      throw new ValidationError(`A user with email ${email} already exists`);
    }
    env.DB.prepare(
      `INSERT INTO users (id, email, name, oauth_name, wallet_address, login_type, role, active, created_at, updated_at, display_name_set_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?, ?, ?)`
    ).run(
      user.id,
      user.email ?? null,
      user.name ?? null,
      user.oauthName ?? null,
      user.walletAddress ?? null,
      user.loginType,
      user.role,
      user.createdAt,
      user.updatedAt,
      user.displayNameSetAt ?? null
    );
  }, { label: `register ${user.id}` });

  logger.info(`Registered user ${user.id} (${resolveDisplayName(user)})`);
  return user;
}

export async function updateDisplayName(user: User, displayName: string, env: Env): Promise<User> {
  const trimmed = displayName.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Display name cannot be empty');
  }
  if (trimmed.length > MAX_DISPLAY_NAME_LENGTH) {
    throw new ValidationError(`Display name must be ${MAX_DISPLAY_NAME_LENGTH} characters or less`);
  }

  return runSerializable(env, () => {
    const now = nowIso(env.clock);
    env.DB.prepare('UPDATE users SET name = ?, display_name_set_at = ?, updated_at = ? WHERE id = ?')
      .run(trimmed, now, now, user.id);
    return requireUser(user.id, env);
  }, { label: `rename ${user.id}` });
}

export async function grantRole(actor: User, userId: string, role: UserRole, env: Env): Promise<User> {
  authorize(actor, 'user:manage');

  const { previous, updated } = await runSerializable(env, () => {
    const target = requireUser(userId, env);
    if (target.role === role) {
      return { previous: role, updated: target };
    }
    env.DB.prepare('UPDATE users SET role = ?, updated_at = ? WHERE id = ?')
      .run(role, nowIso(env.clock), userId);
    appendAudit({
      entityType: 'user',
      entityId: userId,
      action: 'role_changed',
      fromStatus: target.role,
      toStatus: role,
      actorId: actor.id,
    }, env);
    return { previous: target.role, updated: requireUser(userId, env) };
  }, { label: `grant role ${userId}` });

  if (previous !== role) {
    logger.info(`User ${userId} role changed from ${previous} to ${role} by ${actor.id}`);
  }
  return updated;
}

async function setActive(actor: User, userId: string, active: boolean, env: Env): Promise<User> {
  authorize(actor, 'user:manage');

  return runSerializable(env, () => {
    const target = requireUser(userId, env);
    if (target.active === active) {
      return target;
    }
    env.DB.prepare('UPDATE users SET active = ?, updated_at = ? WHERE id = ?')
      .run(active ? 1 : 0, nowIso(env.clock), userId);
    appendAudit({
      entityType: 'user',
      entityId: userId,
      action: active ? 'reactivated' : 'deactivated',
      actorId: actor.id,
    }, env);
    return requireUser(userId, env);
  }, { label: `${active ? 'reactivate' : 'deactivate'} ${userId}` });
}

// Soft-deactivation only: authorship of historical submissions and comments stays intact
export const deactivateUser = (actor: User, userId: string, env: Env): Promise<User> =>
  setActive(actor, userId, false, env);

export const reactivateUser = (actor: User, userId: string, env: Env): Promise<User> =>
  setActive(actor, userId, true, env);

export async function initializeFirstAdmin(adminEmail: string | undefined, env: Env): Promise<User | null> {
  if (!adminEmail) {
    return null;
  }

  const existing = getUserByEmail(adminEmail, env);
  if (!existing) {
    logger.info(`Creating initial admin account for ${adminEmail}`);
    return registerUser({ email: adminEmail, loginType: 'email', role: 'admin' }, env);
  }

  if (existing.role !== 'admin' || !existing.active) {
    return runSerializable(env, () => {
      env.DB.prepare("UPDATE users SET role = 'admin', active = 1, updated_at = ? WHERE id = ?")
        .run(nowIso(env.clock), existing.id);
      return requireUser(existing.id, env);
    }, { label: `promote ${existing.id}` });
  }

  return existing;
}
