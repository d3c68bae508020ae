import { DocumentEventKind, Follow, NotificationLevel, NOTIFICATION_LEVELS, User } from '../types';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';
import { IntegrityError, ValidationError } from '../errors';
import { runSerializable } from '../utils/transaction';
import { requireDocument } from './documentService';
import { assertActive } from './roleService';
import { getUser } from './userService';

interface FollowRow {
  user_id: string;
  document_identifier: string;
  level: NotificationLevel;
  created_at: string;
  updated_at: string;
}

// Event severity, lowest first
const EVENT_RANK: Readonly<Record<DocumentEventKind, number>> = {
  comment: 0,
  significant: 1,
  major: 2,
};

// Lowest-ranked event each level still receives; null means nothing
const LEVEL_THRESHOLD: Readonly<Record<NotificationLevel, number | null>> = {
  all: EVENT_RANK.comment,
  comments: EVENT_RANK.comment,
  significant: EVENT_RANK.significant,
  major: EVENT_RANK.major,
  none: null,
};

const toFollow = (row: FollowRow): Follow => ({
  userId: row.user_id,
  documentIdentifier: row.document_identifier,
  level: row.level,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export const isNotificationLevel = (value: unknown): value is NotificationLevel =>
  typeof value === 'string' && NOTIFICATION_LEVELS.some(level => level === value);

/**
 * A level matches its named event kind and every kind ranked above it;
 * `all` matches everything and `none` nothing.
 */
export function levelMatches(level: NotificationLevel, kind: DocumentEventKind): boolean {
  const threshold = LEVEL_THRESHOLD[level];
  return threshold !== null && EVENT_RANK[kind] >= threshold;
}

export function getFollow(userId: string, documentIdentifier: string, env: Env): Follow | null {
  const row = env.DB.prepare<[string, string], FollowRow>(
    'SELECT * FROM follows WHERE user_id = ? AND document_identifier = ?'
  ).get(userId, documentIdentifier);
  return row ? toFollow(row) : null;
}

export function getFollowLevel(userId: string, documentIdentifier: string, env: Env): NotificationLevel | null {
  return getFollow(userId, documentIdentifier, env)?.level ?? null;
}

export async function followDocument(
  user: User,
  documentIdentifier: string,
  env: Env,
  level: NotificationLevel = 'all'
): Promise<Follow> {
  assertActive(user);
  if (!isNotificationLevel(level)) {
    throw new ValidationError(`Unknown notification level: ${String(level)}`);
  }
  requireDocument(documentIdentifier, env);

  return runSerializable(env, () => {
    const now = nowIso(env.clock);
    const row = env.DB.prepare<[string, string, NotificationLevel, string, string], FollowRow>(
      `INSERT INTO follows (user_id, document_identifier, level, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (user_id, document_identifier) DO UPDATE SET level = excluded.level, updated_at = excluded.updated_at
       RETURNING *`
    ).get(user.id, documentIdentifier, level, now, now);
    if (!row) {
      throw new IntegrityError(`Could not follow ${documentIdentifier}`);
    }
    return toFollow(row);
  }, { label: `follow ${documentIdentifier}` });
}

export async function unfollowDocument(user: User, documentIdentifier: string, env: Env): Promise<boolean> {
  const result = await runSerializable(
    env,
    () => env.DB.prepare('DELETE FROM follows WHERE user_id = ? AND document_identifier = ?').run(user.id, documentIdentifier),
    { label: `unfollow ${documentIdentifier}` }
  );
  return result.changes > 0;
}

export function listFollowers(documentIdentifier: string, env: Env): Follow[] {
  return env.DB.prepare<[string], FollowRow>(
    'SELECT * FROM follows WHERE document_identifier = ? ORDER BY created_at ASC, user_id ASC'
  )
    .all(documentIdentifier)
    .map(toFollow);
}

// Read-only: consulted by the delivery side, never by the lifecycle engine
export function shouldNotify(user: User, documentIdentifier: string, kind: DocumentEventKind, env: Env): boolean {
  if (!user.active) return false;
  const level = getFollowLevel(user.id, documentIdentifier, env);
  return level !== null && levelMatches(level, kind);
}

export function followersToNotify(documentIdentifier: string, kind: DocumentEventKind, env: Env): User[] {
  return listFollowers(documentIdentifier, env)
    .map(follow => getUser(follow.userId, env))
    .filter((user): user is User => user !== null && shouldNotify(user, documentIdentifier, kind, env));
}
