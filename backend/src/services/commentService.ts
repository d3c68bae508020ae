import { v4 as uuidv4 } from 'uuid';
import { CommentNode, DocumentComment, User } from '../types';
import { Env } from '../utils/sessionManager';
import { Clock, nowIso } from '../utils/clock';
import { logger } from '../utils/logger';
import { runSerializable } from '../utils/transaction';
import { IntegrityError, NotFoundError, PermissionError, StateError, ValidationError, WindowExpiredError } from '../errors';
import { appendAudit } from './auditService';
import { requireDocument } from './documentService';
import { assertActive } from './roleService';
import { resolveDisplayName } from './userService';
import { buildCommentTree } from './commentThread';

export const COMMENT_EDIT_WINDOW_MS = 15 * 60 * 1000;
export const DELETED_COMMENT_PLACEHOLDER = '[deleted]';
const MAX_COMMENT_LENGTH = 10000;

interface CommentRow {
  id: string;
  document_identifier: string;
  parent_id: string | null;
  author_id: string;
  body: string;
  original_text: string | null;
  created_at: string;
  edited_at: string | null;
  is_deleted: number;
  deleted_at: string | null;
  author_name: string | null;
  author_oauth_name: string | null;
  author_wallet: string | null;
  like_count: number;
}

const COMMENT_SELECT = `
  SELECT c.*,
         u.name AS author_name,
         u.oauth_name AS author_oauth_name,
         u.wallet_address AS author_wallet,
         (SELECT COUNT(*) FROM comment_likes l WHERE l.comment_id = c.id) AS like_count
  FROM comments c
  JOIN users u ON u.id = c.author_id
`;

const toComment = (row: CommentRow): DocumentComment => ({
  id: row.id,
  documentIdentifier: row.document_identifier,
  parentId: row.parent_id ?? undefined,
  authorId: row.author_id,
  authorName: resolveDisplayName({
    name: row.author_name ?? undefined,
    oauthName: row.author_oauth_name ?? undefined,
    walletAddress: row.author_wallet ?? undefined,
  }),
  body: row.body,
  originalText: row.original_text ?? undefined,
  createdAt: row.created_at,
  editedAt: row.edited_at ?? undefined,
  isDeleted: row.is_deleted === 1,
  deletedAt: row.deleted_at ?? undefined,
  likeCount: row.like_count,
});

function validateBody(body: string | undefined): string {
  const trimmed = body?.trim() ?? '';
  if (!trimmed) {
    throw new ValidationError('Comment body cannot be empty');
  }
  if (trimmed.length > MAX_COMMENT_LENGTH) {
    throw new ValidationError(`Comment must be ${MAX_COMMENT_LENGTH} characters or less`);
  }
  return trimmed;
}

// True while the author may still edit or delete: elapsed time <= 15 minutes
export function isWithinEditWindow(comment: Pick<DocumentComment, 'createdAt'>, clock: Clock): boolean {
  const elapsed = clock.now().getTime() - Date.parse(comment.createdAt);
  return elapsed <= COMMENT_EDIT_WINDOW_MS;
}

function assertAuthorWithinWindow(comment: DocumentComment, actor: User, env: Env, verb: string): void {
  assertActive(actor);
  if (comment.authorId !== actor.id) {
    throw new PermissionError(`Only the author can ${verb} this comment`);
  }
  if (comment.isDeleted) {
    throw new StateError(`Comment ${comment.id} has been deleted`);
  }
  if (!isWithinEditWindow(comment, env.clock)) {
    throw new WindowExpiredError(`The 15 minute window to ${verb} this comment has passed`);
  }
}

export function getComment(id: string, env: Env): DocumentComment | null {
  const row = env.DB.prepare<[string], CommentRow>(`${COMMENT_SELECT} WHERE c.id = ?`).get(id);
  return row ? toComment(row) : null;
}

export function requireComment(id: string, env: Env): DocumentComment {
  const comment = getComment(id, env);
  if (!comment) {
    throw new NotFoundError(`Comment ${id} not found`);
  }
  return comment;
}

export function getComments(documentIdentifier: string, env: Env): DocumentComment[] {
  requireDocument(documentIdentifier, env);
  return env.DB.prepare<[string], CommentRow>(
    `${COMMENT_SELECT} WHERE c.document_identifier = ? ORDER BY c.created_at ASC, c.id ASC`
  )
    .all(documentIdentifier)
    .map(toComment);
}

export function getCommentTree(documentIdentifier: string, env: Env): CommentNode[] {
  return buildCommentTree(getComments(documentIdentifier, env));
}

// Walks the parent chain iteratively; a chain that revisits a comment is corrupt
function assertAcyclic(parentId: string, newId: string, env: Env): void {
  const parentOf = env.DB.prepare<[string], { parent_id: string | null }>('SELECT parent_id FROM comments WHERE id = ?');
  const visited = new Set<string>([newId]);
  let cursor: string | null = parentId;

  while (cursor) {
    if (visited.has(cursor)) {
      throw new IntegrityError(`Comment thread containing ${parentId} has a cycle`);
    }
    visited.add(cursor);
    cursor = parentOf.get(cursor)?.parent_id ?? null;
  }
}

export async function postComment(
  documentIdentifier: string,
  author: User,
  body: string | undefined,
  env: Env,
  parentId?: string
): Promise<DocumentComment> {
  assertActive(author);
  const text = validateBody(body);
  requireDocument(documentIdentifier, env);

  const id = uuidv4();
  const comment = await runSerializable(env, () => {
    if (parentId) {
      const parent = env.DB.prepare<[string], { document_identifier: string }>(
        'SELECT document_identifier FROM comments WHERE id = ?'
      ).get(parentId);
      if (!parent) {
        throw new IntegrityError(`Parent comment ${parentId} does not exist`);
      }
      if (parent.document_identifier !== documentIdentifier) {
        throw new IntegrityError(`Parent comment ${parentId} belongs to a different document`);
      }
      assertAcyclic(parentId, id, env);
    }

    env.DB.prepare(
      `INSERT INTO comments (id, document_identifier, parent_id, author_id, body, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    ).run(id, documentIdentifier, parentId ?? null, author.id, text, nowIso(env.clock));
    appendAudit({
      entityType: 'comment',
      entityId: id,
      action: 'posted',
      actorId: author.id,
      details: `On ${documentIdentifier}: ${text.slice(0, 50)}`,
    }, env);
    return requireComment(id, env);
  }, { label: `comment on ${documentIdentifier}` });

  logger.debug(`Comment ${id} posted on ${documentIdentifier} by ${author.id}`);
  return comment;
}

/**
 * Replaces the body of the actor's own comment within the edit window.
 * The first edit snapshots the posted text into `originalText`; later edits
 * leave that snapshot alone.
 */
export async function editComment(
  id: string,
  actor: User,
  newBody: string | undefined,
  env: Env
): Promise<DocumentComment> {
  return runSerializable(env, () => {
    assertAuthorWithinWindow(requireComment(id, env), actor, env, 'edit');
    const text = validateBody(newBody);

    const updated = env.DB.prepare(
      `UPDATE comments
       SET original_text = COALESCE(original_text, body), body = ?, edited_at = ?
       WHERE id = ? AND is_deleted = 0`
    ).run(text, nowIso(env.clock), id);
    if (updated.changes === 0) {
      throw new StateError(`Comment ${id} has been deleted`);
    }
    appendAudit({ entityType: 'comment', entityId: id, action: 'edited', actorId: actor.id }, env);
    return requireComment(id, env);
  }, { label: `edit comment ${id}` });
}

// Tombstones the comment; replies stay attached and readable
export async function deleteComment(id: string, actor: User, env: Env): Promise<DocumentComment> {
  return runSerializable(env, () => {
    assertAuthorWithinWindow(requireComment(id, env), actor, env, 'delete');

    const updated = env.DB.prepare(
      `UPDATE comments
       SET original_text = COALESCE(original_text, body), body = ?, is_deleted = 1, deleted_at = ?
       WHERE id = ? AND is_deleted = 0`
    ).run(DELETED_COMMENT_PLACEHOLDER, nowIso(env.clock), id);
    if (updated.changes === 0) {
      throw new StateError(`Comment ${id} has been deleted`);
    }
    appendAudit({ entityType: 'comment', entityId: id, action: 'deleted', actorId: actor.id }, env);
    return requireComment(id, env);
  }, { label: `delete comment ${id}` });
}

export async function toggleCommentLike(
  id: string,
  user: User,
  env: Env
): Promise<{ liked: boolean; likeCount: number }> {
  assertActive(user);

  return runSerializable(env, () => {
    const comment = requireComment(id, env);
    if (comment.isDeleted) {
      throw new StateError(`Comment ${id} has been deleted`);
    }

    const removed = env.DB.prepare('DELETE FROM comment_likes WHERE comment_id = ? AND user_id = ?').run(id, user.id);
    if (removed.changes === 0) {
      env.DB.prepare('INSERT INTO comment_likes (comment_id, user_id, created_at) VALUES (?, ?, ?)')
        .run(id, user.id, nowIso(env.clock));
    }
    return { liked: removed.changes === 0, likeCount: requireComment(id, env).likeCount };
  }, { label: `like comment ${id}` });
}
