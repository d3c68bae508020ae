import { AutoRouter, json } from 'itty-router';
import { withAuth, withCapability, currentUser } from '../authWrappers';
import { Env } from '../utils/sessionManager';
import { readJsonBody, optionalString } from '../utils/requestBody';
import { errorResponse, ValidationError } from '../errors';
import { GovernanceRequest } from '../types';
import {
  getDocumentHistory,
  getRevision,
  getRevisions,
  listDocuments,
  requireDocument,
  supersedeDocument
} from '../services/documentService';
import { followDocument, getFollowLevel, isNotificationLevel, unfollowDocument } from '../services/followService';
import { getCommentTree, postComment } from '../services/commentService';
import { notifyFollowers } from '../services/notificationService';
import { logger } from '../utils/logger';

export const router = AutoRouter<GovernanceRequest, [Env]>({ base: '/api/documents', catch: errorResponse });

function parseRevision(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`Invalid revision number: ${raw}`);
  }
  return Number(raw);
}

// Published documents are readable without a session
router.get('/', async (request, env) => json(listDocuments(env)));

router.get('/:identifier', async (request, env) => json(requireDocument(request.params.identifier, env)));

router.get('/:identifier/revisions', async (request, env) => {
  requireDocument(request.params.identifier, env);
  return json(getRevisions(request.params.identifier, env));
});

router.get('/:identifier/revisions/:revision', async (request, env) => {
  return json(getRevision(request.params.identifier, parseRevision(request.params.revision), env));
});

router.get('/:identifier/history', async (request, env) => {
  requireDocument(request.params.identifier, env);
  return json(getDocumentHistory(request.params.identifier, env));
});

router.post('/:identifier/supersede', withCapability('document:supersede'), async (request, env) => {
  const actor = currentUser(request);
  const body = await readJsonBody(request);
  const replacement = optionalString(body, 'replacement') ?? '';
  const document = await supersedeDocument(request.params.identifier, replacement, actor, env);

  const outcome = await notifyFollowers(document.identifier, {
    kind: 'major',
    actorId: actor.id,
    summary: `${document.identifier} has been superseded by ${replacement}.`,
  }, env);
  logger.debug(`Supersede notifications for ${document.identifier}:`, outcome);

  return json(document);
});

// Follow preferences
router.get('/:identifier/follow', withAuth, async (request, env) => {
  requireDocument(request.params.identifier, env);
  return json({ level: getFollowLevel(currentUser(request).id, request.params.identifier, env) });
});

router.put('/:identifier/follow', withAuth, async (request, env) => {
  const body = await readJsonBody(request);
  const level = body.level ?? 'all';
  if (!isNotificationLevel(level)) {
    throw new ValidationError(`Unknown notification level: ${String(level)}`);
  }
  return json(await followDocument(currentUser(request), request.params.identifier, env, level));
});

router.delete('/:identifier/follow', withAuth, async (request, env) => {
  const removed = await unfollowDocument(currentUser(request), request.params.identifier, env);
  return json({ following: false, removed });
});

// Comments
router.get('/:identifier/comments', async (request, env) => json(getCommentTree(request.params.identifier, env)));

router.post('/:identifier/comments', withAuth, async (request, env) => {
  const author = currentUser(request);
  const body = await readJsonBody(request);
  const comment = await postComment(
    request.params.identifier,
    author,
    optionalString(body, 'body'),
    env,
    optionalString(body, 'parentId')
  );

  const outcome = await notifyFollowers(comment.documentIdentifier, {
    kind: 'comment',
    actorId: author.id,
    summary: `${comment.authorName}: ${comment.body}`,
  }, env);
  logger.debug(`Comment notifications for ${comment.documentIdentifier}:`, outcome);

  return json(comment, { status: 201 });
});
