import { AutoRouter, json } from 'itty-router';
import { withAuth, currentUser } from '../authWrappers';
import { Env } from '../utils/sessionManager';
import { readJsonBody, optionalString } from '../utils/requestBody';
import { errorResponse } from '../errors';
import { GovernanceRequest } from '../types';
import { deleteComment, editComment, toggleCommentLike } from '../services/commentService';

export const router = AutoRouter<GovernanceRequest, [Env]>({ base: '/api/comments', catch: errorResponse });

// Edit own comment (15 minute window)
router.put('/:id', withAuth, async (request, env) => {
  const body = await readJsonBody(request);
  return json(await editComment(request.params.id, currentUser(request), optionalString(body, 'body'), env));
});

// Delete own comment (15 minute window); leaves a tombstone
router.delete('/:id', withAuth, async (request, env) => {
  return json(await deleteComment(request.params.id, currentUser(request), env));
});

router.post('/:id/like', withAuth, async (request, env) => {
  return json(await toggleCommentLike(request.params.id, currentUser(request), env));
});
