import { AutoRouter, json } from 'itty-router';
import { withAuth, withCapability, currentUser } from '../authWrappers';
import { Env } from '../utils/sessionManager';
import { readJsonBody, optionalString, stringList } from '../utils/requestBody';
import { errorResponse, PermissionError } from '../errors';
import { GovernanceRequest, SubmissionStatus } from '../types';
import {
  approve,
  beginReview,
  canViewSubmission,
  getSubmissionHistory,
  listSubmissions,
  reject,
  requireSubmission,
  submit,
  withdrawSubmission
} from '../services/submissionService';
import { notifyFollowers } from '../services/notificationService';
import { logger } from '../utils/logger';

export const router = AutoRouter<GovernanceRequest, [Env]>({ base: '/api/submissions', catch: errorResponse });

const STATUSES: readonly SubmissionStatus[] = ['submitted', 'under_review', 'approved', 'rejected'];

const statusFilter = (value: unknown): SubmissionStatus | undefined =>
  STATUSES.find(status => status === value);

// Create a new submission
router.post('/', withAuth, async (request, env) => {
  const body = await readJsonBody(request);
  const submission = await submit({
    title: optionalString(body, 'title'),
    authors: stringList(body, 'authors'),
    workingGroup: optionalString(body, 'workingGroup'),
    fileRef: optionalString(body, 'fileRef'),
    abstract: optionalString(body, 'abstract'),
    resubmissionOf: optionalString(body, 'resubmissionOf'),
  }, currentUser(request), env);

  return json(submission, { status: 201 });
});

// Get submissions visible to the user, optionally filtered by ?status=
router.get('/', withAuth, async (request, env) => {
  return json(listSubmissions(currentUser(request), env, statusFilter(request.query.status)));
});

router.get('/:id', withAuth, async (request, env) => {
  const submission = requireSubmission(request.params.id, env);
  if (!canViewSubmission(currentUser(request), submission)) {
    throw new PermissionError('Access denied');
  }
  return json(submission);
});

router.get('/:id/history', withAuth, async (request, env) => {
  const submission = requireSubmission(request.params.id, env);
  if (!canViewSubmission(currentUser(request), submission)) {
    throw new PermissionError('Access denied');
  }
  return json(getSubmissionHistory(submission.id, env));
});

// Authors may withdraw before review starts
router.delete('/:id', withAuth, async (request, env) => {
  await withdrawSubmission(request.params.id, currentUser(request), env);
  return json({ message: 'Submission withdrawn' });
});

router.post('/:id/review', withCapability('submission:review'), async (request, env) => {
  return json(await beginReview(request.params.id, currentUser(request), env));
});

router.post('/:id/approve', withCapability('submission:review'), async (request, env) => {
  const reviewer = currentUser(request);
  const result = await approve(request.params.id, reviewer, env);

  // Publication has committed; followers of an existing document hear about the new revision
  if (!result.created) {
    const outcome = await notifyFollowers(result.document.identifier, {
      kind: 'significant',
      actorId: reviewer.id,
      summary: `Revision ${result.revision.identifier}: ${result.revision.title}`,
    }, env);
    logger.debug(`Revision notifications for ${result.revision.identifier}:`, outcome);
  }

  return json(result);
});

router.post('/:id/reject', withCapability('submission:review'), async (request, env) => {
  const body = await readJsonBody(request);
  return json(await reject(request.params.id, currentUser(request), optionalString(body, 'reason') ?? '', env));
});
