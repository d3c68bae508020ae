import { v4 as uuidv4 } from 'uuid';
import { AuditRecord, DraftInput, PublishedDocument, DocumentRevision, Submission, SubmissionStatus, User } from '../types';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';
import { logger } from '../utils/logger';
import { runSerializable } from '../utils/transaction';
import { NotFoundError, PermissionError, StateError, ValidationError } from '../errors';
import { appendAudit, getAuditTrail } from './auditService';
import { publishOrRevise } from './documentService';
import { assertActive, authorize, hasCapability } from './roleService';
import { resolveSubmissionGroup } from './workingGroupService';

export const ALLOWED_FILE_EXTENSIONS = ['txt', 'pdf', 'xml', 'doc', 'docx'];

const MAX_TITLE_LENGTH = 200;
const MAX_REASON_LENGTH = 2000;

// Allowed moves; approved and rejected are terminal
const TRANSITIONS: Readonly<Record<SubmissionStatus, readonly SubmissionStatus[]>> = {
  submitted: ['under_review'],
  under_review: ['approved', 'rejected'],
  approved: [],
  rejected: [],
};

export const isTerminal = (status: SubmissionStatus): boolean => TRANSITIONS[status].length === 0;

export const canTransition = (from: SubmissionStatus, to: SubmissionStatus): boolean =>
  TRANSITIONS[from].includes(to);

interface SubmissionRow {
  id: string;
  title: string;
  authors: string;
  working_group: string;
  file_ref: string;
  abstract: string | null;
  draft_name: string;
  status: SubmissionStatus;
  submitted_by: string;
  submitted_at: string;
  resubmission_of: string | null;
  document_identifier: string | null;
  revision_number: number | null;
  reviewed_by: string | null;
  rejection_reason: string | null;
  updated_at: string;
}

export interface ApprovalResult {
  submission: Submission;
  document: PublishedDocument;
  revision: DocumentRevision;
  created: boolean;
}

const parseAuthors = (raw: string): string[] => {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((a): a is string => typeof a === 'string') : [];
};

const toSubmission = (row: SubmissionRow): Submission => ({
  id: row.id,
  title: row.title,
  authors: parseAuthors(row.authors),
  workingGroup: row.working_group,
  fileRef: row.file_ref,
  abstract: row.abstract ?? undefined,
  draftName: row.draft_name,
  status: row.status,
  submittedBy: row.submitted_by,
  submittedAt: row.submitted_at,
  resubmissionOf: row.resubmission_of ?? undefined,
  documentIdentifier: row.document_identifier ?? undefined,
  revisionNumber: row.revision_number ?? undefined,
  reviewedBy: row.reviewed_by ?? undefined,
  rejectionReason: row.rejection_reason ?? undefined,
  updatedAt: row.updated_at,
});

export function normalizeAuthors(authors: DraftInput['authors']): string[] {
  const list = typeof authors === 'string' ? authors.split(',') : authors ?? [];
  return list.map(author => author.trim()).filter(author => author.length > 0);
}

/**
 * Builds the draft name `draft-<first author's last name>-<title slug>`,
 * with the slug cut to 30 characters.
 */
export function generateDraftName(title: string, authors: string[]): string {
  const firstAuthor = authors[0] ?? '';
  const authorLast = firstAuthor.split(/\s+/).filter(Boolean).pop()?.toLowerCase() || 'unknown';

  const titleSlug = title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .slice(0, 30);

  return `draft-${authorLast}-${titleSlug}`;
}

const hasAllowedExtension = (fileRef: string): boolean => {
  const dot = fileRef.lastIndexOf('.');
  return dot > 0 && ALLOWED_FILE_EXTENSIONS.includes(fileRef.slice(dot + 1).toLowerCase());
};

export function getSubmission(id: string, env: Env): Submission | null {
  const row = env.DB.prepare<[string], SubmissionRow>('SELECT * FROM submissions WHERE id = ?').get(id);
  return row ? toSubmission(row) : null;
}

export function requireSubmission(id: string, env: Env): Submission {
  const submission = getSubmission(id, env);
  if (!submission) {
    throw new NotFoundError(`Submission ${id} not found`);
  }
  return submission;
}

// Reviewers see every submission; everyone else sees their own
export function listSubmissions(actor: User, env: Env, status?: SubmissionStatus): Submission[] {
  const rows = hasCapability(actor.role, 'submission:review')
    ? env.DB.prepare<[], SubmissionRow>('SELECT * FROM submissions ORDER BY submitted_at ASC, id ASC').all()
    : env.DB.prepare<[string], SubmissionRow>(
        'SELECT * FROM submissions WHERE submitted_by = ? ORDER BY submitted_at ASC, id ASC'
      ).all(actor.id);

  const submissions = rows.map(toSubmission);
  return status ? submissions.filter(submission => submission.status === status) : submissions;
}

export function canViewSubmission(actor: User, submission: Submission): boolean {
  return submission.submittedBy === actor.id || hasCapability(actor.role, 'submission:review');
}

export function getSubmissionHistory(id: string, env: Env): AuditRecord[] {
  return getAuditTrail('submission', id, env);
}

export async function submit(draft: DraftInput, author: User, env: Env): Promise<Submission> {
  assertActive(author);

  const title = draft.title?.trim() ?? '';
  const authors = normalizeAuthors(draft.authors);
  const workingGroup = draft.workingGroup?.trim() ?? '';
  const fileRef = draft.fileRef?.trim() ?? '';
  const abstract = draft.abstract?.trim() || undefined;

  const missing = [
    title ? null : 'title',
    authors.length > 0 ? null : 'authors',
    workingGroup ? null : 'workingGroup',
    fileRef ? null : 'fileRef',
  ].filter((field): field is string => field !== null);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`);
  }
  if (title.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`Title must be ${MAX_TITLE_LENGTH} characters or less`);
  }
  if (!hasAllowedExtension(fileRef)) {
    throw new ValidationError(`Invalid file type. Allowed: ${ALLOWED_FILE_EXTENSIONS.join(', ')}`);
  }
  const group = resolveSubmissionGroup(workingGroup, env);

  if (draft.resubmissionOf) {
    const previous = requireSubmission(draft.resubmissionOf, env);
    if (!isTerminal(previous.status)) {
      throw new StateError(`Submission ${previous.id} is still ${previous.status}; only finished submissions can be resubmitted`);
    }
  }

  const now = nowIso(env.clock);
  const submission: Submission = {
    id: uuidv4(),
    title,
    authors,
    workingGroup: group.acronym,
    fileRef,
    abstract,
    draftName: generateDraftName(title, authors),
    status: 'submitted',
    submittedBy: author.id,
    submittedAt: now,
    resubmissionOf: draft.resubmissionOf,
    updatedAt: now,
  };

  await runSerializable(env, () => {
    env.DB.prepare(
      `INSERT INTO submissions (id, title, authors, working_group, file_ref, abstract, draft_name, status, submitted_by, submitted_at, resubmission_of, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 'submitted', ?, ?, ?, ?)`
    ).run(
      submission.id,
      submission.title,
      JSON.stringify(submission.authors),
      submission.workingGroup,
      submission.fileRef,
      submission.abstract ?? null,
      submission.draftName,
      submission.submittedBy,
      submission.submittedAt,
      submission.resubmissionOf ?? null,
      submission.updatedAt
    );
    appendAudit({
      entityType: 'submission',
      entityId: submission.id,
      action: 'status_change',
      toStatus: 'submitted',
      actorId: author.id,
      details: submission.draftName,
    }, env);
  }, { label: `submit ${submission.id}` });

  logger.info(`Submission ${submission.id} (${submission.draftName}) created by ${author.id}`);
  return submission;
}

// Checks the current status and records the move; runs inside the caller's transaction
function transition(
  id: string,
  expected: SubmissionStatus,
  next: SubmissionStatus,
  reviewer: User,
  env: Env,
  details?: string
): Submission {
  const current = requireSubmission(id, env);
  if (current.status !== expected || !canTransition(current.status, next)) {
    throw new StateError(`Cannot move submission ${id} from ${current.status} to ${next}`);
  }

  env.DB.prepare('UPDATE submissions SET status = ?, reviewed_by = ?, updated_at = ? WHERE id = ? AND status = ?')
    .run(next, reviewer.id, nowIso(env.clock), id, expected);
  appendAudit({
    entityType: 'submission',
    entityId: id,
    action: 'status_change',
    fromStatus: expected,
    toStatus: next,
    actorId: reviewer.id,
    details,
  }, env);

  return requireSubmission(id, env);
}

export async function beginReview(id: string, reviewer: User, env: Env): Promise<Submission> {
  authorize(reviewer, 'submission:review');
  const submission = await runSerializable(
    env,
    () => transition(id, 'submitted', 'under_review', reviewer, env),
    { label: `review ${id}` }
  );
  logger.info(`Submission ${id} under review by ${reviewer.id}`);
  return submission;
}

/**
 * Approves a submission under review. Numbering, publication and the state
 * change commit together or not at all.
 */
export async function approve(id: string, reviewer: User, env: Env): Promise<ApprovalResult> {
  authorize(reviewer, 'submission:review');

  const result = await runSerializable(env, () => {
    const current = requireSubmission(id, env);
    if (current.status !== 'under_review') {
      throw new StateError(`Cannot approve submission ${id} while it is ${current.status}`);
    }

    const published = publishOrRevise(current, reviewer.id, env);
    env.DB.prepare('UPDATE submissions SET document_identifier = ?, revision_number = ? WHERE id = ?')
      .run(published.document.identifier, published.revision.revision, id);
    const submission = transition(id, 'under_review', 'approved', reviewer, env, published.revision.identifier);

    return { submission, ...published };
  }, { label: `approve ${id}` });

  logger.info(`Submission ${id} approved as ${result.revision.identifier} by ${reviewer.id}`);
  return result;
}

export async function reject(id: string, reviewer: User, reason: string, env: Env): Promise<Submission> {
  authorize(reviewer, 'submission:review');
  const trimmed = reason.trim();
  if (!trimmed) {
    throw new ValidationError('A rejection reason is required');
  }
  if (trimmed.length > MAX_REASON_LENGTH) {
    throw new ValidationError(`Rejection reason must be ${MAX_REASON_LENGTH} characters or less`);
  }

  const submission = await runSerializable(env, () => {
    const updated = transition(id, 'under_review', 'rejected', reviewer, env, trimmed);
    env.DB.prepare('UPDATE submissions SET rejection_reason = ? WHERE id = ?').run(trimmed, id);
    return { ...updated, rejectionReason: trimmed };
  }, { label: `reject ${id}` });

  logger.info(`Submission ${id} rejected by ${reviewer.id}`);
  return submission;
}

// The author may pull a submission only before review starts
export async function withdrawSubmission(id: string, actor: User, env: Env): Promise<void> {
  assertActive(actor);

  await runSerializable(env, () => {
    const current = requireSubmission(id, env);
    if (current.submittedBy !== actor.id) {
      throw new PermissionError('Only the author can withdraw a submission');
    }
    if (current.status !== 'submitted') {
      throw new StateError(`Submission ${id} can no longer be withdrawn (status ${current.status})`);
    }

    env.DB.prepare("DELETE FROM submissions WHERE id = ? AND status = 'submitted'").run(id);
    appendAudit({
      entityType: 'submission',
      entityId: id,
      action: 'withdrawn',
      fromStatus: 'submitted',
      actorId: actor.id,
    }, env);
  }, { label: `withdraw ${id}` });

  logger.info(`Submission ${id} withdrawn by ${actor.id}`);
}
