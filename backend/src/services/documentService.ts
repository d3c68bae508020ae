import { AuditRecord, DocumentRevision, DocumentStatus, PublishedDocument, Submission, User } from '../types';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';
import { logger } from '../utils/logger';
import { runSerializable } from '../utils/transaction';
import { IntegrityError, NotFoundError, StateError, ValidationError } from '../errors';
import { appendAudit, getAuditTrail } from './auditService';
import { assignNextIdentifier } from './numberingService';
import { authorize } from './roleService';

interface DocumentRow {
  identifier: string;
  number: number;
  document_key: string;
  title: string;
  working_group: string;
  status: DocumentStatus;
  current_revision: number;
  superseded_by: string | null;
  created_at: string;
  updated_at: string;
}

interface RevisionRow {
  document_identifier: string;
  revision: number;
  submission_id: string;
  title: string;
  authors: string;
  file_ref: string;
  abstract: string | null;
  created_by: string;
  created_at: string;
}

export interface PublishResult {
  document: PublishedDocument;
  revision: DocumentRevision;
  created: boolean; // false when a revision was appended to an existing document
}

const toDocument = (row: DocumentRow): PublishedDocument => ({
  identifier: row.identifier,
  number: row.number,
  title: row.title,
  workingGroup: row.working_group,
  status: row.status,
  currentRevision: row.current_revision,
  supersededBy: row.superseded_by ?? undefined,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export const revisionIdentifier = (documentIdentifier: string, revision: number): string =>
  `${documentIdentifier}-${String(revision).padStart(2, '0')}`;

const parseAuthors = (raw: string): string[] => {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((a): a is string => typeof a === 'string') : [];
};

const toRevision = (row: RevisionRow): DocumentRevision => ({
  identifier: revisionIdentifier(row.document_identifier, row.revision),
  documentIdentifier: row.document_identifier,
  revision: row.revision,
  submissionId: row.submission_id,
  title: row.title,
  authors: parseAuthors(row.authors),
  fileRef: row.file_ref,
  abstract: row.abstract ?? undefined,
  createdBy: row.created_by,
  createdAt: row.created_at,
});

const normalizeKeyPart = (value: string): string => value.trim().replace(/\s+/g, ' ').toLowerCase();

// A re-submission names the same document when working group and title match, ignoring case and spacing
export const documentKeyFor = (workingGroup: string, title: string): string =>
  `${normalizeKeyPart(workingGroup)}::${normalizeKeyPart(title)}`;

export function getDocument(identifier: string, env: Env): PublishedDocument | null {
  const row = env.DB.prepare<[string], DocumentRow>('SELECT * FROM published_documents WHERE identifier = ?')
    .get(identifier);
  return row ? toDocument(row) : null;
}

export function requireDocument(identifier: string, env: Env): PublishedDocument {
  const document = getDocument(identifier, env);
  if (!document) {
    throw new NotFoundError(`Document ${identifier} not found`);
  }
  return document;
}

export function listDocuments(env: Env): PublishedDocument[] {
  return env.DB.prepare<[], DocumentRow>('SELECT * FROM published_documents ORDER BY number ASC')
    .all()
    .map(toDocument);
}

export function getRevisions(identifier: string, env: Env): DocumentRevision[] {
  requireDocument(identifier, env);
  return env.DB.prepare<[string], RevisionRow>(
    'SELECT * FROM document_revisions WHERE document_identifier = ? ORDER BY revision ASC'
  )
    .all(identifier)
    .map(toRevision);
}

export function getRevision(identifier: string, revision: number, env: Env): DocumentRevision {
  const row = env.DB.prepare<[string, number], RevisionRow>(
    'SELECT * FROM document_revisions WHERE document_identifier = ? AND revision = ?'
  ).get(identifier, revision);
  if (!row) {
    throw new NotFoundError(`Revision ${revisionIdentifier(identifier, revision)} not found`);
  }
  return toRevision(row);
}

export function getDocumentHistory(identifier: string, env: Env): AuditRecord[] {
  requireDocument(identifier, env);
  return getAuditTrail('document', identifier, env);
}

function insertRevision(documentIdentifier: string, revision: number, submission: Submission, actorId: string, env: Env): DocumentRevision {
  env.DB.prepare(
    `INSERT INTO document_revisions (document_identifier, revision, submission_id, title, authors, file_ref, abstract, created_by, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    documentIdentifier,
    revision,
    submission.id,
    submission.title,
    JSON.stringify(submission.authors),
    submission.fileRef,
    submission.abstract ?? null,
    actorId,
    nowIso(env.clock)
  );
  return getRevision(documentIdentifier, revision, env);
}

/**
 * Creates the Published Document for an approved submission, or appends the
 * next revision when the document already exists. Only callable from inside
 * the approval transaction, which holds the write lock for both the counter
 * and the revision sequence.
 */
export function publishOrRevise(submission: Submission, actorId: string, env: Env): PublishResult {
  if (!env.DB.inTransaction) {
    throw new IntegrityError('Documents can only be published inside an approval transaction');
  }

  const key = documentKeyFor(submission.workingGroup, submission.title);
  const existing = env.DB.prepare<[string], DocumentRow>('SELECT * FROM published_documents WHERE document_key = ?')
    .get(key);
  const now = nowIso(env.clock);

  if (!existing) {
    const { number, identifier } = assignNextIdentifier(env);
    env.DB.prepare(
      `INSERT INTO published_documents (identifier, number, document_key, title, working_group, status, current_revision, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 'published', 0, ?, ?)`
    ).run(identifier, number, key, submission.title, submission.workingGroup, now, now);

    const revision = insertRevision(identifier, 0, submission, actorId, env);
    appendAudit({
      entityType: 'document',
      entityId: identifier,
      action: 'published',
      toStatus: 'published',
      actorId,
      details: `Revision ${revision.identifier} from submission ${submission.id}`,
    }, env);

    return { document: requireDocument(identifier, env), revision, created: true };
  }

  if (existing.status === 'superseded') {
    throw new StateError(`Document ${existing.identifier} has been superseded and cannot be revised`);
  }

  const nextRevision = existing.current_revision + 1;
  const revision = insertRevision(existing.identifier, nextRevision, submission, actorId, env);
  env.DB.prepare('UPDATE published_documents SET current_revision = ?, updated_at = ? WHERE identifier = ?')
    .run(nextRevision, now, existing.identifier);
  appendAudit({
    entityType: 'document',
    entityId: existing.identifier,
    action: 'revised',
    actorId,
    details: `Revision ${revision.identifier} from submission ${submission.id}`,
  }, env);

  return { document: requireDocument(existing.identifier, env), revision, created: false };
}

export async function supersedeDocument(
  identifier: string,
  replacementIdentifier: string,
  actor: User,
  env: Env
): Promise<PublishedDocument> {
  authorize(actor, 'document:supersede');
  if (!replacementIdentifier || replacementIdentifier === identifier) {
    throw new ValidationError('A different replacement document is required');
  }

  const document = await runSerializable(env, () => {
    const current = requireDocument(identifier, env);
    requireDocument(replacementIdentifier, env);
    if (current.status === 'superseded') {
      throw new StateError(`Document ${identifier} is already superseded by ${current.supersededBy}`);
    }

    env.DB.prepare(
      "UPDATE published_documents SET status = 'superseded', superseded_by = ?, updated_at = ? WHERE identifier = ?"
    ).run(replacementIdentifier, nowIso(env.clock), identifier);
    appendAudit({
      entityType: 'document',
      entityId: identifier,
      action: 'superseded',
      fromStatus: 'published',
      toStatus: 'superseded',
      actorId: actor.id,
      details: `Superseded by ${replacementIdentifier}`,
    }, env);

    return requireDocument(identifier, env);
  }, { label: `supersede ${identifier}` });

  logger.info(`Document ${identifier} superseded by ${replacementIdentifier} (actor ${actor.id})`);
  return document;
}
