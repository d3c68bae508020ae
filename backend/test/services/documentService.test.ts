import {
  documentKeyFor,
  getDocumentHistory,
  getRevision,
  getRevisions,
  listDocuments,
  publishOrRevise,
  requireDocument,
  revisionIdentifier,
  supersedeDocument
} from '../../src/services/documentService';
import { submit } from '../../src/services/submissionService';
import { IntegrityError, NotFoundError, PermissionError, StateError, ValidationError } from '../../src/errors';
import { User } from '../../src/types';
import { createTestUser, mockEnv, publishDraft, sampleDraft, silenceConsole, TestEnv } from '../test-helpers';

describe('Document Service', () => {
  let env: TestEnv;
  let author: User;
  let editor: User;
  let chair: User;

  beforeEach(async () => {
    silenceConsole();
    env = mockEnv();
    author = await createTestUser(env);
    editor = await createTestUser(env, 'editor');
    chair = await createTestUser(env, 'chair');
  });

  afterEach(() => {
    env.DB.close();
    jest.restoreAllMocks();
  });

  it('formats revision identifiers with two digits', () => {
    expect(revisionIdentifier('ML-007', 3)).toBe('ML-007-03');
    expect(revisionIdentifier('ML-1000', 12)).toBe('ML-1000-12');
  });

  it('normalizes case and whitespace in the document key', () => {
    expect(documentKeyFor('  OPS ', 'Remote   Work\tPolicy')).toBe('ops::remote work policy');
  });

  it('only publishes inside a transaction', async () => {
    const submission = await submit(sampleDraft(), author, env);
    expect(() => publishOrRevise(submission, editor.id, env)).toThrow(IntegrityError);
  });

  describe('revisions', () => {
    it('keeps every revision in order under one identifier', async () => {
      await publishDraft(env, author, editor);
      env.clock.advance(60_000);
      await publishDraft(env, author, editor, sampleDraft({ fileRef: 'remote-work-policy-v2.pdf', abstract: undefined }));

      const revisions = getRevisions('ML-001', env);
      expect(revisions.map(revision => revision.identifier)).toEqual(['ML-001-00', 'ML-001-01']);
      expect(revisions[1]).toMatchObject({ fileRef: 'remote-work-policy-v2.pdf', abstract: undefined, createdBy: editor.id });
      expect(getRevision('ML-001', 1, env)).toEqual(revisions[1]);
      expect(getDocumentHistory('ML-001', env).map(entry => entry.action)).toEqual(['published', 'revised']);
    });

    it('reports unknown revisions and documents', async () => {
      await publishDraft(env, author, editor);

      expect(() => getRevision('ML-001', 5, env)).toThrow(new NotFoundError('Revision ML-001-05 not found'));
      expect(() => getRevisions('ML-404', env)).toThrow(NotFoundError);
      expect(() => requireDocument('ML-404', env)).toThrow('Document ML-404 not found');
    });

    it('rejects direct changes to stored revisions and audit entries', async () => {
      await publishDraft(env, author, editor);

      expect(() => env.DB.prepare("UPDATE document_revisions SET title = 'Changed'").run()).toThrow('document revisions are append-only');
      expect(() => env.DB.prepare('DELETE FROM document_revisions').run()).toThrow('document revisions are append-only');
      expect(() => env.DB.prepare('DELETE FROM audit_log').run()).toThrow('audit log is append-only');
    });
  });

  it('lists documents by number', async () => {
    await publishDraft(env, author, editor, sampleDraft({ title: 'First Policy' }));
    await publishDraft(env, author, editor, sampleDraft({ title: 'Second Policy' }));

    expect(listDocuments(env).map(document => [document.identifier, document.title])).toEqual([
      ['ML-001', 'First Policy'],
      ['ML-002', 'Second Policy'],
    ]);
  });

  describe('supersedeDocument', () => {
    beforeEach(async () => {
      await publishDraft(env, author, editor, sampleDraft({ title: 'Old Policy' }));
      await publishDraft(env, author, editor, sampleDraft({ title: 'New Policy' }));
    });

    it('requires the supersede capability', async () => {
      await expect(supersedeDocument('ML-001', 'ML-002', author, env)).rejects.toThrow(PermissionError);
      await expect(supersedeDocument('ML-001', 'ML-002', editor, env))
        .rejects.toThrow("Role 'editor' may not perform 'document:supersede'");
    });

    it('marks the document superseded and records who did it', async () => {
      const document = await supersedeDocument('ML-001', 'ML-002', chair, env);

      expect(document).toMatchObject({ identifier: 'ML-001', status: 'superseded', supersededBy: 'ML-002' });
      const history = getDocumentHistory('ML-001', env);
      expect(history[history.length - 1]).toMatchObject({
        action: 'superseded',
        fromStatus: 'published',
        toStatus: 'superseded',
        actorId: chair.id,
      });
    });

    it('can only happen once', async () => {
      await supersedeDocument('ML-001', 'ML-002', chair, env);
      await expect(supersedeDocument('ML-001', 'ML-002', chair, env)).rejects.toThrow(StateError);
    });

    it('needs a different, existing replacement', async () => {
      await expect(supersedeDocument('ML-001', 'ML-001', chair, env)).rejects.toThrow(ValidationError);
      await expect(supersedeDocument('ML-001', 'ML-404', chair, env)).rejects.toThrow(NotFoundError);
      expect(requireDocument('ML-001', env).status).toBe('published');
    });
  });
});
