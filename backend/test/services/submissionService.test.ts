import {
  approve,
  beginReview,
  generateDraftName,
  getSubmission,
  getSubmissionHistory,
  listSubmissions,
  normalizeAuthors,
  reject,
  submit,
  withdrawSubmission
} from '../../src/services/submissionService';
import { supersedeDocument, getDocument } from '../../src/services/documentService';
import { peekCurrentNumber } from '../../src/services/numberingService';
import { concludeWorkingGroup } from '../../src/services/workingGroupService';
import { deactivateUser, requireUser } from '../../src/services/userService';
import { NotFoundError, PermissionError, StateError, ValidationError } from '../../src/errors';
import { User } from '../../src/types';
import { createTestUser, mockEnv, publishDraft, sampleDraft, silenceConsole, TestEnv } from '../test-helpers';

describe('Submission Service', () => {
  let env: TestEnv;
  let author: User;
  let editor: User;

  beforeEach(async () => {
    silenceConsole();
    env = mockEnv();
    author = await createTestUser(env, 'member', 'Jane Smith');
    editor = await createTestUser(env, 'editor');
  });

  afterEach(() => {
    env.DB.close();
    jest.restoreAllMocks();
  });

  describe('generateDraftName', () => {
    it('combines the first author\'s last name with a title slug', () => {
      expect(generateDraftName('Remote Work Policy', ['Jane Smith', 'Bo Lee'])).toBe('draft-smith-remote-work-policy');
    });

    it('strips punctuation from the title', () => {
      expect(generateDraftName('Rules: Ice & Water!', ['Mary Ann Lee'])).toBe('draft-lee-rules-ice-water');
    });

    it('cuts the slug to 30 characters and falls back to unknown', () => {
      expect(generateDraftName('A Very Long Title About Perimeter Safety And Access Rules', []))
        .toBe('draft-unknown-a-very-long-title-about-perime');
    });
  });

  describe('normalizeAuthors', () => {
    it('splits comma separated names and drops blanks', () => {
      expect(normalizeAuthors('Jane Smith, Bo Lee ,')).toEqual(['Jane Smith', 'Bo Lee']);
      expect(normalizeAuthors([' Jane Smith ', ''])).toEqual(['Jane Smith']);
      expect(normalizeAuthors(undefined)).toEqual([]);
    });
  });

  describe('submit', () => {
    it('creates a submitted draft and records it in the history', async () => {
      const submission = await submit(sampleDraft({ authors: 'Jane Smith, Bo Lee' }), author, env);

      expect(submission.status).toBe('submitted');
      expect(submission.authors).toEqual(['Jane Smith', 'Bo Lee']);
      expect(submission.draftName).toBe('draft-smith-remote-work-policy');
      expect(submission.submittedBy).toBe(author.id);
      expect(getSubmission(submission.id, env)).toEqual(submission);

      const history = getSubmissionHistory(submission.id, env);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ action: 'status_change', toStatus: 'submitted', actorId: author.id });
    });

    it('lists every missing required field', async () => {
      await expect(submit({ title: ' ', authors: [], workingGroup: 'ops' }, author, env))
        .rejects.toThrow(new ValidationError('Missing required fields: title, authors, fileRef'));
    });

    it('rejects unsupported file types', async () => {
      await expect(submit(sampleDraft({ fileRef: 'notes.exe' }), author, env))
        .rejects.toThrow('Invalid file type. Allowed: txt, pdf, xml, doc, docx');
    });

    it('records the registered acronym of the named working group', async () => {
      const submission = await submit(sampleDraft({ workingGroup: ' FIN ' }), author, env);
      expect(submission.workingGroup).toBe('fin');
    });

    it('rejects working groups that are not registered', async () => {
      await expect(submit(sampleDraft({ workingGroup: 'opps' }), author, env))
        .rejects.toThrow(new ValidationError('Unknown working group: opps'));
      expect(listSubmissions(editor, env)).toEqual([]);
    });

    it('rejects submissions to a concluded working group', async () => {
      const chair = await createTestUser(env, 'chair');
      await concludeWorkingGroup(chair, 'fin', env);

      await expect(submit(sampleDraft({ workingGroup: 'fin' }), author, env))
        .rejects.toThrow(new StateError('Working group fin has concluded and accepts no new submissions'));
    });

    it('rejects deactivated authors', async () => {
      const admin = await createTestUser(env, 'admin');
      await deactivateUser(admin, author.id, env);

      await expect(submit(sampleDraft(), requireUser(author.id, env), env)).rejects.toThrow(PermissionError);
    });

    it('only accepts resubmissions of finished submissions', async () => {
      const first = await submit(sampleDraft(), author, env);
      await expect(submit(sampleDraft({ resubmissionOf: first.id }), author, env)).rejects.toThrow(StateError);

      await beginReview(first.id, editor, env);
      await reject(first.id, editor, 'Needs a map', env);
      const second = await submit(sampleDraft({ resubmissionOf: first.id }), author, env);

      expect(second.resubmissionOf).toBe(first.id);
    });
  });

  describe('review lifecycle', () => {
    it('requires the review capability', async () => {
      const submission = await submit(sampleDraft(), author, env);
      await expect(beginReview(submission.id, author, env)).rejects.toThrow(PermissionError);
      await expect(approve(submission.id, author, env)).rejects.toThrow(PermissionError);
    });

    it('cannot approve a submission that is not under review', async () => {
      const submission = await submit(sampleDraft(), author, env);

      await expect(approve(submission.id, editor, env)).rejects.toThrow(StateError);
      expect(peekCurrentNumber(env)).toBe(0);
    });

    it('approves into a new published document', async () => {
      const submission = await submit(sampleDraft(), author, env);
      const reviewing = await beginReview(submission.id, editor, env);
      expect(reviewing.status).toBe('under_review');

      const result = await approve(submission.id, editor, env);

      expect(result.created).toBe(true);
      expect(result.submission).toMatchObject({
        status: 'approved',
        documentIdentifier: 'ML-001',
        revisionNumber: 0,
        reviewedBy: editor.id,
      });
      expect(result.document).toMatchObject({ identifier: 'ML-001', number: 1, status: 'published', currentRevision: 0 });
      expect(result.revision.identifier).toBe('ML-001-00');
      expect(getSubmissionHistory(submission.id, env).map(entry => [entry.fromStatus, entry.toStatus])).toEqual([
        [undefined, 'submitted'],
        ['submitted', 'under_review'],
        ['under_review', 'approved'],
      ]);
    });

    it('appends a revision when the same working group and title are approved again', async () => {
      await publishDraft(env, author, editor);
      const result = await publishDraft(env, author, editor, sampleDraft({
        title: 'remote   work policy',
        workingGroup: ' OPS ',
        fileRef: 'remote-work-policy-v2.pdf',
      }));

      expect(result.created).toBe(false);
      expect(result.revision.identifier).toBe('ML-001-01');
      expect(result.submission.revisionNumber).toBe(1);
      expect(result.document.currentRevision).toBe(1);
    });

    it('treats approved and rejected as terminal', async () => {
      const approved = (await publishDraft(env, author, editor)).submission;
      await expect(approve(approved.id, editor, env)).rejects.toThrow(StateError);
      expect(peekCurrentNumber(env)).toBe(1);
      await expect(beginReview(approved.id, editor, env)).rejects.toThrow(StateError);
      await expect(reject(approved.id, editor, 'Too late', env)).rejects.toThrow(StateError);

      const other = await submit(sampleDraft({ title: 'Another Policy' }), author, env);
      await beginReview(other.id, editor, env);
      const rejected = await reject(other.id, editor, '  Out of scope  ', env);

      expect(rejected).toMatchObject({ status: 'rejected', rejectionReason: 'Out of scope' });
      await expect(approve(other.id, editor, env)).rejects.toThrow(StateError);
    });

    it('requires a rejection reason', async () => {
      const submission = await submit(sampleDraft(), author, env);
      await beginReview(submission.id, editor, env);

      await expect(reject(submission.id, editor, '   ', env)).rejects.toThrow('A rejection reason is required');
      expect(getSubmission(submission.id, env)?.status).toBe('under_review');
    });

    it('leaves the submission under review when its document has been superseded', async () => {
      const chair = await createTestUser(env, 'chair');
      await publishDraft(env, author, editor);
      await publishDraft(env, author, editor, sampleDraft({ title: 'Replacement Policy' }));
      await supersedeDocument('ML-001', 'ML-002', chair, env);

      const revision = await submit(sampleDraft({ fileRef: 'remote-work-policy-v3.pdf' }), author, env);
      await beginReview(revision.id, editor, env);

      await expect(approve(revision.id, editor, env)).rejects.toThrow(StateError);
      expect(getSubmission(revision.id, env)?.status).toBe('under_review');
      expect(getDocument('ML-001', env)?.currentRevision).toBe(0);
      expect(peekCurrentNumber(env)).toBe(2);
    });
  });

  describe('withdrawSubmission', () => {
    it('lets the author withdraw before review', async () => {
      const submission = await submit(sampleDraft(), author, env);
      await withdrawSubmission(submission.id, author, env);

      expect(getSubmission(submission.id, env)).toBeNull();
      expect(getSubmissionHistory(submission.id, env).map(entry => entry.action)).toEqual(['status_change', 'withdrawn']);
    });

    it('refuses other users and submissions already under review', async () => {
      const submission = await submit(sampleDraft(), author, env);
      await expect(withdrawSubmission(submission.id, editor, env)).rejects.toThrow(PermissionError);

      await beginReview(submission.id, editor, env);
      await expect(withdrawSubmission(submission.id, author, env)).rejects.toThrow(StateError);
    });

    it('reports unknown submissions', async () => {
      await expect(withdrawSubmission('missing', author, env)).rejects.toThrow(NotFoundError);
    });
  });

  describe('listSubmissions', () => {
    it('shows members their own drafts and reviewers everything', async () => {
      const other = await createTestUser(env);
      const mine = await submit(sampleDraft(), author, env);
      env.clock.advance(1000);
      const theirs = await submit(sampleDraft({ title: 'Other Policy' }), other, env);
      await beginReview(theirs.id, editor, env);

      expect(listSubmissions(author, env).map(s => s.id)).toEqual([mine.id]);
      expect(listSubmissions(editor, env).map(s => s.id)).toEqual([mine.id, theirs.id]);
      expect(listSubmissions(editor, env, 'under_review').map(s => s.id)).toEqual([theirs.id]);
    });
  });
});
