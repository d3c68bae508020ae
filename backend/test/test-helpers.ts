import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Env } from '../src/utils/sessionManager';
import { Clock } from '../src/utils/clock';
import { IN_MEMORY, openDatabase } from '../src/utils/database';
import { registerUser } from '../src/services/userService';
import { seedWorkingGroups } from '../src/services/workingGroupService';
import { approve, beginReview, submit, ApprovalResult } from '../src/services/submissionService';
import { DraftInput, User, UserRole, WorkingGroupInput } from '../src/types';

export const START_TIME = '2025-03-01T09:00:00.000Z';

// Clock that only moves when a test moves it
export class ManualClock implements Clock {
  private current: number;

  constructor(start: string = START_TIME) {
    this.current = Date.parse(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestEnv extends Env {
  clock: ManualClock;
}

export const TEST_WORKING_GROUPS: WorkingGroupInput[] = [
  { acronym: 'ops', name: 'Operations', chairs: ['Dana Reyes'] },
  { acronym: 'fin', name: 'Finance', chairs: ['Lee Park', 'Sam Ortiz'] },
];

export const mockEnv = (
  overrides: Partial<Omit<Env, 'DB' | 'clock'>> = {},
  databasePath: string = IN_MEMORY
): TestEnv => {
  const DB = openDatabase(databasePath);
  seedWorkingGroups(DB, TEST_WORKING_GROUPS, START_TIME);
  return {
    DB,
    clock: new ManualClock(),
    DOCUMENT_PREFIX: 'ML',
    PUBLIC_URL: 'http://localhost:3000',
    SES_REGION: 'us-east-1',
    EMAIL_FROM: 'Policy Docket <noreply@localhost>',
    ...overrides,
  };
};

export interface SharedDatabase {
  envs: TestEnv[];
  close(): void;
}

// Several connections on one temporary database file, for lock contention tests
export const sharedFileEnvs = (count: number): SharedDatabase => {
  const dir = mkdtempSync(join(tmpdir(), 'docket-test-'));
  const file = join(dir, 'docket.db');
  const envs = Array.from({ length: count }, () => mockEnv({}, file));
  return {
    envs,
    close: () => {
      envs.forEach(env => env.DB.close());
      rmSync(dir, { recursive: true, force: true });
    },
  };
};

// Takes the write lock on `env` the way a competing process would
export const holdWriteLock = (env: Env): { release(): void } => {
  env.DB.exec('BEGIN IMMEDIATE');
  return { release: () => env.DB.exec('COMMIT') };
};

// Mutes the logger for the duration of a test; jest.restoreAllMocks undoes it
export const silenceConsole = (): void => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'info').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
};

let userCounter = 0;

export const createTestUser = (env: Env, role: UserRole = 'member', name?: string): Promise<User> => {
  userCounter++;
  return registerUser({
    email: `${role}${userCounter}@example.com`,
    name: name ?? `Test ${role} ${userCounter}`,
    role,
  }, env);
};

export const sampleDraft = (overrides: Partial<DraftInput> = {}): DraftInput => ({
  title: 'Remote Work Policy',
  authors: ['Jane Smith'],
  workingGroup: 'ops',
  fileRef: 'remote-work-policy.pdf',
  abstract: 'Who may work remotely and how equipment is issued.',
  ...overrides,
});

// Runs a draft through submit, review and approval
export const publishDraft = async (
  env: Env,
  author: User,
  reviewer: User,
  draft: DraftInput = sampleDraft()
): Promise<ApprovalResult> => {
  const submission = await submit(draft, author, env);
  await beginReview(submission.id, reviewer, env);
  return approve(submission.id, reviewer, env);
};
