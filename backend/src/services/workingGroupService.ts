import type Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { User, WorkingGroup, WorkingGroupInput, WorkingGroupState, WORKING_GROUP_STATES } from '../types';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';
import { logger } from '../utils/logger';
import { runSerializable } from '../utils/transaction';
import { NotFoundError, StateError, ValidationError } from '../errors';
import { appendAudit } from './auditService';
import { authorize } from './roleService';

const ACRONYM_PATTERN = /^[a-z][a-z0-9-]{1,19}$/;
const MAX_NAME_LENGTH = 100;

interface WorkingGroupRow {
  acronym: string;
  name: string;
  chairs: string;
  state: WorkingGroupState;
  created_at: string;
  updated_at: string;
}

const parseChairs = (raw: string): string[] => {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((chair): chair is string => typeof chair === 'string') : [];
};

const toWorkingGroup = (row: WorkingGroupRow): WorkingGroup => ({
  acronym: row.acronym,
  name: row.name,
  chairs: parseChairs(row.chairs),
  state: row.state,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export const isWorkingGroupState = (value: unknown): value is WorkingGroupState =>
  typeof value === 'string' && WORKING_GROUP_STATES.some(state => state === value);

export const normalizeAcronym = (acronym: string): string => acronym.trim().toLowerCase();

interface ValidGroup {
  acronym: string;
  name: string;
  chairs: string[];
}

function validateGroup(input: WorkingGroupInput): ValidGroup {
  const acronym = normalizeAcronym(input.acronym ?? '');
  const name = input.name?.trim() ?? '';
  const rawChairs = typeof input.chairs === 'string' ? input.chairs.split(',') : input.chairs ?? [];
  const chairs = rawChairs.map(chair => chair.trim()).filter(chair => chair.length > 0);

  if (!ACRONYM_PATTERN.test(acronym)) {
    throw new ValidationError(`Invalid working group acronym: ${acronym || '(empty)'}`);
  }
  if (!name) {
    throw new ValidationError('Working group name is required');
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`Working group name must be ${MAX_NAME_LENGTH} characters or less`);
  }
  return { acronym, name, chairs };
}

export function getWorkingGroup(acronym: string, env: Env): WorkingGroup | null {
  const row = env.DB.prepare<[string], WorkingGroupRow>('SELECT * FROM working_groups WHERE acronym = ?')
    .get(normalizeAcronym(acronym));
  return row ? toWorkingGroup(row) : null;
}

export function requireWorkingGroup(acronym: string, env: Env): WorkingGroup {
  const group = getWorkingGroup(acronym, env);
  if (!group) {
    throw new NotFoundError(`Working group ${acronym} not found`);
  }
  return group;
}

export function listWorkingGroups(env: Env, state?: WorkingGroupState): WorkingGroup[] {
  const rows = state
    ? env.DB.prepare<[string], WorkingGroupRow>('SELECT * FROM working_groups WHERE state = ? ORDER BY acronym ASC')
        .all(state)
    : env.DB.prepare<[], WorkingGroupRow>('SELECT * FROM working_groups ORDER BY acronym ASC').all();
  return rows.map(toWorkingGroup);
}

/**
 * Resolves the group a draft names. Unknown names are a validation error so
 * that a misspelling never opens a new document under a phantom group.
 */
export function resolveSubmissionGroup(name: string, env: Env): WorkingGroup {
  const group = getWorkingGroup(name, env);
  if (!group) {
    throw new ValidationError(`Unknown working group: ${name}`);
  }
  if (group.state !== 'active') {
    throw new StateError(`Working group ${group.acronym} has concluded and accepts no new submissions`);
  }
  return group;
}

export async function createWorkingGroup(actor: User, input: WorkingGroupInput, env: Env): Promise<WorkingGroup> {
  authorize(actor, 'group:manage');
  const group = validateGroup(input);

  const created = await runSerializable(env, () => {
    if (getWorkingGroup(group.acronym, env)) {
      throw new ValidationError(`Working group ${group.acronym} already exists`);
    }
    const now = nowIso(env.clock);
    env.DB.prepare(
      `INSERT INTO working_groups (acronym, name, chairs, state, created_at, updated_at)
       VALUES (?, ?, ?, 'active', ?, ?)`
    ).run(group.acronym, group.name, JSON.stringify(group.chairs), now, now);
    appendAudit({
      entityType: 'working_group',
      entityId: group.acronym,
      action: 'chartered',
      toStatus: 'active',
      actorId: actor.id,
      details: group.name,
    }, env);
    return requireWorkingGroup(group.acronym, env);
  }, { label: `charter ${group.acronym}` });

  logger.info(`Working group ${created.acronym} chartered by ${actor.id}`);
  return created;
}

export async function concludeWorkingGroup(actor: User, acronym: string, env: Env): Promise<WorkingGroup> {
  authorize(actor, 'group:manage');

  return runSerializable(env, () => {
    const group = requireWorkingGroup(acronym, env);
    if (group.state === 'concluded') {
      throw new StateError(`Working group ${group.acronym} has already concluded`);
    }
    env.DB.prepare("UPDATE working_groups SET state = 'concluded', updated_at = ? WHERE acronym = ?")
      .run(nowIso(env.clock), group.acronym);
    appendAudit({
      entityType: 'working_group',
      entityId: group.acronym,
      action: 'concluded',
      fromStatus: 'active',
      toStatus: 'concluded',
      actorId: actor.id,
    }, env);
    return requireWorkingGroup(group.acronym, env);
  }, { label: `conclude ${acronym}` });
}

// Reads a JSON array of { acronym, name, chairs } records
export function loadWorkingGroupFile(path: string): WorkingGroupInput[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Working group file ${path} must contain a JSON array`);
  }
  return parsed.map((entry: unknown, index): WorkingGroupInput => {
    if (!entry || typeof entry !== 'object') {
      throw new Error(`Working group file ${path}: entry ${index} is not an object`);
    }
    const record = Object.fromEntries(Object.entries(entry));
    const { acronym, name, chairs } = record;
    return {
      acronym: typeof acronym === 'string' ? acronym : undefined,
      name: typeof name === 'string' ? name : undefined,
      chairs: Array.isArray(chairs) ? chairs.filter((chair): chair is string => typeof chair === 'string') : undefined,
    };
  });
}

/**
 * Registers groups that do not exist yet; runs once at startup on a freshly
 * opened database, alongside the schema setup.
 */
export function seedWorkingGroups(db: Database.Database, groups: WorkingGroupInput[], now: string): number {
  const insert = db.prepare(
    `INSERT OR IGNORE INTO working_groups (acronym, name, chairs, state, created_at, updated_at)
     VALUES (?, ?, ?, 'active', ?, ?)`
  );
  const added = db.transaction((entries: ValidGroup[]) =>
    entries.reduce((count, group) => count + insert.run(group.acronym, group.name, JSON.stringify(group.chairs), now, now).changes, 0)
  ).immediate(groups.map(validateGroup));

  if (added > 0) {
    logger.info(`[Database] Registered ${added} working group(s)`);
  }
  return added;
}
