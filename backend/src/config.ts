// ============================================================================
// BACKEND CONFIGURATION
// Environment variable overrides with local development defaults
// ============================================================================

import { openDatabase } from './utils/database';
import { Clock, nowIso, systemClock } from './utils/clock';
import { Env } from './utils/sessionManager';
import { loadWorkingGroupFile, seedWorkingGroups } from './services/workingGroupService';

export interface AppConfig {
  port: number;
  databasePath: string;
  documentPrefix: string;
  publicUrl: string;
  adminEmail?: string;
  sesKey?: string;
  sesSecret?: string;
  sesRegion: string;
  emailFrom: string;
  allowedOrigins: string[];
  workingGroupsFile?: string;
}

type EnvSource = Record<string, string | undefined>;

const PREFIX_PATTERN = /^[A-Z][A-Z0-9]*$/;

const optional = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 8787;
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function readConfig(source: EnvSource = process.env): AppConfig {
  const documentPrefix = optional(source.DOCUMENT_PREFIX) ?? 'ML';
  if (!PREFIX_PATTERN.test(documentPrefix)) {
    throw new Error(`Invalid DOCUMENT_PREFIX: ${documentPrefix} (expected upper-case letters and digits)`);
  }

  return {
    port: parsePort(source.PORT),
    databasePath: optional(source.DATABASE_PATH) ?? 'data/docket.db',
    documentPrefix,
    publicUrl: (optional(source.PUBLIC_URL) ?? 'http://localhost:3000').replace(/\/+$/, ''),
    adminEmail: optional(source.ADMIN_EMAIL),
    sesKey: optional(source.SES_KEY),
    sesSecret: optional(source.SES_SECRET),
    sesRegion: optional(source.SES_REGION) ?? 'us-east-1',
    emailFrom: optional(source.EMAIL_FROM) ?? 'Policy Docket <noreply@localhost>',
    allowedOrigins: (optional(source.ALLOWED_ORIGINS) ?? 'http://localhost:3000')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    workingGroupsFile: optional(source.WORKING_GROUPS_FILE),
  };
}

export function createEnv(config: AppConfig, clock: Clock = systemClock): Env {
  const db = openDatabase(config.databasePath);
  if (config.workingGroupsFile) {
    seedWorkingGroups(db, loadWorkingGroupFile(config.workingGroupsFile), nowIso(clock));
  }

  return {
    DB: db,
    clock,
    DOCUMENT_PREFIX: config.documentPrefix,
    PUBLIC_URL: config.publicUrl,
    SESKey: config.sesKey,
    SESSecret: config.sesSecret,
    SES_REGION: config.sesRegion,
    EMAIL_FROM: config.emailFrom,
  };
}
