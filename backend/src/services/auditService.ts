import { AuditEntityType, AuditRecord } from '../types';
import { Env } from '../utils/sessionManager';
import { nowIso } from '../utils/clock';

interface AuditRow {
  id: number;
  entity_type: AuditEntityType;
  entity_id: string;
  action: string;
  from_status: string | null;
  to_status: string | null;
  actor_id: string;
  details: string | null;
  created_at: string;
}

export interface AuditEntry {
  entityType: AuditEntityType;
  entityId: string;
  action: string;
  fromStatus?: string;
  toStatus?: string;
  actorId: string;
  details?: string;
}

const toAuditRecord = (row: AuditRow): AuditRecord => ({
  id: row.id,
  entityType: row.entity_type,
  entityId: row.entity_id,
  action: row.action,
  fromStatus: row.from_status ?? undefined,
  toStatus: row.to_status ?? undefined,
  actorId: row.actor_id,
  details: row.details ?? undefined,
  createdAt: row.created_at,
});

// Audit records are only ever inserted; the table rejects updates and deletes
export function appendAudit(entry: AuditEntry, env: Env): void {
  env.DB.prepare(
    `INSERT INTO audit_log (entity_type, entity_id, action, from_status, to_status, actor_id, details, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    entry.entityType,
    entry.entityId,
    entry.action,
    entry.fromStatus ?? null,
    entry.toStatus ?? null,
    entry.actorId,
    entry.details ?? null,
    nowIso(env.clock)
  );
}

export function getAuditTrail(entityType: AuditEntityType, entityId: string, env: Env): AuditRecord[] {
  return env.DB.prepare<[string, string], AuditRow>(
    'SELECT * FROM audit_log WHERE entity_type = ? AND entity_id = ? ORDER BY id ASC'
  )
    .all(entityType, entityId)
    .map(toAuditRecord);
}
