import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from './clock';
import { runSerializable } from './transaction';

export interface Env {
    DB: Database.Database;
    clock: Clock;
    DOCUMENT_PREFIX: string;
    PUBLIC_URL: string;
    SESKey?: string;
    SESSecret?: string;
    SES_REGION: string;
    EMAIL_FROM: string;
}

export interface SessionRecord {
    userId: string;
    data: Record<string, unknown>;
    expiresAt: number;
}

interface SessionRow {
    user_id: string;
    data: string;
    expires_at: number;
}

export async function CreateSession(
        userId: string,
        data: Record<string, unknown>,
        env: Env,
        ttl: number = 864000 // Default TTL of 10 days in seconds
    ): Promise<string> {
    const sessionId = uuidv4();
    const expiresAt = env.clock.now().getTime() + ttl * 1000;

    await runSerializable(env, () => {
        env.DB.prepare('INSERT INTO sessions (id, user_id, data, expires_at) VALUES (?, ?, ?, ?)')
            .run(sessionId, userId, JSON.stringify(data), expiresAt);
    }, { label: 'create session' });

    return sessionId;
}

export async function GetSession(sessionId: string, env: Env): Promise<SessionRecord | null> {
    const row = env.DB.prepare<[string], SessionRow>('SELECT user_id, data, expires_at FROM sessions WHERE id = ?')
        .get(sessionId);
    if (!row) return null;

    if (row.expires_at < env.clock.now().getTime()) {
        await DeleteSession(sessionId, env); // Delete expired session
        return null;
    }

    return {
        userId: row.user_id,
        data: parseSessionData(row.data),
        expiresAt: row.expires_at,
    };
}

export async function DeleteSession(sessionId: string, env: Env): Promise<void> {
    await runSerializable(env, () => {
        env.DB.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
    }, { label: 'delete session' });
}

// Pulls the session id out of an `Authorization: Bearer <id>` header
export function sessionIdFrom(request: Request): string | undefined {
    const header = request.headers.get('Authorization');
    if (!header) return undefined;
    const sessionId = header.replace(/^Bearer\s+/i, '').trim();
    return sessionId || undefined;
}

function parseSessionData(raw: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
    }
    return {};
}
