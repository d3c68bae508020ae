import type Database from 'better-sqlite3';
import { logger } from '../utils/logger';

export function createGovernanceTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      email TEXT UNIQUE COLLATE NOCASE,
      name TEXT,
      oauth_name TEXT,
      wallet_address TEXT,
      login_type TEXT NOT NULL CHECK(login_type IN ('email', 'oauth', 'wallet')),
      role TEXT NOT NULL CHECK(role IN ('member', 'editor', 'admin', 'chair')),
      active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      display_name_set_at TEXT
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      data TEXT NOT NULL,
      expires_at INTEGER NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users(id)
    )
  `);

  // Single counter row; the only source of document numbers
  db.exec(`
    CREATE TABLE IF NOT EXISTS document_counter (
      id INTEGER PRIMARY KEY CHECK(id = 1),
      value INTEGER NOT NULL
    );
    INSERT OR IGNORE INTO document_counter (id, value) VALUES (1, 0);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS working_groups (
      acronym TEXT PRIMARY KEY COLLATE NOCASE,
      name TEXT NOT NULL,
      chairs TEXT NOT NULL,
      state TEXT NOT NULL CHECK(state IN ('active', 'concluded')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS submissions (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      authors TEXT NOT NULL,
      working_group TEXT NOT NULL,
      file_ref TEXT NOT NULL,
      abstract TEXT,
      draft_name TEXT NOT NULL,
      status TEXT NOT NULL CHECK(status IN ('submitted', 'under_review', 'approved', 'rejected')),
      submitted_by TEXT NOT NULL,
      submitted_at TEXT NOT NULL,
      resubmission_of TEXT,
      document_identifier TEXT,
      revision_number INTEGER,
      reviewed_by TEXT,
      rejection_reason TEXT,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (submitted_by) REFERENCES users(id)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS published_documents (
      identifier TEXT PRIMARY KEY,
      number INTEGER NOT NULL UNIQUE,
      document_key TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      working_group TEXT NOT NULL,
      status TEXT NOT NULL CHECK(status IN ('published', 'superseded')),
      current_revision INTEGER NOT NULL DEFAULT 0,
      superseded_by TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS document_revisions (
      document_identifier TEXT NOT NULL,
      revision INTEGER NOT NULL,
      submission_id TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      authors TEXT NOT NULL,
      file_ref TEXT NOT NULL,
      abstract TEXT,
      created_by TEXT NOT NULL,
      created_at TEXT NOT NULL,
      PRIMARY KEY (document_identifier, revision),
      FOREIGN KEY (document_identifier) REFERENCES published_documents(identifier)
    );
    CREATE TRIGGER IF NOT EXISTS document_revisions_no_update
      BEFORE UPDATE ON document_revisions
      BEGIN SELECT RAISE(ABORT, 'document revisions are append-only'); END;
    CREATE TRIGGER IF NOT EXISTS document_revisions_no_delete
      BEFORE DELETE ON document_revisions
      BEGIN SELECT RAISE(ABORT, 'document revisions are append-only'); END;
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS comments (
      id TEXT PRIMARY KEY,
      document_identifier TEXT NOT NULL,
      parent_id TEXT,
      author_id TEXT NOT NULL,
      body TEXT NOT NULL,
      original_text TEXT,
      created_at TEXT NOT NULL,
      edited_at TEXT,
      is_deleted INTEGER NOT NULL DEFAULT 0,
      deleted_at TEXT,
      FOREIGN KEY (document_identifier) REFERENCES published_documents(identifier),
      FOREIGN KEY (parent_id) REFERENCES comments(id),
      FOREIGN KEY (author_id) REFERENCES users(id)
    );
    CREATE INDEX IF NOT EXISTS idx_comments_document ON comments(document_identifier, created_at);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS comment_likes (
      comment_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      created_at TEXT NOT NULL,
      PRIMARY KEY (comment_id, user_id),
      FOREIGN KEY (comment_id) REFERENCES comments(id),
      FOREIGN KEY (user_id) REFERENCES users(id)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS follows (
      user_id TEXT NOT NULL,
      document_identifier TEXT NOT NULL,
      level TEXT NOT NULL CHECK(level IN ('all', 'significant', 'major', 'comments', 'none')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (user_id, document_identifier),
      FOREIGN KEY (user_id) REFERENCES users(id),
      FOREIGN KEY (document_identifier) REFERENCES published_documents(identifier)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entity_type TEXT NOT NULL CHECK(entity_type IN ('submission', 'document', 'comment', 'user', 'working_group')),
      entity_id TEXT NOT NULL,
      action TEXT NOT NULL,
      from_status TEXT,
      to_status TEXT,
      actor_id TEXT NOT NULL,
      details TEXT,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_audit_entity ON audit_log(entity_type, entity_id, created_at);
    CREATE TRIGGER IF NOT EXISTS audit_log_no_update
      BEFORE UPDATE ON audit_log
      BEGIN SELECT RAISE(ABORT, 'audit log is append-only'); END;
    CREATE TRIGGER IF NOT EXISTS audit_log_no_delete
      BEFORE DELETE ON audit_log
      BEGIN SELECT RAISE(ABORT, 'audit log is append-only'); END;
  `);
}

export function initializeGovernanceTables(db: Database.Database): void {
  try {
    logger.debug('Creating governance tables...');
    createGovernanceTables(db);
    logger.debug('Governance tables created successfully');
  } catch (error) {
    logger.error('Error creating governance tables:', error);
    throw error;
  }
}
