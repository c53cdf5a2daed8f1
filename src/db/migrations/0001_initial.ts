import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Initial database schema with backups and deletion_log tables",
  up: `
CREATE TABLE backups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    backup_id TEXT UNIQUE NOT NULL,
    project_name TEXT NOT NULL,
    archive_name TEXT NOT NULL,
    archive_path TEXT NOT NULL,
    archive_size_bytes INTEGER NOT NULL,
    archive_checksum TEXT NOT NULL,
    containers_count INTEGER NOT NULL,
    is_compose INTEGER NOT NULL DEFAULT 0,
    created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    status TEXT DEFAULT 'active',
    deleted_at TEXT
);

CREATE INDEX idx_backups_project_created ON backups(project_name, created_at DESC);
CREATE INDEX idx_backups_status ON backups(status);
CREATE INDEX idx_backups_archive_path ON backups(archive_path);

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    backup_id TEXT,
    archive_path TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
