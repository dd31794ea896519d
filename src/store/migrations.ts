import type Database from 'better-sqlite3';

export function dropTables(db: Database.Database): void {
  db.exec(`
    DROP TABLE IF EXISTS pods;
    DROP TABLE IF EXISTS nodes;
    DROP TABLE IF EXISTS settings;
  `);
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS nodes (
      id TEXT PRIMARY KEY,
      total_cpu INTEGER NOT NULL CHECK (total_cpu >= 0),
      available_cpu INTEGER NOT NULL CHECK (available_cpu >= 0),
      last_heartbeat INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'healthy'
        CHECK (status IN ('healthy', 'unhealthy'))
    );

    CREATE TABLE IF NOT EXISTS pods (
      id TEXT PRIMARY KEY,
      cpu_request INTEGER NOT NULL,
      assigned_node TEXT REFERENCES nodes(id),
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'running'))
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_pods_assigned ON pods(assigned_node);
  `);
}
