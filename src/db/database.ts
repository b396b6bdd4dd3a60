import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DatabaseError } from '../types/errors';

/**
 * Names of the snapshot documents, one per owning component
 */
export type SnapshotName =
  | 'session_history'
  | 'interruption_history'
  | 'environment'
  | 'productivity_trend'
  | 'report_templates';

/**
 * Storage contract the engine components persist through
 */
export interface SnapshotStore {
  readSnapshot<T>(name: SnapshotName): T | null;
  writeSnapshot(name: SnapshotName, document: unknown): void;
}

interface SnapshotRow {
  name: string;
  document: string;
  updated_at: string;
}

/**
 * SQLite-backed snapshot store
 */
export class AnalyticsDB implements SnapshotStore {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.initialize();
    } catch (error) {
      throw new DatabaseError(`Failed to open database: ${error}`);
    }
  }

  /**
   * Initialize database schema
   */
  private initialize(): void {
    try {
      const schemaPath = join(__dirname, 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
    } catch (error) {
      throw new DatabaseError(`Failed to initialize schema: ${error}`);
    }
  }

  /**
   * Read and parse a snapshot document, or null if it was never written
   */
  readSnapshot<T>(name: SnapshotName): T | null {
    let row: SnapshotRow | undefined;
    try {
      row = this.db
        .prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE name = ?')
        .get(name);
    } catch (error) {
      throw new DatabaseError(`Failed to read snapshot ${name}: ${error}`);
    }

    if (!row) {
      return null;
    }

    try {
      return JSON.parse(row.document);
    } catch (error) {
      throw new DatabaseError(`Snapshot ${name} is corrupt: ${error}`);
    }
  }

  /**
   * Replace a snapshot document in full
   */
  writeSnapshot(name: SnapshotName, document: unknown): void {
    try {
      const stmt = this.db.prepare<[string, string]>(`
        INSERT INTO snapshots (name, document, updated_at)
        VALUES (?, ?, CURRENT_TIMESTAMP)
        ON CONFLICT(name) DO UPDATE SET
          document = excluded.document,
          updated_at = excluded.updated_at
      `);

      stmt.run(name, JSON.stringify(document));
    } catch (error) {
      throw new DatabaseError(`Failed to write snapshot ${name}: ${error}`);
    }
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
