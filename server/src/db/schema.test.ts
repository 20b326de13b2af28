import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runMigrations } from './migrate.js';
import * as schema from './schema.js';

describe('Hierarchy Database Schema & Migration', () => {
  let sqlite: Database.Database;
  let db: BetterSQLite3Database<typeof schema>;

  /**
   * Creates a fresh in-memory database with migrations applied.
   * Foreign keys are enabled to test CASCADE delete behavior.
   */
  function createTestDb() {
    const sqliteDb = new Database(':memory:');
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('foreign_keys = ON'); // Required for CASCADE delete
    runMigrations(sqliteDb);
    return { sqlite: sqliteDb, db: drizzle(sqliteDb, { schema }) };
  }

  function columnsOf(table: string) {
    return sqlite.prepare(`PRAGMA table_info('${table}')`).all() as Array<{
      name: string;
      notnull: number;
      pk: number;
    }>;
  }

  function count(table: string): number {
    const row = sqlite.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get() as { n: number };
    return row.n;
  }

  const now = '2025-01-01T00:00:00.000Z';

  beforeEach(() => {
    const testDb = createTestDb();
    sqlite = testDb.sqlite;
    db = testDb.db;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe('Migration Structure', () => {
    it('creates the four hierarchy tables', () => {
      const tables = sqlite
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all() as Array<{ name: string }>;

      expect(tables.map((t) => t.name)).toEqual(
        expect.arrayContaining(['projects', 'subprojects', 'tasks', 'subtasks', '_migrations']),
      );
    });

    it('creates subtasks with a required estimated_hours column', () => {
      const columns = columnsOf('subtasks');
      const names = columns.map((col) => col.name);

      expect(names).toEqual([
        'id',
        'task_id',
        'name',
        'description',
        'deadline',
        'estimated_hours',
        'created_at',
        'updated_at',
      ]);
      expect(columns.find((col) => col.name === 'id')?.pk).toBe(1);
      expect(columns.find((col) => col.name === 'estimated_hours')?.notnull).toBe(1);
      expect(columns.find((col) => col.name === 'description')?.notnull).toBe(0);
    });

    it('gives projects no parent column', () => {
      const names = columnsOf('projects').map((col) => col.name);

      expect(names).toEqual(['id', 'name', 'description', 'deadline', 'created_at', 'updated_at']);
    });

    it('indexes every parent column', () => {
      const indexes = sqlite
        .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%'")
        .all() as Array<{ name: string }>;

      expect(indexes.map((i) => i.name).sort()).toEqual([
        'idx_subprojects_project_id',
        'idx_subtasks_task_id',
        'idx_tasks_subproject_id',
      ]);
    });

    it('is idempotent when run twice', () => {
      const applied = runMigrations(sqlite);

      expect(applied).toEqual([]);
    });

    it('applies files from a custom directory in name order', () => {
      const dir = mkdtempSync(join(tmpdir(), 'estimator-migrations-'));
      try {
        writeFileSync(join(dir, '0002_second.sql'), 'CREATE TABLE second_table (id INTEGER);');
        writeFileSync(join(dir, '0001_first.sql'), 'CREATE TABLE first_table (id INTEGER);');
        writeFileSync(join(dir, 'notes.txt'), 'not a migration');
        const fresh = new Database(':memory:');

        const applied = runMigrations(fresh, dir);
        fresh.close();

        expect(applied).toEqual(['0001_first.sql', '0002_second.sql']);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('returns no migrations when the directory does not exist', () => {
      const fresh = new Database(':memory:');
      const applied = runMigrations(fresh, join(tmpdir(), 'estimator-does-not-exist'));
      fresh.close();

      expect(applied).toEqual([]);
    });
  });

  describe('Constraints', () => {
    it('rejects a subtask with zero hours', () => {
      const projectId = db
        .insert(schema.projects)
        .values({ name: 'P', createdAt: now, updatedAt: now })
        .returning({ id: schema.projects.id })
        .get().id;
      const subprojectId = db
        .insert(schema.subprojects)
        .values({ projectId, name: 'S', createdAt: now, updatedAt: now })
        .returning({ id: schema.subprojects.id })
        .get().id;
      const taskId = db
        .insert(schema.tasks)
        .values({ subprojectId, name: 'T', createdAt: now, updatedAt: now })
        .returning({ id: schema.tasks.id })
        .get().id;

      expect(() =>
        db
          .insert(schema.subtasks)
          .values({ taskId, name: 'ST', estimatedHours: 0, createdAt: now, updatedAt: now })
          .run(),
      ).toThrow(/CHECK constraint failed/);
    });

    it('rejects a child whose parent does not exist', () => {
      expect(() =>
        db
          .insert(schema.subprojects)
          .values({ projectId: 999, name: 'Orphan', createdAt: now, updatedAt: now })
          .run(),
      ).toThrow(/FOREIGN KEY constraint failed/);
    });

    it('rejects a name longer than 50 characters', () => {
      expect(() =>
        db
          .insert(schema.projects)
          .values({ name: 'x'.repeat(51), createdAt: now, updatedAt: now })
          .run(),
      ).toThrow(/CHECK constraint failed/);
    });

    it('cascades a project delete to every descendant', () => {
      const projectId = db
        .insert(schema.projects)
        .values({ name: 'P', createdAt: now, updatedAt: now })
        .returning({ id: schema.projects.id })
        .get().id;
      const subprojectId = db
        .insert(schema.subprojects)
        .values({ projectId, name: 'S', createdAt: now, updatedAt: now })
        .returning({ id: schema.subprojects.id })
        .get().id;
      const taskId = db
        .insert(schema.tasks)
        .values({ subprojectId, name: 'T', createdAt: now, updatedAt: now })
        .returning({ id: schema.tasks.id })
        .get().id;
      db.insert(schema.subtasks)
        .values({ taskId, name: 'ST', estimatedHours: 1.5, createdAt: now, updatedAt: now })
        .run();

      sqlite.prepare('DELETE FROM projects WHERE id = ?').run(projectId);

      expect(count('subprojects')).toBe(0);
      expect(count('tasks')).toBe(0);
      expect(count('subtasks')).toBe(0);
    });
  });
});
