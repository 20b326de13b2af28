import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from './migrate.js';
import * as schema from './schema.js';
import { createSqliteGateway } from './persistenceGateway.js';
import type { PersistenceGateway } from './persistenceGateway.js';
import { seedDemoData } from './seed.js';
import { effectiveHours, gatewayChildren } from '../services/aggregationEngine.js';

describe('Demo seed data', () => {
  let sqlite: Database.Database;
  let gateway: PersistenceGateway;

  beforeEach(() => {
    sqlite = new Database(':memory:');
    sqlite.pragma('foreign_keys = ON');
    runMigrations(sqlite);
    gateway = createSqliteGateway(drizzle(sqlite, { schema }));
  });

  afterEach(() => {
    sqlite.close();
  });

  it('seeds the renovation project into an empty database', () => {
    const inserted = seedDemoData(gateway);

    const [project] = gateway.findAllProjects();
    expect(inserted).toBe(10);
    expect(project.name).toBe('Renovation');
    expect(project.deadline).toBe('2025-12-17');
    expect(gateway.findByParentId('subproject', project.id).map((s) => s.name)).toEqual([
      'House A',
      'House B',
    ]);
  });

  it('reports exactly the number of rows it stored', () => {
    const inserted = seedDemoData(gateway);

    const stored = ['projects', 'subprojects', 'tasks', 'subtasks']
      .map((table) => sqlite.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number })
      .reduce((sum, row) => sum + row.count, 0);
    expect(inserted).toBe(stored);
  });

  it('rolls the seeded hours up to 20.5 on the project', () => {
    seedDemoData(gateway);
    const [project] = gateway.findAllProjects();

    // 6 + 2 (remove floor) + 8 (wiring) + 4.5 (facade)
    expect(effectiveHours(project, gatewayChildren(gateway))).toBe(20.5);
  });

  it('does nothing when a project already exists', () => {
    gateway.insert({ level: 'project', name: 'Existing', description: null, deadline: null });

    const inserted = seedDemoData(gateway);

    expect(inserted).toBe(0);
    expect(gateway.countProjects()).toBe(1);
  });
});
