/**
 * Drizzle ORM schema definitions.
 *
 * Mirrors the SQL migrations in ./migrations. The four tables form a strict
 * tree; every foreign key cascades on delete.
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

/**
 * Projects table - roots of the estimation hierarchy.
 */
export const projects = sqliteTable('projects', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  deadline: text('deadline'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});

/**
 * Subprojects table - phases or sites of a project.
 */
export const subprojects = sqliteTable(
  'subprojects',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    deadline: text('deadline'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    projectIdIdx: index('idx_subprojects_project_id').on(table.projectId),
  }),
);

/**
 * Tasks table - units of work inside a subproject.
 */
export const tasks = sqliteTable(
  'tasks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    subprojectId: integer('subproject_id')
      .notNull()
      .references(() => subprojects.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    deadline: text('deadline'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    subprojectIdIdx: index('idx_tasks_subproject_id').on(table.subprojectId),
  }),
);

/**
 * Subtasks table - leaves of the hierarchy, the only rows carrying hours.
 * estimated_hours has a CHECK (estimated_hours > 0) in the migration.
 */
export const subtasks = sqliteTable(
  'subtasks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    taskId: integer('task_id')
      .notNull()
      .references(() => tasks.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    deadline: text('deadline'),
    estimatedHours: real('estimated_hours').notNull(),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    taskIdIdx: index('idx_subtasks_task_id').on(table.taskId),
  }),
);
