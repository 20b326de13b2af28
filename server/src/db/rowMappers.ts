import type { Project, SubProject, SubTask, Task } from '@estimator/shared';
import type { projects, subprojects, subtasks, tasks } from './schema.js';

type ProjectRow = typeof projects.$inferSelect;
type SubprojectRow = typeof subprojects.$inferSelect;
type TaskRow = typeof tasks.$inferSelect;
type SubtaskRow = typeof subtasks.$inferSelect;

/**
 * Thrown when a row handed to a mapper lacks a required column.
 * This is a storage fault, not an expected condition.
 */
export class RowMappingError extends Error {
  constructor(
    readonly table: string,
    readonly column: string,
  ) {
    super(`Row from ${table} is missing required column ${column}`);
    this.name = 'RowMappingError';
  }
}

function requireNumber(value: number | null | undefined, table: string, column: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RowMappingError(table, column);
  }
  return value;
}

function requireText(value: string | null | undefined, table: string, column: string): string {
  if (typeof value !== 'string') {
    throw new RowMappingError(table, column);
  }
  return value;
}

export function toProject(row: ProjectRow): Project {
  return {
    level: 'project',
    id: requireNumber(row.id, 'projects', 'id'),
    name: requireText(row.name, 'projects', 'name'),
    description: row.description ?? null,
    deadline: row.deadline ?? null,
  };
}

export function toSubProject(row: SubprojectRow): SubProject {
  return {
    level: 'subproject',
    id: requireNumber(row.id, 'subprojects', 'id'),
    parentId: requireNumber(row.projectId, 'subprojects', 'project_id'),
    name: requireText(row.name, 'subprojects', 'name'),
    description: row.description ?? null,
    deadline: row.deadline ?? null,
  };
}

export function toTask(row: TaskRow): Task {
  return {
    level: 'task',
    id: requireNumber(row.id, 'tasks', 'id'),
    parentId: requireNumber(row.subprojectId, 'tasks', 'subproject_id'),
    name: requireText(row.name, 'tasks', 'name'),
    description: row.description ?? null,
    deadline: row.deadline ?? null,
  };
}

export function toSubTask(row: SubtaskRow): SubTask {
  return {
    level: 'subtask',
    id: requireNumber(row.id, 'subtasks', 'id'),
    parentId: requireNumber(row.taskId, 'subtasks', 'task_id'),
    name: requireText(row.name, 'subtasks', 'name'),
    description: row.description ?? null,
    deadline: row.deadline ?? null,
    estimatedHours: requireNumber(row.estimatedHours, 'subtasks', 'estimated_hours'),
  };
}
