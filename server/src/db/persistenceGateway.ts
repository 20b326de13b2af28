import { and, asc, eq, sql } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type {
  ChildLevel,
  HierarchyLevel,
  NodeDraft,
  Project,
  TreeNode,
} from '@estimator/shared';
import type * as schemaTypes from './schema.js';
import { projects, subprojects, subtasks, tasks } from './schema.js';
import { toProject, toSubProject, toSubTask, toTask } from './rowMappers.js';

type DbType = BetterSQLite3Database<typeof schemaTypes>;

/**
 * Storage boundary of the hierarchy core. Every call is a single statement;
 * deletes rely on ON DELETE CASCADE to remove descendants.
 */
export interface PersistenceGateway {
  findById(level: HierarchyLevel, id: number): TreeNode | undefined;
  /** Children of a parent, ordered by id ascending. */
  findByParentId(level: ChildLevel, parentId: number): TreeNode[];
  findAllProjects(): Project[];
  /** @returns the id assigned by storage */
  insert(draft: NodeDraft): number;
  /** Updates fields of an existing node, keeping its id and parent. @returns affected rows */
  update(node: TreeNode): number;
  /** @returns affected rows (0 when the node did not exist) */
  deleteById(level: HierarchyLevel, id: number): number;
  existsById(level: HierarchyLevel, id: number): boolean;
  countProjects(): number;
}

/**
 * Create a gateway backed by a Drizzle/better-sqlite3 connection.
 */
export function createSqliteGateway(db: DbType): PersistenceGateway {
  function findById(level: HierarchyLevel, id: number): TreeNode | undefined {
    switch (level) {
      case 'project': {
        const row = db.select().from(projects).where(eq(projects.id, id)).get();
        return row && toProject(row);
      }
      case 'subproject': {
        const row = db.select().from(subprojects).where(eq(subprojects.id, id)).get();
        return row && toSubProject(row);
      }
      case 'task': {
        const row = db.select().from(tasks).where(eq(tasks.id, id)).get();
        return row && toTask(row);
      }
      case 'subtask': {
        const row = db.select().from(subtasks).where(eq(subtasks.id, id)).get();
        return row && toSubTask(row);
      }
    }
  }

  function findByParentId(level: ChildLevel, parentId: number): TreeNode[] {
    switch (level) {
      case 'subproject':
        return db
          .select()
          .from(subprojects)
          .where(eq(subprojects.projectId, parentId))
          .orderBy(asc(subprojects.id))
          .all()
          .map(toSubProject);
      case 'task':
        return db
          .select()
          .from(tasks)
          .where(eq(tasks.subprojectId, parentId))
          .orderBy(asc(tasks.id))
          .all()
          .map(toTask);
      case 'subtask':
        return db
          .select()
          .from(subtasks)
          .where(eq(subtasks.taskId, parentId))
          .orderBy(asc(subtasks.id))
          .all()
          .map(toSubTask);
    }
  }

  function findAllProjects(): Project[] {
    return db.select().from(projects).orderBy(asc(projects.id)).all().map(toProject);
  }

  function insert(draft: NodeDraft): number {
    const now = new Date().toISOString();
    const common = {
      name: draft.name,
      description: draft.description,
      deadline: draft.deadline,
      createdAt: now,
      updatedAt: now,
    };

    switch (draft.level) {
      case 'project':
        return db.insert(projects).values(common).returning({ id: projects.id }).get().id;
      case 'subproject':
        return db
          .insert(subprojects)
          .values({ ...common, projectId: draft.parentId })
          .returning({ id: subprojects.id })
          .get().id;
      case 'task':
        return db
          .insert(tasks)
          .values({ ...common, subprojectId: draft.parentId })
          .returning({ id: tasks.id })
          .get().id;
      case 'subtask':
        return db
          .insert(subtasks)
          .values({ ...common, taskId: draft.parentId, estimatedHours: draft.estimatedHours })
          .returning({ id: subtasks.id })
          .get().id;
    }
  }

  function update(node: TreeNode): number {
    const fields = {
      name: node.name,
      description: node.description,
      deadline: node.deadline,
      updatedAt: new Date().toISOString(),
    };

    switch (node.level) {
      case 'project':
        return db.update(projects).set(fields).where(eq(projects.id, node.id)).run().changes;
      case 'subproject':
        return db
          .update(subprojects)
          .set(fields)
          .where(and(eq(subprojects.id, node.id), eq(subprojects.projectId, node.parentId)))
          .run().changes;
      case 'task':
        return db
          .update(tasks)
          .set(fields)
          .where(and(eq(tasks.id, node.id), eq(tasks.subprojectId, node.parentId)))
          .run().changes;
      case 'subtask':
        return db
          .update(subtasks)
          .set({ ...fields, estimatedHours: node.estimatedHours })
          .where(and(eq(subtasks.id, node.id), eq(subtasks.taskId, node.parentId)))
          .run().changes;
    }
  }

  function deleteById(level: HierarchyLevel, id: number): number {
    switch (level) {
      case 'project':
        return db.delete(projects).where(eq(projects.id, id)).run().changes;
      case 'subproject':
        return db.delete(subprojects).where(eq(subprojects.id, id)).run().changes;
      case 'task':
        return db.delete(tasks).where(eq(tasks.id, id)).run().changes;
      case 'subtask':
        return db.delete(subtasks).where(eq(subtasks.id, id)).run().changes;
    }
  }

  function existsById(level: HierarchyLevel, id: number): boolean {
    return findById(level, id) !== undefined;
  }

  function countProjects(): number {
    const result = db
      .select({ count: sql<number>`COUNT(*)` })
      .from(projects)
      .get();
    return result?.count ?? 0;
  }

  return {
    findById,
    findByParentId,
    findAllProjects,
    insert,
    update,
    deleteById,
    existsById,
    countProjects,
  };
}
