import type { BranchLevel, ChildLevel, HierarchyLevel } from '@estimator/shared';

/** Levels from root to leaf. */
export const HIERARCHY_LEVELS: readonly HierarchyLevel[] = ['project', 'subproject', 'task', 'subtask'];

export const PARENT_LEVEL = {
  subproject: 'project',
  task: 'subproject',
  subtask: 'task',
} as const satisfies Record<ChildLevel, BranchLevel>;

export const CHILD_LEVEL = {
  project: 'subproject',
  subproject: 'task',
  task: 'subtask',
} as const satisfies Record<BranchLevel, ChildLevel>;

/** Human-readable level names for messages. */
export const LEVEL_LABELS: Record<HierarchyLevel, string> = {
  project: 'Project',
  subproject: 'Subproject',
  task: 'Task',
  subtask: 'Subtask',
};
