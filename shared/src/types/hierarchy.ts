/**
 * Estimation hierarchy types.
 * Project → SubProject → Task → SubTask; only subtasks carry their own hours,
 * every other level reports the roll-up of its descendants.
 */

/**
 * Level tag of a node in the hierarchy, root first.
 */
export type HierarchyLevel = 'project' | 'subproject' | 'task' | 'subtask';

/**
 * Levels that have a parent.
 */
export type ChildLevel = Exclude<HierarchyLevel, 'project'>;

/**
 * Levels that can have children.
 */
export type BranchLevel = Exclude<HierarchyLevel, 'subtask'>;

/**
 * Fields shared by every level.
 */
export interface NodeFields {
  name: string;
  description: string | null;
  /** Calendar date, YYYY-MM-DD */
  deadline: string | null;
}

export interface Project extends NodeFields {
  level: 'project';
  id: number;
}

export interface SubProject extends NodeFields {
  level: 'subproject';
  id: number;
  /** Owning project */
  parentId: number;
}

export interface Task extends NodeFields {
  level: 'task';
  id: number;
  /** Owning subproject */
  parentId: number;
}

export interface SubTask extends NodeFields {
  level: 'subtask';
  id: number;
  /** Owning task */
  parentId: number;
  estimatedHours: number;
}

export type TreeNode = Project | SubProject | Task | SubTask;
export type ChildNode = SubProject | Task | SubTask;
export type BranchNode = Project | SubProject | Task;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A node that has not been persisted yet (no id).
 */
export type NodeDraft = DistributiveOmit<TreeNode, 'id'>;

/**
 * Request body for creating a node at any level.
 * estimatedHours is required for subtasks and rejected elsewhere.
 */
export interface CreateNodeRequest {
  name: string;
  description?: string | null;
  deadline?: string | null;
  estimatedHours?: number;
}

/**
 * Request body for updating a node.
 * All fields are optional; at least one must be provided.
 */
export interface UpdateNodeRequest {
  name?: string;
  description?: string | null;
  deadline?: string | null;
  estimatedHours?: number;
}

/**
 * Node as returned by the API, with its rolled-up hours.
 */
export type NodeResponse = TreeNode & { effectiveHours: number };

/**
 * Response for list endpoints. totalHours is the sum over the listed nodes.
 */
export interface NodeListResponse {
  nodes: NodeResponse[];
  totalHours: number;
}

/**
 * A node with its full subtree materialized.
 */
export type HierarchyTreeNode = NodeResponse & { children: HierarchyTreeNode[] };

export interface EffectiveHoursResponse {
  level: HierarchyLevel;
  id: number;
  effectiveHours: number;
}

export interface DeleteNodeResponse {
  /** Deleted node plus every descendant removed with it */
  removedCount: number;
}
