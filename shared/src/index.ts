/**
 * @estimator/shared
 *
 * Shared TypeScript types used by the server and its API consumers.
 * This package contains API request/response shapes and entity types.
 */

export type { ApiError, ApiErrorResponse } from './types/api.js';
export type { ErrorCode } from './types/errors.js';

// Estimation hierarchy
export type {
  HierarchyLevel,
  ChildLevel,
  BranchLevel,
  NodeFields,
  Project,
  SubProject,
  Task,
  SubTask,
  TreeNode,
  ChildNode,
  BranchNode,
  NodeDraft,
  CreateNodeRequest,
  UpdateNodeRequest,
  NodeResponse,
  NodeListResponse,
  HierarchyTreeNode,
  EffectiveHoursResponse,
  DeleteNodeResponse,
} from './types/hierarchy.js';
