import type {
  ChildLevel,
  CreateNodeRequest,
  DeleteNodeResponse,
  EffectiveHoursResponse,
  HierarchyLevel,
  HierarchyTreeNode,
  NodeListResponse,
  NodeResponse,
  TreeNode,
  UpdateNodeRequest,
} from '@estimator/shared';
import type { PersistenceGateway } from '../db/persistenceGateway.js';
import { LEVEL_LABELS } from '../domain/levels.js';
import { NotFoundError } from '../errors/AppError.js';
import { unwrap } from '../errors/result.js';
import { applyUpdate, buildChildDraft, buildProjectDraft } from './entityModel.js';
import {
  buildHoursTree,
  computeEffectiveHours,
  effectiveHours,
  gatewayChildren,
} from './aggregationEngine.js';
import { createHierarchyValidator } from './hierarchyValidator.js';

/**
 * Convert a node to its API shape, adding the rolled-up hours.
 */
export function toNodeResponse(gateway: PersistenceGateway, node: TreeNode): NodeResponse {
  return { ...node, effectiveHours: effectiveHours(node, gatewayChildren(gateway)) };
}

function toListResponse(gateway: PersistenceGateway, nodes: TreeNode[]): NodeListResponse {
  const responses = nodes.map((node) => toNodeResponse(gateway, node));
  return {
    nodes: responses,
    totalHours: responses.reduce((sum, node) => sum + node.effectiveHours, 0),
  };
}

/**
 * Fetch a stored node or throw.
 * @throws NotFoundError if it does not exist
 */
function requireNode(gateway: PersistenceGateway, level: HierarchyLevel, id: number): TreeNode {
  const node = gateway.findById(level, id);
  if (!node) {
    throw new NotFoundError(`${LEVEL_LABELS[level]} not found`, { level, id });
  }
  return node;
}

/**
 * Persist an updated node and read it back.
 * @throws NotFoundError if the row vanished before the update ran
 */
function saveUpdate(gateway: PersistenceGateway, node: TreeNode): NodeResponse {
  if (gateway.update(node) === 0) {
    throw new NotFoundError(`${LEVEL_LABELS[node.level]} not found`, {
      level: node.level,
      id: node.id,
    });
  }
  return toNodeResponse(gateway, requireNode(gateway, node.level, node.id));
}

function removeNode(
  gateway: PersistenceGateway,
  level: HierarchyLevel,
  id: number,
): DeleteNodeResponse {
  const result = createHierarchyValidator(gateway).cascadeDelete(level, id);
  if (!result.deleted) {
    throw new NotFoundError(`${LEVEL_LABELS[level]} not found`, { level, id });
  }
  return { removedCount: result.removedCount };
}

// ─── Projects ────────────────────────────────────────────────────────────────

/**
 * List every project, ordered by id.
 */
export function listProjects(gateway: PersistenceGateway): NodeListResponse {
  return toListResponse(gateway, gateway.findAllProjects());
}

/**
 * Create a project.
 * @throws ValidationError if a field is invalid
 */
export function createProject(gateway: PersistenceGateway, data: CreateNodeRequest): NodeResponse {
  const draft = unwrap(buildProjectDraft(data));
  const id = gateway.insert(draft);
  return toNodeResponse(gateway, requireNode(gateway, 'project', id));
}

/**
 * @throws NotFoundError if the project does not exist
 */
export function getProject(gateway: PersistenceGateway, id: number): NodeResponse {
  return toNodeResponse(gateway, requireNode(gateway, 'project', id));
}

/**
 * @throws NotFoundError if the project does not exist
 * @throws ValidationError if no fields are provided or a field is invalid
 */
export function updateProject(
  gateway: PersistenceGateway,
  id: number,
  data: UpdateNodeRequest,
): NodeResponse {
  const existing = requireNode(gateway, 'project', id);
  return saveUpdate(gateway, unwrap(applyUpdate(existing, data)));
}

/**
 * Delete a project with all of its subprojects, tasks and subtasks.
 * @throws NotFoundError if the project does not exist
 */
export function deleteProject(gateway: PersistenceGateway, id: number): DeleteNodeResponse {
  return removeNode(gateway, 'project', id);
}

// ─── Parent-scoped levels (subproject, task, subtask) ────────────────────────

/**
 * List the children of parentId at the given level.
 * @throws ParentNotFoundError if the parent does not exist
 */
export function listChildNodes(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
): NodeListResponse {
  unwrap(createHierarchyValidator(gateway).validateParentExists(parentId, level));
  return toListResponse(gateway, gateway.findByParentId(level, parentId));
}

/**
 * Create a node under parentId.
 * @throws ValidationError if a field is invalid (checked before any storage access)
 * @throws ParentNotFoundError if the parent does not exist
 */
export function createChildNode(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  data: CreateNodeRequest,
): NodeResponse {
  const draft = unwrap(buildChildDraft(level, parentId, data));
  unwrap(createHierarchyValidator(gateway).validateParentExists(parentId, level));
  const id = gateway.insert(draft);
  return toNodeResponse(gateway, requireNode(gateway, level, id));
}

/**
 * @throws NotFoundError if the node does not exist
 * @throws OwnershipMismatchError if it belongs to another parent
 */
export function getChildNode(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  id: number,
): NodeResponse {
  const node = unwrap(createHierarchyValidator(gateway).validateOwnership(level, id, parentId));
  return toNodeResponse(gateway, node);
}

/**
 * Update a node's fields; its parent never changes.
 * @throws NotFoundError if the node does not exist
 * @throws OwnershipMismatchError if it belongs to another parent
 * @throws ValidationError if no fields are provided or a field is invalid
 */
export function updateChildNode(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  id: number,
  data: UpdateNodeRequest,
): NodeResponse {
  const existing = unwrap(createHierarchyValidator(gateway).validateOwnership(level, id, parentId));
  return saveUpdate(gateway, unwrap(applyUpdate(existing, data)));
}

/**
 * Delete a node and every descendant.
 * @throws NotFoundError if the node does not exist
 * @throws OwnershipMismatchError if it belongs to another parent
 */
export function deleteChildNode(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  id: number,
): DeleteNodeResponse {
  unwrap(createHierarchyValidator(gateway).validateOwnership(level, id, parentId));
  return removeNode(gateway, level, id);
}

// ─── Roll-up ─────────────────────────────────────────────────────────────────

/**
 * @throws NotFoundError if the node does not exist
 */
export function getEffectiveHours(
  gateway: PersistenceGateway,
  level: HierarchyLevel,
  id: number,
): EffectiveHoursResponse {
  const hours = unwrap(computeEffectiveHours(gateway, level, id));
  return { level, id, effectiveHours: hours };
}

/**
 * Full subtree of a node with hours on every level.
 * @throws NotFoundError if the node does not exist
 */
export function getHoursTree(
  gateway: PersistenceGateway,
  level: HierarchyLevel,
  id: number,
): HierarchyTreeNode {
  return buildHoursTree(requireNode(gateway, level, id), gatewayChildren(gateway));
}

/**
 * Effective hours of a parent-scoped node.
 * @throws NotFoundError if the node does not exist
 * @throws OwnershipMismatchError if it belongs to another parent
 */
export function getChildEffectiveHours(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  id: number,
): EffectiveHoursResponse {
  unwrap(createHierarchyValidator(gateway).validateOwnership(level, id, parentId));
  return getEffectiveHours(gateway, level, id);
}

/**
 * Hours tree of a parent-scoped node.
 * @throws NotFoundError if the node does not exist
 * @throws OwnershipMismatchError if it belongs to another parent
 */
export function getChildHoursTree(
  gateway: PersistenceGateway,
  level: ChildLevel,
  parentId: number,
  id: number,
): HierarchyTreeNode {
  const node = unwrap(createHierarchyValidator(gateway).validateOwnership(level, id, parentId));
  return buildHoursTree(node, gatewayChildren(gateway));
}
