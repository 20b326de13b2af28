import type {
  BranchNode,
  HierarchyLevel,
  HierarchyTreeNode,
  TreeNode,
} from '@estimator/shared';
import type { PersistenceGateway } from '../db/persistenceGateway.js';
import { CHILD_LEVEL, LEVEL_LABELS } from '../domain/levels.js';
import { ok, fail } from '../errors/result.js';
import type { Result } from '../errors/result.js';

/**
 * Supplies the direct children of a branch node, ordered by id.
 */
export type ChildLookup = (node: BranchNode) => readonly TreeNode[];

/**
 * Child lookup that reads from storage on every call.
 */
export function gatewayChildren(gateway: PersistenceGateway): ChildLookup {
  return (node) => gateway.findByParentId(CHILD_LEVEL[node.level], node.id);
}

/**
 * Child lookup over a tree that is already in memory.
 */
export function materializedChildren(tree: HierarchyTreeNode): ChildLookup {
  const byParent = new Map<string, TreeNode[]>();
  const visit = (node: HierarchyTreeNode) => {
    byParent.set(`${node.level}:${node.id}`, node.children);
    node.children.forEach(visit);
  };
  visit(tree);
  return (node) => byParent.get(`${node.level}:${node.id}`) ?? [];
}

/**
 * Effective estimated hours of a node.
 *
 * A subtask reports its stored hours; every other level reports the sum over its
 * direct children, and 0 when it has none. No rounding is applied.
 */
export function effectiveHours(node: TreeNode, childrenOf: ChildLookup): number {
  if (node.level === 'subtask') {
    return node.estimatedHours;
  }
  return childrenOf(node).reduce((sum, child) => sum + effectiveHours(child, childrenOf), 0);
}

/**
 * Materialize the subtree below node, annotating every node with its effective
 * hours. Each node is visited once; branch totals come from the children
 * already built.
 */
export function buildHoursTree(node: TreeNode, childrenOf: ChildLookup): HierarchyTreeNode {
  if (node.level === 'subtask') {
    return { ...node, effectiveHours: node.estimatedHours, children: [] };
  }
  const children = childrenOf(node).map((child) => buildHoursTree(child, childrenOf));
  const total = children.reduce((sum, child) => sum + child.effectiveHours, 0);
  return { ...node, effectiveHours: total, children };
}

/**
 * Effective hours of the node stored at (level, id).
 */
export function computeEffectiveHours(
  gateway: PersistenceGateway,
  level: HierarchyLevel,
  id: number,
): Result<number> {
  const node = gateway.findById(level, id);
  if (!node) {
    return fail('NotFound', `${LEVEL_LABELS[level]} not found`, { level, id });
  }
  return ok(effectiveHours(node, gatewayChildren(gateway)));
}
