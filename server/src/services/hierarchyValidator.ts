import type { ChildLevel, ChildNode, HierarchyLevel, TreeNode } from '@estimator/shared';
import type { PersistenceGateway } from '../db/persistenceGateway.js';
import { CHILD_LEVEL, LEVEL_LABELS, PARENT_LEVEL } from '../domain/levels.js';
import { ok, fail } from '../errors/result.js';
import type { Result } from '../errors/result.js';

export interface CascadeDeleteResult {
  /** Whether the target row existed and was removed by this call */
  deleted: boolean;
  /** Target plus descendants removed with it; 0 when nothing was deleted */
  removedCount: number;
}

/**
 * Structural checks run before every create, update and delete.
 */
export interface HierarchyValidator {
  /**
   * Check that a node of the level above `level` exists with id parentId.
   * @param level level of the child about to be created
   */
  validateParentExists(parentId: number, level: ChildLevel): Result<void>;
  /**
   * Check that the child exists and is owned by claimedParentId.
   */
  validateOwnership(level: ChildLevel, childId: number, claimedParentId: number): Result<ChildNode>;
  /**
   * Delete the node; storage removes every descendant in the same statement.
   */
  cascadeDelete(level: HierarchyLevel, nodeId: number): CascadeDeleteResult;
}

function isChildNode(node: TreeNode): node is ChildNode {
  return node.level !== 'project';
}

export function createHierarchyValidator(gateway: PersistenceGateway): HierarchyValidator {
  function countSubtree(node: TreeNode): number {
    if (node.level === 'subtask') return 1;
    return gateway
      .findByParentId(CHILD_LEVEL[node.level], node.id)
      .reduce((count, child) => count + countSubtree(child), 1);
  }

  return {
    validateParentExists(parentId, level) {
      const parentLevel = PARENT_LEVEL[level];
      if (!gateway.existsById(parentLevel, parentId)) {
        return fail('ParentNotFound', `${LEVEL_LABELS[parentLevel]} not found`, {
          level: parentLevel,
          id: parentId,
        });
      }
      return ok(undefined);
    },

    validateOwnership(level, childId, claimedParentId) {
      const node = gateway.findById(level, childId);
      if (!node || !isChildNode(node)) {
        return fail('NotFound', `${LEVEL_LABELS[level]} not found`, { level, id: childId });
      }
      if (node.parentId !== claimedParentId) {
        return fail(
          'OwnershipMismatch',
          `${LEVEL_LABELS[level]} does not belong to ${LEVEL_LABELS[PARENT_LEVEL[level]].toLowerCase()} ${claimedParentId}`,
          { level, id: childId, claimedParentId },
        );
      }
      return ok(node);
    },

    cascadeDelete(level, nodeId) {
      const node = gateway.findById(level, nodeId);
      if (!node) {
        return { deleted: false, removedCount: 0 };
      }
      const subtreeSize = countSubtree(node);
      const changes = gateway.deleteById(level, nodeId);
      // A concurrent delete may have removed the row between the read and the delete
      if (changes === 0) {
        return { deleted: false, removedCount: 0 };
      }
      return { deleted: true, removedCount: subtreeSize };
    },
  };
}
