import type { FastifyInstance } from 'fastify';
import type { ChildLevel, CreateNodeRequest, UpdateNodeRequest } from '@estimator/shared';
import * as nodeService from '../services/nodeService.js';
import {
  createNodeBody,
  createSubtaskBody,
  parentAndIdParams,
  parentIdParams,
  updateNodeBody,
  updateSubtaskBody,
} from './schemas.js';

export interface ChildNodeRouteOptions {
  /** Level served under this prefix; the prefix must carry a :parentId segment. */
  level: ChildLevel;
}

interface ParentParams {
  parentId: number;
}

interface NodeParams {
  parentId: number;
  id: number;
}

/**
 * CRUD, hours and tree routes for one parent-scoped level, e.g.
 * /api/projects/:parentId/subprojects or /api/tasks/:parentId/subtasks.
 */
export default async function childNodeRoutes(
  fastify: FastifyInstance,
  options: ChildNodeRouteOptions,
) {
  const { level } = options;
  const createBody = level === 'subtask' ? createSubtaskBody : createNodeBody;
  const updateBody = level === 'subtask' ? updateSubtaskBody : updateNodeBody;

  /**
   * GET /
   * List children of the parent, ordered by id.
   */
  fastify.get<{ Params: ParentParams }>(
    '/',
    { schema: { params: parentIdParams } },
    async (request, reply) => {
      const result = nodeService.listChildNodes(fastify.gateway, level, request.params.parentId);
      return reply.status(200).send(result);
    },
  );

  /**
   * POST /
   * Create a node under the parent.
   */
  fastify.post<{ Params: ParentParams; Body: CreateNodeRequest }>(
    '/',
    { schema: { params: parentIdParams, body: createBody } },
    async (request, reply) => {
      const node = nodeService.createChildNode(
        fastify.gateway,
        level,
        request.params.parentId,
        request.body,
      );
      return reply.status(201).send(node);
    },
  );

  /**
   * GET /:id
   */
  fastify.get<{ Params: NodeParams }>(
    '/:id',
    { schema: { params: parentAndIdParams } },
    async (request, reply) => {
      const node = nodeService.getChildNode(
        fastify.gateway,
        level,
        request.params.parentId,
        request.params.id,
      );
      return reply.status(200).send(node);
    },
  );

  /**
   * PATCH /:id
   * Update fields; the parent stays the same.
   */
  fastify.patch<{ Params: NodeParams; Body: UpdateNodeRequest }>(
    '/:id',
    { schema: { params: parentAndIdParams, body: updateBody } },
    async (request, reply) => {
      const node = nodeService.updateChildNode(
        fastify.gateway,
        level,
        request.params.parentId,
        request.params.id,
        request.body,
      );
      return reply.status(200).send(node);
    },
  );

  /**
   * DELETE /:id
   * Delete the node and all of its descendants.
   */
  fastify.delete<{ Params: NodeParams }>(
    '/:id',
    { schema: { params: parentAndIdParams } },
    async (request, reply) => {
      const result = nodeService.deleteChildNode(
        fastify.gateway,
        level,
        request.params.parentId,
        request.params.id,
      );
      request.log.info(
        { level, id: request.params.id, removedCount: result.removedCount },
        'Cascade delete completed',
      );
      return reply.status(200).send(result);
    },
  );

  /**
   * GET /:id/hours
   */
  fastify.get<{ Params: NodeParams }>(
    '/:id/hours',
    { schema: { params: parentAndIdParams } },
    async (request, reply) => {
      const hours = nodeService.getChildEffectiveHours(
        fastify.gateway,
        level,
        request.params.parentId,
        request.params.id,
      );
      return reply.status(200).send(hours);
    },
  );

  /**
   * GET /:id/tree
   */
  fastify.get<{ Params: NodeParams }>(
    '/:id/tree',
    { schema: { params: parentAndIdParams } },
    async (request, reply) => {
      const tree = nodeService.getChildHoursTree(
        fastify.gateway,
        level,
        request.params.parentId,
        request.params.id,
      );
      return reply.status(200).send(tree);
    },
  );
}
