import type { FastifyInstance } from 'fastify';
import type { CreateNodeRequest, UpdateNodeRequest } from '@estimator/shared';
import * as nodeService from '../services/nodeService.js';
import { createNodeBody, idParams, updateNodeBody } from './schemas.js';

export default async function projectRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/projects
   * List all projects with their effective hours.
   */
  fastify.get('/', async (_request, reply) => {
    const result = nodeService.listProjects(fastify.gateway);
    return reply.status(200).send(result);
  });

  /**
   * POST /api/projects
   * Create a new project.
   */
  fastify.post<{ Body: CreateNodeRequest }>(
    '/',
    { schema: { body: createNodeBody } },
    async (request, reply) => {
      const project = nodeService.createProject(fastify.gateway, request.body);
      return reply.status(201).send(project);
    },
  );

  /**
   * GET /api/projects/:id
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: idParams } },
    async (request, reply) => {
      const project = nodeService.getProject(fastify.gateway, request.params.id);
      return reply.status(200).send(project);
    },
  );

  /**
   * PATCH /api/projects/:id
   * Update name, description and/or deadline.
   */
  fastify.patch<{ Params: { id: number }; Body: UpdateNodeRequest }>(
    '/:id',
    { schema: { params: idParams, body: updateNodeBody } },
    async (request, reply) => {
      const project = nodeService.updateProject(fastify.gateway, request.params.id, request.body);
      return reply.status(200).send(project);
    },
  );

  /**
   * DELETE /api/projects/:id
   * Delete a project and everything below it.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: { params: idParams } },
    async (request, reply) => {
      const result = nodeService.deleteProject(fastify.gateway, request.params.id);
      request.log.info(
        { level: 'project', id: request.params.id, removedCount: result.removedCount },
        'Cascade delete completed',
      );
      return reply.status(200).send(result);
    },
  );

  /**
   * GET /api/projects/:id/hours
   * Effective hours of the project.
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id/hours',
    { schema: { params: idParams } },
    async (request, reply) => {
      const hours = nodeService.getEffectiveHours(fastify.gateway, 'project', request.params.id);
      return reply.status(200).send(hours);
    },
  );

  /**
   * GET /api/projects/:id/tree
   * The whole project with hours on every level.
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id/tree',
    { schema: { params: idParams } },
    async (request, reply) => {
      const tree = nodeService.getHoursTree(fastify.gateway, 'project', request.params.id);
      return reply.status(200).send(tree);
    },
  );
}
