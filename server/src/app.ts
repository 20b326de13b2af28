import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse } from '@estimator/shared';
import configPlugin from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import projectRoutes from './routes/projects.js';
import childNodeRoutes from './routes/childNodes.js';

export async function buildApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: process.env.LOG_LEVEL || 'info',
    },
    trustProxy: process.env.TRUST_PROXY === 'true',
    // Unknown body fields are rejected rather than silently stripped
    ajv: { customOptions: { removeAdditional: false } },
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Database connection, migrations & persistence gateway
  await app.register(dbPlugin);

  // Project routes (hierarchy roots)
  await app.register(projectRoutes, { prefix: '/api/projects' });

  // Subproject routes (nested under projects)
  await app.register(childNodeRoutes, {
    prefix: '/api/projects/:parentId/subprojects',
    level: 'subproject',
  });

  // Task routes (nested under subprojects)
  await app.register(childNodeRoutes, {
    prefix: '/api/subprojects/:parentId/tasks',
    level: 'task',
  });

  // Subtask routes (nested under tasks)
  await app.register(childNodeRoutes, {
    prefix: '/api/tasks/:parentId/subtasks',
    level: 'subtask',
  });

  // Health check endpoint (liveness)
  app.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: the database answers a query
  app.get('/api/health/ready', async () => {
    app.db.run(sql`SELECT 1`);
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
