import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { AppContext } from '../context.js';
import { createLogger } from '../utils/logger.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMatchingRoutes } from './routes/matching.js';

const log = createLogger('http');

export async function createHttpServer(deps: AppContext) {
  const fastify = Fastify({
    logger: false, // stdout is reserved for MCP stdio
  });

  await fastify.register(cors, {
    origin: [/^http:\/\/localhost(:\d+)?$/, /^http:\/\/127\.0\.0\.1(:\d+)?$/],
    methods: ['GET', 'POST'],
  });

  registerHealthRoutes(fastify, deps.registry);
  registerMatchingRoutes(fastify, deps);

  return fastify;
}

export async function startHttpServer(deps: AppContext) {
  const server = await createHttpServer(deps);
  const { httpPort, httpHost } = deps.config;

  try {
    await server.listen({ port: httpPort, host: httpHost });
    log.info(`HTTP API server running on http://${httpHost}:${httpPort}`);
  } catch (err) {
    log.error('Failed to start HTTP server:', err);
    throw err;
  }
  return server;
}
