import type { FastifyInstance } from 'fastify';
import type { ProviderRegistry } from '../../providers/registry.js';

export function registerHealthRoutes(fastify: FastifyInstance, registry: ProviderRegistry): void {
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString(), providers: registry.listAvailable() };
  });
}
