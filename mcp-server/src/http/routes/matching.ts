/**
 * HTTP API routes for column matching.
 */

import type { FastifyInstance } from 'fastify';
import { listAvailableProviders, runColumnMatching } from '../../services/column-matching-service.js';
import { MatchRequestBodySchema, formatIssues, toColumnMatchingRequest } from '../../services/request-schema.js';
import type { AppContext } from '../../context.js';

export function registerMatchingRoutes(fastify: FastifyInstance, deps: AppContext): void {
  /**
   * GET /api/providers
   * Registered backends with their supported models.
   */
  fastify.get('/api/providers', async () => {
    return { providers: listAvailableProviders(deps.registry) };
  });

  /**
   * POST /api/match
   * Match source headers to target headers. A run that fails as a whole
   * answers 422; degraded headers still answer 200.
   */
  fastify.post('/api/match', async (request, reply) => {
    const parsed = MatchRequestBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid request body', issues: formatIssues(parsed.error) });
    }

    const outcome = await runColumnMatching(toColumnMatchingRequest(parsed.data, deps.config), {
      registry: deps.registry,
    });

    if (!outcome.success) {
      return reply.status(422).send(outcome);
    }
    return outcome;
  });
}
