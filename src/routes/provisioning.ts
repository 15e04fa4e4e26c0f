import { FastifyInstance } from 'fastify';
import { getPlannerConfig } from '../lib/config/planner.js';
import {
  planQuerySchema,
  planRequestSchema,
  toPlanningInputs,
} from '../schemas/provisioning.schema.js';
import { provisioningService } from '../services/provisioning.service.js';
import { renderPlanReport } from '../services/plan-report.service.js';

export async function provisioningRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /api/provisioning/plans: solve for the cheapest provisioning plan
  fastify.post<{ Body: unknown; Querystring: unknown }>(
    '/api/provisioning/plans',
    async (request, reply) => {
      const { format } = planQuerySchema.parse(request.query);
      const body = planRequestSchema.parse(request.body);
      const { schedule, catalog } = toPlanningInputs(body, getPlannerConfig());

      // Abort when the client goes away before the response is written
      const controller = new AbortController();
      reply.raw.on('close', () => {
        if (!reply.raw.writableFinished) {
          controller.abort();
        }
      });

      const outcome = await provisioningService.plan(schedule, catalog, {
        logger: request.log,
        signal: controller.signal,
      });

      // A solver failure is the solver's problem, not the caller's input
      const statusCode = outcome.status === 'error' ? 503 : 200;

      if (format === 'text') {
        return reply
          .code(statusCode)
          .type('text/plain; charset=utf-8')
          .send(renderPlanReport(outcome));
      }
      return reply.code(statusCode).send(outcome);
    }
  );

  // POST /api/provisioning/models: export the model without solving it
  fastify.post<{ Body: unknown }>(
    '/api/provisioning/models',
    async (request, reply) => {
      const body = planRequestSchema.parse(request.body);
      const { schedule, catalog } = toPlanningInputs(body, getPlannerConfig());
      return reply.code(200).send(provisioningService.exportModel(schedule, catalog));
    }
  );
}
