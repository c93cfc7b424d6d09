import type { FastifyInstance } from 'fastify';
import { toConditionRecords, translatePolicy } from 'policy-query-filter';
import type { TranslateOptions } from 'policy-query-filter';
import { translateBodySchema } from '../../api/schemas.js';
import type { TranslateBody } from '../../api/schemas.js';

export async function registerTranslateRoutes(
  app: FastifyInstance,
  options: TranslateOptions,
): Promise<void> {
  // POST /policies/translate — policy text + bindings → condition groups and search query
  app.post<{ Body: TranslateBody }>(
    '/policies/translate',
    { schema: { body: translateBodySchema } },
    async (request, reply) => {
      const { policy, bindings } = request.body;
      const { conditionGroups, diagnostics, query } = translatePolicy(policy, bindings, options);
      if (diagnostics.length > 0) {
        request.log.debug({ skipped: diagnostics.length }, 'skipped unrecognized policy statements');
      }
      return reply.status(200).send({ ...toConditionRecords(conditionGroups), diagnostics, query });
    },
  );
}
