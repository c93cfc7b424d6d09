import type { FastifyInstance } from 'fastify';
import { toConditionRecords } from 'policy-query-filter';
import type { ConditionExtractor } from 'policy-query-filter';
import { extractBodySchema } from '../../api/schemas.js';
import type { ExtractBody } from '../../api/schemas.js';

export async function registerExtractRoutes(
  app: FastifyInstance,
  extractor: ConditionExtractor,
): Promise<void> {
  // POST /policies/extract — policy text → condition groups
  app.post<{ Body: ExtractBody }>(
    '/policies/extract',
    { schema: { body: extractBodySchema } },
    async (request, reply) => {
      const { groups, diagnostics } = extractor.analyze(request.body.policy);
      if (diagnostics.length > 0) {
        request.log.debug({ skipped: diagnostics.length }, 'skipped unrecognized policy statements');
      }
      return reply.status(200).send({ ...toConditionRecords(groups), diagnostics });
    },
  );
}
