import type { FastifyInstance } from 'fastify';
import { fromConditionRecords } from 'policy-query-filter';
import type { QueryCompiler } from 'policy-query-filter';
import { toElasticsearchQuery } from 'policy-query-filter/elasticsearch';
import type { SerializeOptions } from 'policy-query-filter/elasticsearch';
import { compileBodySchema } from '../../api/schemas.js';
import type { CompileBody } from '../../api/schemas.js';

export async function registerCompileRoutes(
  app: FastifyInstance,
  compiler: QueryCompiler,
  serializeOptions: SerializeOptions,
): Promise<void> {
  // POST /queries/compile — condition records + bindings → search query
  app.post<{ Body: CompileBody }>(
    '/queries/compile',
    { schema: { body: compileBodySchema } },
    async (request, reply) => {
      const root = compiler.compile(fromConditionRecords(request.body), request.body.bindings);
      return reply.status(200).send({ query: toElasticsearchQuery(root, serializeOptions) });
    },
  );
}
