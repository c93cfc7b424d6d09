import Fastify from 'fastify';
import {
  ConditionExtractor,
  DEFAULT_EXTRACTOR_CONFIG,
  QueryCompiler,
} from 'policy-query-filter';
import type { ExtractorConfig } from 'policy-query-filter';
import type { NestedScoreMode } from 'policy-query-filter/elasticsearch';
import type { LogLevel } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerExtractRoutes } from '../features/extract/routes.js';
import { registerCompileRoutes } from '../features/compile/routes.js';
import { registerTranslateRoutes } from '../features/translate/routes.js';

export interface ServerOptions {
  logLevel?: LogLevel;
  bodyLimit?: number;
  nestedScoreMode?: NestedScoreMode;
  extractorConfig?: ExtractorConfig;
}

export function buildServer(options: ServerOptions = {}) {
  const app = Fastify({
    logger: { level: options.logLevel ?? 'info' },
    ...(options.bodyLimit !== undefined ? { bodyLimit: options.bodyLimit } : {}),
  });

  registerErrorHandler(app);

  const config = options.extractorConfig ?? DEFAULT_EXTRACTOR_CONFIG;
  const extractor = new ConditionExtractor(config);
  const compiler = new QueryCompiler({ inputRoot: config.inputRoot });
  const serializeOptions = options.nestedScoreMode !== undefined
    ? { nestedScoreMode: options.nestedScoreMode }
    : {};

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerExtractRoutes(instance, extractor);
    await registerCompileRoutes(instance, compiler, serializeOptions);
    await registerTranslateRoutes(instance, { ...serializeOptions, config });
  }, { prefix });

  return app;
}
