import { buildServer } from './api/server.js';
import { ConfigError, loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';

let config: ServiceConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }
  throw err;
}

const app = buildServer(config);

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    },
  );
});
