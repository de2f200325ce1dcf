import 'dotenv/config';
import { buildApp } from './app.js';
import { getConfig } from './lib/config/app.js';

const config = getConfig();
const fastify = await buildApp(config);

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(
      { environment: config.environment, version: config.version },
      'Organigramma API started',
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
