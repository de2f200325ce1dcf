import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import { getConfig, type AppConfig } from './lib/config/app.js';
import { client } from './lib/db.js';
import { registerErrorHandler } from './lib/error-handler.js';
import csrfPlugin from './plugins/csrf.plugin.js';
import { personsRoutes } from './routes/persons.js';
import { unitsRoutes } from './routes/units.js';
import { jobTitlesRoutes } from './routes/job-titles.js';
import { assignmentsRoutes } from './routes/assignments.js';
import { workloadRoutes } from './routes/workload.js';
import { orgChartRoutes } from './routes/orgchart.js';
import { auditRoutes } from './routes/audit.js';
import { companiesRoutes } from './routes/companies.js';
import { importExportRoutes } from './routes/import-export.js';

async function checkDatabase(log: FastifyBaseLogger): Promise<'ok' | 'error'> {
  try {
    await client.query('SELECT 1');
    return 'ok';
  } catch (err) {
    log.error({ err }, 'Health check: database query failed');
    return 'error';
  }
}

export async function buildApp(config: AppConfig = getConfig()): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { level: config.logLevel },
  });

  // CORS with credentials support
  await fastify.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : false,
    credentials: true,
  });

  // Cookie support (CSRF session)
  await fastify.register(cookie);

  await fastify.register(csrfPlugin, {
    secretKey: config.secretKey,
    enabled: config.csrfProtection,
    secureCookies: config.secureCookies,
  });

  registerErrorHandler(fastify);

  fastify.get('/health', async (_request, reply) => {
    const database = await checkDatabase(fastify.log);
    return reply.status(database === 'ok' ? 200 : 503).send({
      status: database === 'ok' ? 'ok' : 'degraded',
      environment: config.environment,
      version: config.version,
      database,
    });
  });

  // Register API routes
  await fastify.register(personsRoutes);
  await fastify.register(unitsRoutes);
  await fastify.register(jobTitlesRoutes);
  await fastify.register(assignmentsRoutes);
  await fastify.register(workloadRoutes);
  await fastify.register(orgChartRoutes);
  await fastify.register(auditRoutes);
  await fastify.register(companiesRoutes);
  await fastify.register(importExportRoutes);

  return fastify;
}
