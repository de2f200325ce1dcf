import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  ExportEntityParamSchema,
  ImportBundleSchema,
  ImportOptionsSchema,
} from '../schemas/import-export.schema.js';
import * as importExportService from '../services/import-export.service.js';
import { mutationContext } from '../lib/request-context.js';

export async function importExportRoutes(fastify: FastifyInstance) {
  // POST /api/import?conflictStrategy=skip|update|fail&dryRun=true
  fastify.post('/api/import', async (request: FastifyRequest, reply: FastifyReply) => {
    const options = ImportOptionsSchema.parse(request.query);
    const bundle = ImportBundleSchema.parse(request.body);
    const result = await importExportService.importBundle(bundle, options, mutationContext(request));
    request.log.info(
      { dryRun: result.dryRun, conflictStrategy: result.conflictStrategy, counts: result.counts },
      'Import bundle applied',
    );
    return reply.status(200).send(result);
  });

  fastify.get('/api/export', async (_request: FastifyRequest, reply: FastifyReply) => {
    const bundle = await importExportService.exportBundle();
    return reply
      .status(200)
      .header('Content-Disposition', 'attachment; filename="orgchart-export.json"')
      .send(bundle);
  });

  fastify.get('/api/export/:entityType', async (request: FastifyRequest, reply: FastifyReply) => {
    const { entityType } = ExportEntityParamSchema.parse(request.params);
    const csv = await importExportService.exportCsv(entityType);
    return reply
      .status(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${entityType}.csv"`)
      .send(csv);
  });
}
