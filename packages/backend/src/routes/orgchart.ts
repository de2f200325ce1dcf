import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import { TreeQuerySchema } from '../schemas/orgchart.schema.js';
import * as orgChartService from '../services/orgchart.service.js';

// ============================================================================
// Org Chart Routes
// ============================================================================

export async function orgChartRoutes(fastify: FastifyInstance) {
  // GET /api/orgchart/tree - Nested forest, optionally rooted at one unit
  fastify.get('/api/orgchart/tree', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = TreeQuerySchema.parse(request.query);
    const tree = await orgChartService.getTree(query);
    return reply.status(200).send(tree);
  });

  fastify.get('/api/orgchart/units/:id/subtree', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const [subtree] = await orgChartService.getTree({ rootUnitId: id, showPersons: true });
    return reply.status(200).send(subtree);
  });

  // GET /api/orgchart/matrix - Person x CURRENT assignment matrix
  fastify.get('/api/orgchart/matrix', async (_request: FastifyRequest, reply: FastifyReply) => {
    const matrix = await orgChartService.getMatrix();
    return reply.status(200).send(matrix);
  });

  fastify.get('/api/orgchart/statistics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const stats = await orgChartService.getStatistics();
    return reply.status(200).send(stats);
  });

  fastify.get('/api/orgchart/vacant-units', async (_request: FastifyRequest, reply: FastifyReply) => {
    const vacant = await orgChartService.getVacantUnits();
    return reply.status(200).send(vacant);
  });

  fastify.get('/api/orgchart/span-of-control', async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = await orgChartService.getSpanReport();
    return reply.status(200).send(report);
  });
}
