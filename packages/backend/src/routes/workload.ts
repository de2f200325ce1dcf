import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { getWorkloadReport } from '../services/workload.service.js';

export async function workloadRoutes(fastify: FastifyInstance) {
  // GET /api/workload/report - Persons grouped into low/normal/high/overloaded
  fastify.get('/api/workload/report', async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = await getWorkloadReport();
    return reply.status(200).send(report);
  });
}
