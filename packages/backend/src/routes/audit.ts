import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AuditFiltersSchema } from '../schemas/audit.schema.js';
import { queryAuditEvents } from '../services/audit.service.js';

export async function auditRoutes(fastify: FastifyInstance) {
  fastify.get('/api/audit-events', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = AuditFiltersSchema.parse(request.query);
    const result = await queryAuditEvents(filters);
    return reply.status(200).send(result);
  });
}
