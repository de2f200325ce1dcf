import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import { CreateUnitSchema, UnitFiltersSchema, UpdateUnitSchema } from '../schemas/units.schema.js';
import * as unitService from '../services/unit.service.js';
import { mutationContext } from '../lib/request-context.js';

// ============================================================================
// Unit Routes
// ============================================================================

export async function unitsRoutes(fastify: FastifyInstance) {
  fastify.get('/api/units', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = UnitFiltersSchema.parse(request.query);
    const result = await unitService.listUnits(filters);
    return reply.status(200).send(result);
  });

  // GET /api/units/:id - Unit page: breadcrumb, children, staff, span of control
  fastify.get('/api/units/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const detail = await unitService.getUnitDetail(id);
    return reply.status(200).send(detail);
  });

  // GET /api/units/:id/ancestors - Root first
  fastify.get('/api/units/:id/ancestors', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const ancestors = await unitService.getAncestors(id);
    return reply.status(200).send(ancestors);
  });

  fastify.get('/api/units/:id/descendants', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const descendants = await unitService.getDescendants(id);
    return reply.status(200).send(descendants);
  });

  fastify.post('/api/units', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = CreateUnitSchema.parse(request.body);
    const unit = await unitService.createUnit(data, mutationContext(request));
    return reply.status(201).send(unit);
  });

  // PUT /api/units/:id - Parent changes are checked for cycles
  fastify.put('/api/units/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const data = UpdateUnitSchema.parse(request.body);
    const unit = await unitService.updateUnit(id, data, mutationContext(request));
    return reply.status(200).send(unit);
  });

  fastify.delete('/api/units/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    await unitService.deleteUnit(id, mutationContext(request));
    return reply.status(204).send();
  });
}
