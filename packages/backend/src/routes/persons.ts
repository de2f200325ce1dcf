import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import {
  CreatePersonSchema,
  PersonFiltersSchema,
  UpdatePersonSchema,
} from '../schemas/persons.schema.js';
import * as personService from '../services/person.service.js';
import { getPersonWorkload, getWorkloadHistory } from '../services/workload.service.js';
import { mutationContext } from '../lib/request-context.js';

// ============================================================================
// Person Routes
// ============================================================================

export async function personsRoutes(fastify: FastifyInstance) {
  // GET /api/persons - List persons with search and pagination
  fastify.get('/api/persons', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = PersonFiltersSchema.parse(request.query);
    const result = await personService.listPersons(filters);
    return reply.status(200).send(result);
  });

  // GET /api/persons/duplicates - Pairs that look like the same individual
  fastify.get('/api/persons/duplicates', async (_request: FastifyRequest, reply: FastifyReply) => {
    const duplicates = await personService.findPotentialDuplicates();
    return reply.status(200).send(duplicates);
  });

  // GET /api/persons/:id - Person page: current assignments, workload, timeline
  fastify.get('/api/persons/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const detail = await personService.getPersonDetail(id);
    return reply.status(200).send(detail);
  });

  // GET /api/persons/:id/workload
  fastify.get('/api/persons/:id/workload', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const workload = await getPersonWorkload(id);
    return reply.status(200).send(workload);
  });

  // GET /api/persons/:id/workload-history - Total workload at each change date, newest first
  fastify.get(
    '/api/persons/:id/workload-history',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = IdParamSchema.parse(request.params);
      const history = await getWorkloadHistory(id);
      return reply.status(200).send(history);
    },
  );

  // POST /api/persons
  fastify.post('/api/persons', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = CreatePersonSchema.parse(request.body);
    const person = await personService.createPerson(data, mutationContext(request));
    return reply.status(201).send(person);
  });

  // PUT /api/persons/:id
  fastify.put('/api/persons/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const data = UpdatePersonSchema.parse(request.body);
    const person = await personService.updatePerson(id, data, mutationContext(request));
    return reply.status(200).send(person);
  });

  // DELETE /api/persons/:id - Refused while the person holds CURRENT assignments
  fastify.delete('/api/persons/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    await personService.deletePerson(id, mutationContext(request));
    return reply.status(204).send();
  });
}
