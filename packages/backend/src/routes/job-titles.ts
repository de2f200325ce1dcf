import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import {
  CreateJobTitleSchema,
  JobTitleFiltersSchema,
  UpdateJobTitleSchema,
} from '../schemas/job-titles.schema.js';
import * as jobTitleService from '../services/job-title.service.js';
import { mutationContext } from '../lib/request-context.js';

export async function jobTitlesRoutes(fastify: FastifyInstance) {
  fastify.get('/api/job-titles', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = JobTitleFiltersSchema.parse(request.query);
    const jobTitles = await jobTitleService.listJobTitles(filters);
    return reply.status(200).send(jobTitles);
  });

  fastify.get('/api/job-titles/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const detail = await jobTitleService.getJobTitleDetail(id);
    return reply.status(200).send(detail);
  });

  fastify.post('/api/job-titles', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = CreateJobTitleSchema.parse(request.body);
    const jobTitle = await jobTitleService.createJobTitle(data, mutationContext(request));
    return reply.status(201).send(jobTitle);
  });

  fastify.put('/api/job-titles/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const data = UpdateJobTitleSchema.parse(request.body);
    const jobTitle = await jobTitleService.updateJobTitle(id, data, mutationContext(request));
    return reply.status(200).send(jobTitle);
  });

  // DELETE /api/job-titles/:id - Refused while any assignment version references it
  fastify.delete('/api/job-titles/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    await jobTitleService.deleteJobTitle(id, mutationContext(request));
    return reply.status(204).send();
  });
}
