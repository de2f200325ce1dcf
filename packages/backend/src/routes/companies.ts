import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import {
  CompanyFiltersSchema,
  CreateCompanySchema,
  UpdateCompanySchema,
} from '../schemas/companies.schema.js';
import * as companyService from '../services/company.service.js';
import { mutationContext } from '../lib/request-context.js';

export async function companiesRoutes(fastify: FastifyInstance) {
  // GET /api/companies - Search, activeOnly and pagination
  fastify.get('/api/companies', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = CompanyFiltersSchema.parse(request.query);
    const result = await companyService.listCompanies(filters);
    return reply.status(200).send(result);
  });

  fastify.get('/api/companies/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const company = await companyService.getCompanyById(id);
    return reply.status(200).send(company);
  });

  fastify.post('/api/companies', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = CreateCompanySchema.parse(request.body);
    const company = await companyService.createCompany(data, mutationContext(request));
    return reply.status(201).send(company);
  });

  fastify.put('/api/companies/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const data = UpdateCompanySchema.parse(request.body);
    const company = await companyService.updateCompany(id, data, mutationContext(request));
    return reply.status(200).send(company);
  });

  fastify.delete('/api/companies/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    await companyService.deleteCompany(id, mutationContext(request));
    return reply.status(204).send();
  });
}
