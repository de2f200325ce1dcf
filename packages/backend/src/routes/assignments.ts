import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { IdParamSchema } from '../schemas/common.schema.js';
import {
  AssignmentFiltersSchema,
  BulkPercentageSchema,
  BulkTerminateSchema,
  BulkTransferSchema,
  CreateAssignmentSchema,
  LineageQuerySchema,
  TerminateAssignmentSchema,
  UpdateAssignmentSchema,
} from '../schemas/assignments.schema.js';
import { assignmentService } from '../services/assignment.service.js';
import { mutationContext } from '../lib/request-context.js';

// ============================================================================
// Assignment Routes
// ============================================================================

export async function assignmentsRoutes(fastify: FastifyInstance) {
  // GET /api/assignments - List versions with filters and pagination
  fastify.get('/api/assignments', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = AssignmentFiltersSchema.parse(request.query);
    const result = await assignmentService.list(filters);
    return reply.status(200).send(result);
  });

  // GET /api/assignments/new - Options for the create form
  fastify.get('/api/assignments/new', async (_request: FastifyRequest, reply: FastifyReply) => {
    const options = await assignmentService.getFormOptions();
    return reply.status(200).send(options);
  });

  // GET /api/assignments/history - Every version, or one lineage
  fastify.get('/api/assignments/history', async (request: FastifyRequest, reply: FastifyReply) => {
    const query = LineageQuerySchema.parse(request.query);
    const versions = await assignmentService.getHistory(query);
    return reply.status(200).send(versions);
  });

  fastify.get('/api/assignments/statistics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const stats = await assignmentService.getStatistics();
    return reply.status(200).send(stats);
  });

  // GET /api/assignments/export - CSV of the filtered list
  fastify.get('/api/assignments/export', async (request: FastifyRequest, reply: FastifyReply) => {
    const filters = AssignmentFiltersSchema.parse(request.query);
    const csv = await assignmentService.exportCsv(filters);
    return reply
      .status(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', 'attachment; filename="assignments.csv"')
      .send(csv);
  });

  // POST /api/assignments - Start a lineage (or supersede with allowNewVersion)
  fastify.post('/api/assignments', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = CreateAssignmentSchema.parse(request.body);
    const warnings = await assignmentService.checkRules(data);
    const assignment = await assignmentService.create(data, mutationContext(request));
    request.log.info(
      {
        assignmentId: assignment.id,
        personId: assignment.personId,
        unitId: assignment.unitId,
        jobTitleId: assignment.jobTitleId,
        version: assignment.version,
      },
      'assignment version created',
    );
    return reply.status(201).send({ assignment, warnings });
  });

  // GET /api/assignments/:id
  fastify.get('/api/assignments/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const assignment = await assignmentService.getById(id);
    return reply.status(200).send(assignment);
  });

  // GET /api/assignments/:id/edit - Form options plus the CURRENT values
  fastify.get('/api/assignments/:id/edit', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const options = await assignmentService.getFormOptions(id);
    return reply.status(200).send(options);
  });

  // GET /api/assignments/:id/versions - All versions of this lineage
  fastify.get('/api/assignments/:id/versions', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const versions = await assignmentService.getLineage(id);
    return reply.status(200).send(versions);
  });

  // PUT /api/assignments/:id - Edit creates version + 1
  fastify.put('/api/assignments/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const data = UpdateAssignmentSchema.parse(request.body);
    const assignment = await assignmentService.update(id, data, mutationContext(request));
    request.log.info(
      {
        previousId: id,
        assignmentId: assignment.id,
        personId: assignment.personId,
        unitId: assignment.unitId,
        jobTitleId: assignment.jobTitleId,
        version: assignment.version,
      },
      'assignment version superseded',
    );
    return reply.status(200).send(assignment);
  });

  // POST /api/assignments/:id/terminate
  fastify.post('/api/assignments/:id/terminate', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const { terminationDate } = TerminateAssignmentSchema.parse(request.body ?? {});
    const assignment = await assignmentService.terminate(id, terminationDate, mutationContext(request));
    request.log.info(
      {
        assignmentId: assignment.id,
        personId: assignment.personId,
        unitId: assignment.unitId,
        jobTitleId: assignment.jobTitleId,
        version: assignment.version,
        validTo: assignment.validTo,
      },
      'assignment terminated',
    );
    return reply.status(200).send(assignment);
  });

  // DELETE /api/assignments/:id - Removes the whole lineage
  fastify.delete('/api/assignments/:id', async (request: FastifyRequest, reply: FastifyReply) => {
    const { id } = IdParamSchema.parse(request.params);
    const result = await assignmentService.deleteLineage(id, mutationContext(request));
    return reply.status(200).send(result);
  });

  // =========================================================================
  // Bulk operations
  // =========================================================================

  fastify.post('/api/assignments/bulk/terminate', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = BulkTerminateSchema.parse(request.body);
    const result = await assignmentService.bulkTerminate(data, mutationContext(request));
    return reply.status(200).send(result);
  });

  fastify.post('/api/assignments/bulk/percentage', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = BulkPercentageSchema.parse(request.body);
    const result = await assignmentService.bulkUpdatePercentage(data, mutationContext(request));
    return reply.status(200).send(result);
  });

  fastify.post('/api/assignments/bulk/transfer', async (request: FastifyRequest, reply: FastifyReply) => {
    const data = BulkTransferSchema.parse(request.body);
    const result = await assignmentService.bulkTransfer(data, mutationContext(request));
    return reply.status(200).send(result);
  });
}
