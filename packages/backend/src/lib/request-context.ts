import type { FastifyRequest } from 'fastify';
import type { MutationContext } from '../types/index.js';

export function mutationContext(request: FastifyRequest): MutationContext {
  return { ipAddress: request.ip };
}
