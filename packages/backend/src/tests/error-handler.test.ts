import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';
import { registerErrorHandler } from '../lib/error-handler.js';
import { ConflictError, InvalidStateError, NotFoundError, ValidationError } from '../lib/errors.js';
import { parseJsonResponse } from './setup.js';

describe('Error handler', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    registerErrorHandler(app);

    app.get('/not-found', async () => {
      throw new NotFoundError('Unit', 7);
    });
    app.get('/conflict', async () => {
      throw new ConflictError('Already exists');
    });
    app.get('/invalid-state', async () => {
      throw new InvalidStateError('Version 1 is HISTORICAL', 'HISTORICAL', 'update');
    });
    app.get('/validation', async () => {
      throw new ValidationError('End date cannot be before start date', { field: 'validTo' });
    });
    app.post('/echo', async (request) => request.body);
    app.get('/zod', async (request) => {
      return z.object({ page: z.coerce.number().int().min(1) }).parse(request.query);
    });
    app.get('/boom', async () => {
      throw new Error('database exploded');
    });

    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('should map NotFoundError to 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/not-found' });

    expect(response.statusCode).toBe(404);
    expect(parseJsonResponse(response)).toEqual({
      error: 'Not Found',
      message: "Unit with id '7' not found",
      statusCode: 404,
    });
  });

  it('should map ConflictError to 409', async () => {
    const response = await app.inject({ method: 'GET', url: '/conflict' });

    expect(response.statusCode).toBe(409);
    expect(parseJsonResponse(response)).toMatchObject({ error: 'Conflict', message: 'Already exists' });
  });

  it('should carry the state and action of an InvalidStateError', async () => {
    const response = await app.inject({ method: 'GET', url: '/invalid-state' });

    expect(response.statusCode).toBe(422);
    expect(parseJsonResponse(response)).toEqual({
      error: 'Invalid State',
      message: 'Version 1 is HISTORICAL',
      statusCode: 422,
      details: { currentStatus: 'HISTORICAL', attemptedAction: 'update' },
    });
  });

  it('should carry the fields of a ValidationError', async () => {
    const response = await app.inject({ method: 'GET', url: '/validation' });

    expect(response.statusCode).toBe(400);
    expect(parseJsonResponse(response)).toEqual({
      error: 'Validation Error',
      message: 'End date cannot be before start date',
      statusCode: 400,
      details: { field: 'validTo' },
    });
  });

  it('should label malformed JSON bodies as Bad Request', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/echo',
      headers: { 'content-type': 'application/json' },
      payload: '{"firstName":',
    });

    expect(response.statusCode).toBe(400);
    expect(parseJsonResponse(response)).toMatchObject({ error: 'Bad Request', statusCode: 400 });
  });

  it('should label unknown content types as Unsupported Media Type', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/echo',
      headers: { 'content-type': 'application/x-unknown' },
      payload: 'a=1',
    });

    expect(response.statusCode).toBe(415);
    expect(parseJsonResponse(response)).toMatchObject({ error: 'Unsupported Media Type', statusCode: 415 });
  });

  it('should list Zod issues by path', async () => {
    const response = await app.inject({ method: 'GET', url: '/zod?page=0' });
    const body = parseJsonResponse<{ details: Array<{ path: string }> }>(response);

    expect(response.statusCode).toBe(400);
    expect(body.details.map((d) => d.path)).toEqual(['page']);
  });

  it('should hide unexpected errors', async () => {
    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(parseJsonResponse(response)).toEqual({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});
