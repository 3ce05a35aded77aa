import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import pg from 'pg';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { AppError } from '../../../../src/shared/http/errors';

function databaseError(code: string, constraint: string): Error {
  const err = new pg.DatabaseError('duplicate key value violates unique constraint', 0, 'error');
  err.code = code;
  err.constraint = constraint;
  return err;
}

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  function appThrowing(err: Error): FastifyInstance {
    const instance = Fastify({ logger: false });
    registerErrorHandler(instance);
    instance.get('/boom', async () => {
      throw err;
    });
    return instance;
  }

  it('maps a unique violation to 409 CONFLICT', async () => {
    app = appThrowing(databaseError('23505', 'products_tenant_id_sku_unique'));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      error: { code: 'CONFLICT', message: 'This record already exists.' },
    });
  });

  it('keeps other database errors internal', async () => {
    app = appThrowing(databaseError('23503', 'version_materials_material_id_fkey'));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: { code: 'INTERNAL', message: 'Internal server error' },
    });
  });

  it('maps AppError by its own status and code', async () => {
    app = appThrowing(AppError.locked('This request is SUBMITTED and can no longer be edited.'));

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(423);
    expect(res.json()).toEqual({
      error: { code: 'LOCKED', message: 'This request is SUBMITTED and can no longer be edited.' },
    });
  });
});
