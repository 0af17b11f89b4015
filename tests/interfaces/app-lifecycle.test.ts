import { describe, it, expect } from 'vitest';
import { buildTestApp } from './http-helpers.js';

describe('buildApp', () => {
  it('closes the application context with the server', async () => {
    const { app, close } = await buildTestApp();

    await app.close();

    expect(close).toHaveBeenCalledOnce();
  });

  it('answers unknown routes with 404', async () => {
    const { app } = await buildTestApp();
    const res = await app.inject({ method: 'GET', url: '/api/nope' });

    expect(res.statusCode).toBe(404);
    await app.close();
  });
});
