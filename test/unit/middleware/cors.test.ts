import request from 'supertest';
import express, { Express } from 'express';
import { createCorsMiddleware } from '../../../src/middleware/cors';

describe('createCorsMiddleware', () => {
  let app: Express;
  let handler: jest.Mock;

  beforeEach(() => {
    handler = jest.fn((_req: express.Request, res: express.Response) => {
      res.json({ ok: true });
    });
    app = express();
    app.use(createCorsMiddleware());
    app.all('/api/status', handler);
  });

  it('should add permissive headers to regular responses', async () => {
    const response = await request(app).get('/api/status');

    expect(response.status).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('*');
    expect(response.headers['access-control-allow-headers']).toBe('X-API-Key, Content-Type');
    expect(response.headers['access-control-allow-methods']).toBeUndefined();
  });

  it('should answer preflight requests without reaching the route', async () => {
    const response = await request(app).options('/api/status');

    expect(response.status).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('*');
    expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    expect(response.text).toBe('');
    expect(handler).not.toHaveBeenCalled();
  });
});
