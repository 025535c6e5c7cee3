import request from 'supertest';
import { Application } from 'express';
import { createExpressApp } from '../../../src/server';
import { SystemStats } from '../../../src/services/system-stats';
import { HealthProbe, StatusReporter, Supervisor } from '../../../src/supervisor';
import { initializeLogger } from '../../../src/utils';
import {
  FakeSpawner,
  MemoryLogOutput,
  createFakeSpawner,
  createSilentLogger,
  createTestCatalog,
  flushIo,
} from '../../unit/helpers/mock-factories';

const API_KEY = 'test-secret';

describe('Control API Integration Tests', () => {
  let app: Application;
  let spawner: FakeSpawner;
  let supervisor: Supervisor;
  let connect: jest.Mock<Promise<void>, []>;
  let collect: jest.Mock<Promise<SystemStats>, []>;

  beforeAll(() => {
    initializeLogger({ level: 'error' }, new MemoryLogOutput());
  });

  beforeEach(() => {
    const catalog = createTestCatalog();
    spawner = createFakeSpawner();
    supervisor = new Supervisor({
      catalog,
      spawner,
      logger: createSilentLogger(),
      stopTimeoutMs: 50,
      captureDrainMs: 50,
    });
    connect = jest.fn<Promise<void>, []>(async () => undefined);
    collect = jest.fn<Promise<SystemStats>, []>(async () => ({
      gpu: null,
      memory: { used_gb: 12.5, total_gb: 64 },
    }));

    const healthProbe = new HealthProbe({
      source: supervisor,
      connector: { connect },
      logger: createSilentLogger(),
    });

    app = createExpressApp({
      supervisor,
      statusReporter: new StatusReporter({ supervisor, healthProbe }),
      catalog,
      statsService: { collect },
      apiKey: API_KEY,
      host: '127.0.0.1',
      port: 8765,
    });
  });

  afterEach(async () => {
    await supervisor.stop();
  });

  const api = {
    get: (path: string) => request(app).get(path).set('X-API-Key', API_KEY),
    post: (path: string) => request(app).post(path).set('X-API-Key', API_KEY),
  };

  describe('access control', () => {
    it('should serve the control panel without a key', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/text\/html/);
    });

    it('should reject API calls without a key', async () => {
      const response = await request(app).get('/api/status');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ error: 'Unauthorized' });
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should reject unknown paths without a key', async () => {
      const response = await request(app).get('/api/unknown');

      expect(response.status).toBe(401);
    });

    it('should answer unknown paths with 404 once authenticated', async () => {
      const response = await api.get('/api/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
    });

    it('should answer preflight requests without a key', async () => {
      const response = await request(app).options('/api/start/alpha');

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });
  });

  describe('GET /api/status', () => {
    it('should report idle and count requests', async () => {
      const first = await api.get('/api/status');
      const second = await api.get('/api/status');

      expect(first.body).toEqual({ running: false, request_count: 1 });
      expect(second.body).toEqual({ running: false, request_count: 2 });
    });

    it('should report an unhealthy endpoint while the model loads', async () => {
      connect.mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
      await api.post('/api/start/alpha');

      const response = await api.get('/api/status');

      expect(response.body).toMatchObject({
        running: true,
        health: { healthy: false, reason: 'port_not_responding' },
      });
    });

    it('should report a crash once and then idle', async () => {
      await api.post('/api/start/alpha');
      spawner.children[0]?.exit(1);

      const crashed = await api.get('/api/status');
      const after = await api.get('/api/status');

      expect(crashed.body).toEqual({
        running: false,
        message: 'process exited with code 1',
        request_count: 1,
      });
      expect(after.body).toEqual({ running: false, request_count: 2 });
    });
  });

  describe('start and stop', () => {
    it('should start, report and stop a model', async () => {
      const started = await api.post('/api/start/alpha');

      expect(started.status).toBe(200);
      expect(started.body).toEqual({ success: true, model: 'alpha', name: 'Alpha 7B', pid: 1001 });

      const status = await api.get('/api/status');

      expect(status.body).toMatchObject({
        running: true,
        model: 'alpha',
        name: 'Alpha 7B',
        pid: 1001,
        health: { healthy: true },
        request_count: 1,
      });
      expect(status.body.uptime_seconds).toBeGreaterThanOrEqual(0);

      const stopped = await api.post('/api/stop');

      expect(stopped.body).toEqual({ success: true, stopped: 'alpha', name: 'Alpha 7B' });
      expect(spawner.children[0]?.kill).toHaveBeenCalledWith('SIGTERM');

      const idle = await api.get('/api/status');

      expect(idle.body).toEqual({ running: false, request_count: 2 });
    });

    it('should switch models on a second start', async () => {
      await api.post('/api/start/alpha');

      const response = await api.post('/api/start/beta');

      expect(response.body).toEqual({ success: true, model: 'beta', name: 'Beta 13B', pid: 1002 });
      expect(spawner.children[0]?.exited).toBe(true);
    });

    it('should answer an unknown model with success false', async () => {
      const response = await api.post('/api/start/gamma');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: false, code: 'UNKNOWN_MODEL', error: 'Unknown model: gamma' });
    });

    it('should report a launch failure', async () => {
      spawner.failNextWith('ENOENT');

      const response = await api.post('/api/start/alpha');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: false,
        code: 'LAUNCH_FAILURE',
        error: 'llama-server not found at /opt/llama/llama-server',
      });
    });

    it('should report when there is nothing to stop', async () => {
      const response = await api.post('/api/stop');

      expect(response.body).toEqual({ success: true, message: 'No model running' });
    });
  });

  describe('GET /api/logs', () => {
    beforeEach(async () => {
      await api.post('/api/start/alpha');
      for (let i = 1; i <= 8; i++) {
        spawner.children[0]?.writeStdout(`output line ${i}\n`);
      }
      await flushIo();
    });

    it('should return every line when fewer exist than requested', async () => {
      const response = await api.get('/api/logs?lines=30');

      expect(response.status).toBe(200);
      expect(response.body).toHaveLength(10);
      expect(response.body[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] Starting Alpha 7B\.\.\.$/);
      expect(response.body[9]).toMatch(/^\[\d{2}:\d{2}:\d{2}\] output line 8$/);
    });

    it('should return the newest lines in order', async () => {
      const response = await api.get('/api/logs?lines=2');

      expect(response.body).toHaveLength(2);
      expect(response.body[0]).toMatch(/ output line 7$/);
      expect(response.body[1]).toMatch(/ output line 8$/);
    });

    it('should default to 50 lines', async () => {
      const response = await api.get('/api/logs');

      expect(response.body).toHaveLength(10);
    });

    it('should reject a negative count', async () => {
      const response = await api.get('/api/logs?lines=-1');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'lines: lines must not be negative', code: 'VALIDATION_ERROR' });
    });

    it('should reject a non-numeric count', async () => {
      const response = await api.get('/api/logs?lines=abc');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('informational routes', () => {
    it('should list configured models', async () => {
      const response = await api.get('/api/models');

      expect(response.body).toEqual({
        alpha: { name: 'Alpha 7B', context: 4096 },
        beta: { name: 'Beta 13B', context: 8192 },
      });
    });

    it('should return system stats', async () => {
      const response = await api.get('/api/stats');

      expect(response.body).toEqual({ gpu: null, memory: { used_gb: 12.5, total_gb: 64 } });
      expect(collect).toHaveBeenCalledTimes(1);
    });

    it('should describe the network', async () => {
      const response = await api.get('/api/network');

      expect(typeof response.body.hostname).toBe('string');
      expect(response.body.urls).toEqual(['http://localhost:8765']);
    });

    it('should report the version', async () => {
      const response = await api.get('/api/version');

      expect(response.body).toEqual({ version: '2.1.0', name: 'LLM Launcher Control Server' });
    });
  });
});
