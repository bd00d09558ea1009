import type { Server } from 'node:http';
import { z } from 'zod';
import { createApp } from '../app';
import { createServices, type Services } from '../services';
import { JwtTokenService } from '../services/token.service';
import { createTestDatabase, type TestDatabase } from './helpers';

const SECRET = 'test-secret-for-http';

const tokenBodySchema = z.object({
  success: z.literal(true),
  data: z.object({
    accessToken: z.string(),
    tokenType: z.literal('bearer'),
    expiresIn: z.number(),
    expiresAt: z.string(),
  }),
});

interface RequestOptions {
  token?: string;
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
}

interface TestResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

async function startServer(services: Services): Promise<{ server: Server; baseUrl: string }> {
  const app = createApp(services, { corsOrigin: '*' });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function stopServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

describe('HTTP API', () => {
  let database: TestDatabase;
  let services: Services;
  let server: Server;
  let baseUrl: string;

  async function request(method: string, path: string, options: RequestOptions = {}): Promise<TestResponse> {
    const headers: Record<string, string> = { ...options.headers };
    if (options.token) {
      headers.authorization = `Bearer ${options.token}`;
    }
    let body: string | undefined;
    if (options.rawBody !== undefined) {
      body = options.rawBody;
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
    }
    if (body !== undefined && headers['content-type'] === undefined) {
      headers['content-type'] = 'application/json';
    }

    const response = await fetch(`${baseUrl}${path}`, { method, headers, body });
    const text = await response.text();
    return {
      status: response.status,
      headers: response.headers,
      body: text.length > 0 ? JSON.parse(text) : undefined,
    };
  }

  async function login(username = 'alice', password = 'Passw0rdTest'): Promise<string> {
    await request('POST', '/api/v1/auth/register', { body: { username, password } });
    const response = await request('POST', '/api/v1/auth/token', { body: { username, password } });
    return tokenBodySchema.parse(response.body).data.accessToken;
  }

  beforeEach(async () => {
    database = await createTestDatabase();
    services = createServices(database.pool, {
      secretKey: SECRET,
      accessTokenExpireMinutes: 60,
      bcryptRounds: 4,
    });
    ({ server, baseUrl } = await startServer(services));
  });

  afterEach(async () => {
    await stopServer(server);
    await database.cleanup();
  });

  describe('GET /health', () => {
    it('reports a reachable database and pool usage', async () => {
      const response = await request('GET', '/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'ok',
        timestamp: expect.any(String),
        pool: { size: 1, idle: 1, leased: 0, waiting: 0 },
      });
    });

    it('tags every response with a request id', async () => {
      const generated = await request('GET', '/health');
      const echoed = await request('GET', '/health', { headers: { 'x-request-id': 'gauge-42' } });

      expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
      expect(echoed.headers.get('x-request-id')).toBe('gauge-42');
    });
  });

  describe('authentication', () => {
    it('registers a user and issues a bearer token', async () => {
      const registered = await request('POST', '/api/v1/auth/register', {
        body: { username: 'alice', password: 'Passw0rdTest' },
      });
      expect(registered.status).toBe(201);
      expect(registered.body).toEqual({
        success: true,
        data: { id: expect.any(String), username: 'alice', createdAt: expect.any(String) },
      });

      const issued = await request('POST', '/api/v1/auth/token', {
        body: { username: 'alice', password: 'Passw0rdTest' },
      });
      expect(issued.status).toBe(200);
      const token = tokenBodySchema.parse(issued.body).data;
      expect(token.expiresIn).toBe(3600);

      const me = await request('GET', '/api/v1/auth/me', { token: token.accessToken });
      expect(me.body).toMatchObject({ success: true, data: { username: 'alice' } });
    });

    it('rejects a weak password with field details', async () => {
      const response = await request('POST', '/api/v1/auth/register', {
        body: { username: 'alice', password: 'password' },
      });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: [
            {
              field: 'password',
              message: 'Password must contain at least one uppercase letter, Password must contain at least one number',
            },
          ],
        },
      });
    });

    it('refuses a second registration of the same username', async () => {
      await request('POST', '/api/v1/auth/register', { body: { username: 'alice', password: 'Passw0rdTest' } });
      const response = await request('POST', '/api/v1/auth/register', {
        body: { username: 'alice', password: 'Passw0rdTest' },
      });

      expect(response.status).toBe(409);
      expect(response.body).toMatchObject({ error: { code: 'CONFLICT' } });
    });

    it('rejects wrong credentials', async () => {
      await request('POST', '/api/v1/auth/register', { body: { username: 'alice', password: 'Passw0rdTest' } });
      const response = await request('POST', '/api/v1/auth/token', {
        body: { username: 'alice', password: 'Wr0ngPassword' },
      });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'INVALID_CREDENTIALS', message: 'Invalid username or password' },
      });
    });

    it('requires a bearer token on device routes', async () => {
      const missing = await request('GET', '/api/v1/devices');
      const basic = await request('GET', '/api/v1/devices', { headers: { authorization: 'Basic YWxpY2U6c2VjcmV0' } });

      for (const response of [missing, basic]) {
        expect(response.status).toBe(401);
        expect(response.body).toEqual({
          success: false,
          error: { code: 'UNAUTHORIZED', message: 'No token provided' },
        });
      }
    });

    it('answers forged and expired tokens identically', async () => {
      const forged = new JwtTokenService({ secretKey: 'another-test-secret', expireMinutes: 60 }).issue({
        userId: 'user-1',
        username: 'alice',
      });
      const expired = new JwtTokenService({
        secretKey: SECRET,
        expireMinutes: 60,
        now: () => Date.now() - 2 * 60 * 60 * 1000,
      }).issue({ userId: 'user-1', username: 'alice' });

      for (const token of [forged.token, expired.token, 'not-a-token']) {
        const response = await request('GET', '/api/v1/devices', { token });
        expect(response.status).toBe(401);
        expect(response.body).toEqual({
          success: false,
          error: { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
        });
      }
    });
  });

  describe('devices and configuration', () => {
    let token: string;

    beforeEach(async () => {
      token = await login();
    });

    it('manages a device through its configuration lifecycle', async () => {
      const created = await request('POST', '/api/v1/devices', {
        token,
        body: { id: 'sensor-1', name: 'Greenhouse gauge', config: { interval: 10 } },
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        data: {
          device: { id: 'sensor-1', name: 'Greenhouse gauge', type: 'sensor', status: 'active', lastSeenAt: null },
          config: { deviceId: 'sensor-1', version: 1, payload: { interval: 10 }, active: true },
        },
      });

      const updated = await request('PUT', '/api/v1/devices/sensor-1/config', {
        token,
        body: { interval: 20, unit: 'celsius' },
      });
      expect(updated.status).toBe(201);
      expect(updated.body).toMatchObject({ data: { version: 2, active: true } });

      const active = await request('GET', '/api/v1/devices/sensor-1/config', { token });
      expect(active.body).toMatchObject({ data: { version: 2, payload: { interval: 20, unit: 'celsius' } } });

      const first = await request('GET', '/api/v1/devices/sensor-1/config/versions/1', { token });
      expect(first.body).toMatchObject({ data: { version: 1, payload: { interval: 10 }, active: false } });

      const history = await request('GET', '/api/v1/devices/sensor-1/config/history', { token });
      expect(history.body).toMatchObject({
        data: {
          deviceId: 'sensor-1',
          configurations: [
            { version: 1, active: false },
            { version: 2, active: true },
          ],
        },
      });

      const retired = await request('PATCH', '/api/v1/devices/sensor-1', {
        token,
        body: { status: 'decommissioned' },
      });
      expect(retired.body).toMatchObject({ data: { status: 'decommissioned' } });

      const revived = await request('PATCH', '/api/v1/devices/sensor-1', { token, body: { status: 'active' } });
      expect(revived.status).toBe(409);
      expect(revived.body).toEqual({
        success: false,
        error: {
          code: 'INVALID_TRANSITION',
          message: 'Cannot change device status from decommissioned to active',
        },
      });

      const rejected = await request('PUT', '/api/v1/devices/sensor-1/config', { token, body: { interval: 30 } });
      expect(rejected.status).toBe(409);
      expect(rejected.body).toMatchObject({ error: { code: 'CONFLICT', message: 'Device sensor-1 is decommissioned' } });

      const deleted = await request('DELETE', '/api/v1/devices/sensor-1', { token });
      expect(deleted.status).toBe(409);
      expect(deleted.body).toMatchObject({
        error: { code: 'CONFLICT', message: 'Device sensor-1 has configuration history and cannot be deleted' },
      });
    });

    it('records heartbeats and deletes retired devices', async () => {
      await request('POST', '/api/v1/devices', { token, body: { id: 'sensor-2', name: 'Spare', type: 'hygrometer' } });

      const seen = await request('POST', '/api/v1/devices/sensor-2/seen', { token });
      expect(seen.status).toBe(200);
      expect(seen.body).toMatchObject({ data: { id: 'sensor-2', lastSeenAt: expect.any(String) } });

      await request('PATCH', '/api/v1/devices/sensor-2', { token, body: { status: 'decommissioned' } });
      const deleted = await request('DELETE', '/api/v1/devices/sensor-2', { token });
      expect(deleted.status).toBe(200);
      expect(deleted.body).toEqual({ success: true, data: { message: 'Device deleted successfully' } });

      const gone = await request('GET', '/api/v1/devices/sensor-2', { token });
      expect(gone.status).toBe(404);
      expect(gone.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Device sensor-2 not found' },
      });
    });

    it('lists devices with an optional status filter', async () => {
      await request('POST', '/api/v1/devices', { token, body: { id: 'a', name: 'Gauge A' } });
      await request('POST', '/api/v1/devices', { token, body: { id: 'b', name: 'Gauge B' } });
      await request('PATCH', '/api/v1/devices/b', { token, body: { status: 'inactive' } });

      const all = await request('GET', '/api/v1/devices', { token });
      expect(all.body).toMatchObject({ data: { devices: [{ id: 'a' }, { id: 'b' }] } });

      const inactive = await request('GET', '/api/v1/devices?status=inactive', { token });
      expect(inactive.body).toMatchObject({ data: { devices: [{ id: 'b', status: 'inactive' }] } });

      const bogus = await request('GET', '/api/v1/devices?status=broken', { token });
      expect(bogus.status).toBe(400);
      expect(bogus.body).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Invalid query parameters' } });
    });

    it('refuses duplicate devices', async () => {
      await request('POST', '/api/v1/devices', { token, body: { id: 'sensor-1', name: 'Gauge' } });
      const response = await request('POST', '/api/v1/devices', { token, body: { id: 'sensor-1', name: 'Again' } });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'DUPLICATE_DEVICE', message: 'Device sensor-1 already exists' },
      });
    });

    it('validates request bodies and parameters', async () => {
      const unknownField = await request('POST', '/api/v1/devices', {
        token,
        body: { id: 'sensor-1', name: 'Gauge', colour: 'red' },
      });
      expect(unknownField.status).toBe(400);
      expect(unknownField.body).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request data' } });

      await request('POST', '/api/v1/devices', { token, body: { id: 'sensor-1', name: 'Gauge' } });

      const emptyPatch = await request('PATCH', '/api/v1/devices/sensor-1', { token, body: {} });
      expect(emptyPatch.status).toBe(400);
      expect(emptyPatch.body).toMatchObject({
        error: { details: [{ field: '', message: 'At least one field must be provided' }] },
      });

      const arrayPayload = await request('PUT', '/api/v1/devices/sensor-1/config', { token, body: [1, 2] });
      expect(arrayPayload.status).toBe(400);
      expect(arrayPayload.body).toMatchObject({
        error: { message: 'Configuration payload must be a JSON object of JSON values' },
      });

      const badVersion = await request('GET', '/api/v1/devices/sensor-1/config/versions/zero', { token });
      expect(badVersion.status).toBe(400);
      expect(badVersion.body).toMatchObject({ error: { message: 'Invalid path parameters' } });

      const noConfig = await request('GET', '/api/v1/devices/sensor-1/config', { token });
      expect(noConfig.status).toBe(404);
    });

    it('refuses configuration writes without a JSON body', async () => {
      await request('POST', '/api/v1/devices', {
        token,
        body: { id: 'sensor-1', name: 'Gauge', config: { interval: 30 } },
      });

      const plainText = await request('PUT', '/api/v1/devices/sensor-1/config', {
        token,
        rawBody: 'interval=60',
        headers: { 'content-type': 'text/plain' },
      });
      const noBody = await request('PUT', '/api/v1/devices/sensor-1/config', { token });
      const emptyJson = await request('PUT', '/api/v1/devices/sensor-1/config', { token, rawBody: '' });

      for (const response of [plainText, noBody, emptyJson]) {
        expect(response.status).toBe(400);
        expect(response.body).toEqual({
          success: false,
          error: { code: 'VALIDATION_ERROR', message: 'Configuration payload must be a JSON object' },
        });
      }

      const active = await request('GET', '/api/v1/devices/sensor-1/config', { token });
      expect(active.body).toMatchObject({ data: { version: 1, payload: { interval: 30 } } });
    });

    it('registers and lists sensor channels of a device', async () => {
      await request('POST', '/api/v1/devices', { token, body: { id: 'station-1', name: 'Weather station' } });

      const created = await request('POST', '/api/v1/devices/station-1/sensors', {
        token,
        body: { code: 'temp', name: 'Temperature', unit: 'C', rangeMin: -40, rangeMax: 60 },
      });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        success: true,
        data: { deviceId: 'station-1', code: 'temp', scaleFactor: 1, offset: 0, rangeMin: -40, rangeMax: 60 },
      });

      const replaced = await request('POST', '/api/v1/devices/station-1/sensors', {
        token,
        body: { code: 'temp', name: 'Temperature', unit: 'F', offset: 32 },
      });
      expect(replaced.status).toBe(200);
      expect(replaced.body).toMatchObject({ data: { unit: 'F', offset: 32, rangeMin: null } });

      const list = await request('GET', '/api/v1/devices/station-1/sensors', { token });
      expect(list.body).toMatchObject({ data: { deviceId: 'station-1', sensors: [{ code: 'temp', unit: 'F' }] } });

      const one = await request('GET', '/api/v1/devices/station-1/sensors/temp', { token });
      expect(one.body).toMatchObject({ data: { code: 'temp', name: 'Temperature' } });

      const missing = await request('GET', '/api/v1/devices/station-1/sensors/rh', { token });
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Device station-1 has no sensor rh' },
      });
    });

    it('rejects an inverted sensor range', async () => {
      await request('POST', '/api/v1/devices', { token, body: { id: 'station-1', name: 'Weather station' } });

      const response = await request('POST', '/api/v1/devices/station-1/sensors', {
        token,
        body: { name: 'Temperature', unit: 'C', rangeMin: 60, rangeMax: -40 },
      });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Sensor rangeMin must not exceed rangeMax' },
      });
    });

    it('rejects malformed JSON', async () => {
      const response = await request('POST', '/api/v1/devices', { token, rawBody: '{"id": "sensor-1",' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
      });
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await request('GET', '/api/v1/nothing');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/nothing not found' },
    });
  });
});

describe('HTTP API with an exhausted pool', () => {
  let database: TestDatabase;
  let services: Services;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    database = await createTestDatabase({ poolMax: 1, acquireTimeoutMs: 50 });
    services = createServices(database.pool, { secretKey: SECRET, accessTokenExpireMinutes: 60, bcryptRounds: 4 });
    ({ server, baseUrl } = await startServer(services));
  });

  afterEach(async () => {
    await stopServer(server);
    await database.cleanup();
  });

  it('reports the service as unavailable while every connection is leased', async () => {
    const { token } = services.tokens.issue({ userId: 'user-1', username: 'alice' });
    const lease = await database.pool.acquire();

    try {
      const devices = await fetch(`${baseUrl}/api/v1/devices`, { headers: { authorization: `Bearer ${token}` } });
      expect(devices.status).toBe(503);
      expect(await devices.json()).toEqual({
        success: false,
        error: { code: 'SERVICE_UNAVAILABLE', message: 'Service temporarily unavailable' },
      });

      const health = await fetch(`${baseUrl}/health`);
      expect(health.status).toBe(503);
      expect(await health.json()).toMatchObject({ status: 'unavailable', pool: { size: 1, leased: 1 } });
    } finally {
      database.pool.release(lease);
    }
  });
});
