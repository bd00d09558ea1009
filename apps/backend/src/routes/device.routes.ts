import { Router, type Request, type Response, type NextFunction, type RequestHandler } from 'express';
import { z } from 'zod';
import {
  DEVICE_STATUSES,
  type ConfigurationHistoryResponse,
  type CreateDeviceRequest,
  type CreateDeviceResponse,
  type DeviceListResponse,
  type SensorListResponse,
  type UpdateDeviceRequest,
  type UpsertSensorRequest,
} from '@sensor-registry/shared-types';
import { parseRequest, requireJsonBody } from '../lib/request-validation';
import type { ConfigurationStore } from '../services/config.service';
import type { DeviceRegistry } from '../services/device.service';
import type { SensorRegistry } from '../services/sensor.service';
import { toConfigurationResponse, toDeviceResponse, toSensorResponse } from './presenters';

const deviceIdSchema = z.object({
  deviceId: z.string().min(1),
});

const versionParamsSchema = deviceIdSchema.extend({
  version: z.coerce.number().int().positive(),
});

const createDeviceSchema = z
  .object({
    id: z.string().optional(),
    name: z.string(),
    type: z.string().default('sensor'),
    location: z.string().max(200).nullable().optional(),
    firmware: z.string().max(100).nullable().optional(),
    config: z.record(z.unknown()).optional(),
  })
  .strict();

const updateDeviceSchema = z
  .object({
    name: z.string().optional(),
    type: z.string().optional(),
    status: z.enum(DEVICE_STATUSES).optional(),
    location: z.string().max(200).nullable().optional(),
    firmware: z.string().max(100).nullable().optional(),
  })
  .strict()
  .refine((fields) => Object.keys(fields).length > 0, 'At least one field must be provided');

const sensorParamsSchema = deviceIdSchema.extend({
  code: z.string().min(1),
});

const upsertSensorSchema = z
  .object({
    code: z.string().optional(),
    name: z.string(),
    unit: z.string(),
    scaleFactor: z.number().finite().optional(),
    offset: z.number().finite().optional(),
    rangeMin: z.number().finite().nullable().optional(),
    rangeMax: z.number().finite().nullable().optional(),
  })
  .strict();

const listQuerySchema = z.object({
  status: z.enum(DEVICE_STATUSES).optional(),
});

export interface DeviceRouteDependencies {
  devices: DeviceRegistry;
  configs: ConfigurationStore;
  sensors: SensorRegistry;
  requireAuth: RequestHandler;
}

export function createDeviceRoutes({ devices, configs, sensors, requireAuth }: DeviceRouteDependencies): Router {
  const router = Router();

  router.use(requireAuth);

  // POST /api/v1/devices
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: CreateDeviceRequest = parseRequest(createDeviceSchema, req.body, 'body');
      const { device, config } = await devices.create(input);

      const data: CreateDeviceResponse = {
        device: toDeviceResponse(device),
        config: config ? toConfigurationResponse(config) : null,
      };
      res.status(201).json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status } = parseRequest(listQuerySchema, req.query, 'query');
      const list = await devices.list({ status }).toArray();

      const data: DeviceListResponse = { devices: list.map(toDeviceResponse) };
      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId
  router.get('/:deviceId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const device = await devices.get(deviceId);

      res.json({ success: true, data: toDeviceResponse(device) });
    } catch (error) {
      next(error);
    }
  });

  // PATCH /api/v1/devices/:deviceId
  router.patch('/:deviceId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const fields: UpdateDeviceRequest = parseRequest(updateDeviceSchema, req.body, 'body');
      const device = await devices.update(deviceId, fields);

      res.json({ success: true, data: toDeviceResponse(device) });
    } catch (error) {
      next(error);
    }
  });

  // DELETE /api/v1/devices/:deviceId
  router.delete('/:deviceId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      await devices.delete(deviceId);

      res.json({
        success: true,
        data: { message: 'Device deleted successfully' },
      });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/devices/:deviceId/seen
  router.post('/:deviceId/seen', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const device = await devices.markSeen(deviceId);

      res.json({ success: true, data: toDeviceResponse(device) });
    } catch (error) {
      next(error);
    }
  });

  // PUT /api/v1/devices/:deviceId/config
  router.put('/:deviceId/config', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      requireJsonBody(req, 'Configuration payload must be a JSON object');
      const config = await configs.setConfig(deviceId, req.body);

      res.status(201).json({ success: true, data: toConfigurationResponse(config) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId/config
  router.get('/:deviceId/config', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const config = await configs.getActiveConfig(deviceId);

      res.json({ success: true, data: toConfigurationResponse(config) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId/config/history
  router.get('/:deviceId/config/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const history = await configs.getHistory(deviceId);

      const data: ConfigurationHistoryResponse = {
        deviceId,
        configurations: (await history.toArray()).map(toConfigurationResponse),
      };
      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId/config/versions/:version
  router.get('/:deviceId/config/versions/:version', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId, version } = parseRequest(versionParamsSchema, req.params, 'params');
      const config = await configs.getVersion(deviceId, version);

      res.json({ success: true, data: toConfigurationResponse(config) });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/v1/devices/:deviceId/sensors
  router.post('/:deviceId/sensors', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const input: UpsertSensorRequest = parseRequest(upsertSensorSchema, req.body, 'body');
      const { sensor, created } = await sensors.upsert(deviceId, input);

      res.status(created ? 201 : 200).json({ success: true, data: toSensorResponse(sensor) });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId/sensors
  router.get('/:deviceId/sensors', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId } = parseRequest(deviceIdSchema, req.params, 'params');
      const list = await sensors.list(deviceId);

      const data: SensorListResponse = { deviceId, sensors: list.map(toSensorResponse) };
      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/devices/:deviceId/sensors/:code
  router.get('/:deviceId/sensors/:code', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { deviceId, code } = parseRequest(sensorParamsSchema, req.params, 'params');
      const sensor = await sensors.get(deviceId, code);

      res.json({ success: true, data: toSensorResponse(sensor) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
