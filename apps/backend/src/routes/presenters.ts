import type {
  Configuration,
  ConfigurationResponse,
  Device,
  DeviceResponse,
  Sensor,
  SensorResponse,
  User,
  UserResponse,
} from '@sensor-registry/shared-types';

export function toDeviceResponse(device: Device): DeviceResponse {
  return {
    id: device.id,
    name: device.name,
    type: device.type,
    location: device.location,
    firmware: device.firmware,
    status: device.status,
    createdAt: device.createdAt.toISOString(),
    lastSeenAt: device.lastSeenAt?.toISOString() ?? null,
  };
}

export function toConfigurationResponse(config: Configuration): ConfigurationResponse {
  return {
    deviceId: config.deviceId,
    version: config.version,
    payload: config.payload,
    active: config.active,
    createdAt: config.createdAt.toISOString(),
  };
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    createdAt: user.createdAt.toISOString(),
  };
}

export function toSensorResponse(sensor: Sensor): SensorResponse {
  return {
    id: sensor.id,
    deviceId: sensor.deviceId,
    code: sensor.code,
    name: sensor.name,
    unit: sensor.unit,
    scaleFactor: sensor.scaleFactor,
    offset: sensor.offset,
    rangeMin: sensor.rangeMin,
    rangeMax: sensor.rangeMax,
    createdAt: sensor.createdAt.toISOString(),
    updatedAt: sensor.updatedAt.toISOString(),
  };
}
