/**
 * API Request/Response Types
 */

import type { ConfigPayload, DeviceStatus } from './models';

// Authentication
export interface RegisterRequest {
  username: string;
  password: string;
}

export interface TokenRequest {
  username: string;
  password: string;
}

export interface TokenResponse {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  expiresAt: string;
}

export interface UserResponse {
  id: string;
  username: string;
  createdAt: string;
}

// Devices
export interface CreateDeviceRequest {
  id?: string;
  name: string;
  type: string;
  location?: string | null;
  firmware?: string | null;
  config?: ConfigPayload;
}

export interface UpdateDeviceRequest {
  name?: string;
  type?: string;
  status?: DeviceStatus;
  location?: string | null;
  firmware?: string | null;
}

// Sensors; `code` defaults to the name and keys the upsert
export interface UpsertSensorRequest {
  code?: string;
  name: string;
  unit: string;
  scaleFactor?: number;
  offset?: number;
  rangeMin?: number | null;
  rangeMax?: number | null;
}

export interface SensorResponse {
  id: number;
  deviceId: string;
  code: string;
  name: string;
  unit: string;
  scaleFactor: number;
  offset: number;
  rangeMin: number | null;
  rangeMax: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface SensorListResponse {
  deviceId: string;
  sensors: SensorResponse[];
}

export interface DeviceResponse {
  id: string;
  name: string;
  type: string;
  location: string | null;
  firmware: string | null;
  status: DeviceStatus;
  createdAt: string;
  lastSeenAt: string | null;
}

export interface CreateDeviceResponse {
  device: DeviceResponse;
  config: ConfigurationResponse | null;
}

export interface DeviceListResponse {
  devices: DeviceResponse[];
}

// Configurations
export interface ConfigurationResponse {
  deviceId: string;
  version: number;
  payload: ConfigPayload;
  active: boolean;
  createdAt: string;
}

export interface ConfigurationHistoryResponse {
  deviceId: string;
  configurations: ConfigurationResponse[];
}

export interface HealthResponse {
  status: 'ok' | 'unavailable';
  timestamp: string;
  pool: {
    size: number;
    idle: number;
    leased: number;
    waiting: number;
  };
}

// Generic API response wrapper
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Error codes
export const ApiErrorCodes = {
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  TOKEN_EXPIRED: 'TOKEN_EXPIRED',
  TOKEN_INVALID_SIGNATURE: 'TOKEN_INVALID_SIGNATURE',
  DUPLICATE_DEVICE: 'DUPLICATE_DEVICE',
  CONFLICT: 'CONFLICT',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  POOL_EXHAUSTED: 'POOL_EXHAUSTED',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ApiErrorCode = (typeof ApiErrorCodes)[keyof typeof ApiErrorCodes];
