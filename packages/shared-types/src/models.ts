/**
 * Core domain models used across the application
 */

export const DEVICE_STATUSES = ['active', 'inactive', 'decommissioned'] as const;

export type DeviceStatus = (typeof DEVICE_STATUSES)[number];

// Device model
export interface Device {
  id: string;
  name: string;
  type: string;
  location: string | null;
  firmware: string | null;
  status: DeviceStatus;
  createdAt: Date;
  lastSeenAt: Date | null;
}

export interface DeviceFilter {
  status?: DeviceStatus;
}

export type ConfigPayload = { [key: string]: unknown };

// Configuration version owned by a device
export interface Configuration {
  id: number;
  deviceId: string;
  version: number;
  payload: ConfigPayload;
  active: boolean;
  createdAt: Date;
}

// API caller
export interface User {
  id: string;
  username: string;
  createdAt: Date;
}

// Identity carried by a verified access token
export interface Subject {
  userId: string;
  username: string;
}

// Measurement channel registered under a device
export interface Sensor {
  id: number;
  deviceId: string;
  code: string;
  name: string;
  unit: string;
  scaleFactor: number;
  offset: number;
  rangeMin: number | null;
  rangeMax: number | null;
  createdAt: Date;
  updatedAt: Date;
}
