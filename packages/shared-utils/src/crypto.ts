/**
 * Cryptographic utilities
 */

import { randomBytes, randomUUID } from 'node:crypto';

const ID_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';

// Generate a random string of specified length from a lowercase alphanumeric alphabet
export function generateRandomString(length: number): string {
  const randomValues = randomBytes(length);
  let result = '';

  for (let i = 0; i < length; i++) {
    result += ID_CHARS.charAt(randomValues[i] % ID_CHARS.length);
  }

  return result;
}

// Server-assigned device identifier, used when the caller does not supply one
export function generateDeviceId(): string {
  return `dev-${generateRandomString(16)}`;
}

export function generateRequestId(): string {
  return randomUUID();
}
