import type { AppConfig } from '../config';
import type { DatabasePool } from '../db';
import { AuthService } from './auth.service';
import { ConfigurationStore } from './config.service';
import { DeviceRegistry } from './device.service';
import { SensorRegistry } from './sensor.service';
import { JwtTokenService, type TokenVerifier } from './token.service';

export interface Services {
  pool: DatabasePool;
  tokens: TokenVerifier;
  auth: AuthService;
  devices: DeviceRegistry;
  configs: ConfigurationStore;
  sensors: SensorRegistry;
}

export type ServiceConfig = Pick<AppConfig, 'secretKey' | 'accessTokenExpireMinutes' | 'bcryptRounds'>;

export function createServices(pool: DatabasePool, config: ServiceConfig): Services {
  const tokens = new JwtTokenService({
    secretKey: config.secretKey,
    expireMinutes: config.accessTokenExpireMinutes,
  });

  return {
    pool,
    tokens,
    auth: new AuthService(pool, tokens, { bcryptRounds: config.bcryptRounds }),
    devices: new DeviceRegistry(pool),
    configs: new ConfigurationStore(pool),
    sensors: new SensorRegistry(pool),
  };
}
