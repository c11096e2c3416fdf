import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadRigConfig } from '../config/rig-config.js';

describe('loadRigConfig', () => {
  it('falls back to defaults', () => {
    expect(loadRigConfig({})).toEqual({
      port: 3001,
      seed: undefined,
      ambientTemperature: 25,
      batteryCapacity: 360,
      maxSpeedKph: 45,
      corsOrigin: '*',
    });
  });

  it('coerces numeric variables', () => {
    const config = loadRigConfig({
      PORT: '8080',
      SIM_SEED: '42',
      AMBIENT_TEMP_C: '18.5',
      BATTERY_CAPACITY_WH: '500',
      MAX_SPEED_KPH: '25',
      CORS_ORIGIN: 'http://localhost:3000',
    });
    expect(config).toEqual({
      port: 8080,
      seed: 42,
      ambientTemperature: 18.5,
      batteryCapacity: 500,
      maxSpeedKph: 25,
      corsOrigin: 'http://localhost:3000',
    });
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadRigConfig({ PORT: 'abc' })).toThrow(ZodError);
  });

  it('rejects a zero capacity', () => {
    expect(() => loadRigConfig({ BATTERY_CAPACITY_WH: '0' })).toThrow(ZodError);
  });
});
