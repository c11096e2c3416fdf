import { z } from 'zod';

/**
 * Scooter rig configuration, read from the environment.
 *
 *   PORT                 HTTP port (default: 3001)
 *   SIM_SEED             Seed for replayable runs (default: unseeded)
 *   AMBIENT_TEMP_C       Base ambient temperature (default: 25)
 *   BATTERY_CAPACITY_WH  Pack energy rating (default: 360)
 *   MAX_SPEED_KPH        Motor speed limit (default: 45)
 *   CORS_ORIGIN          Allowed origin (default: *)
 */
const rigEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  SIM_SEED: z.coerce.number().int().optional(),
  AMBIENT_TEMP_C: z.coerce.number().default(25),
  BATTERY_CAPACITY_WH: z.coerce.number().positive().default(360),
  MAX_SPEED_KPH: z.coerce.number().positive().default(45),
  CORS_ORIGIN: z.string().default('*'),
});

export interface RigConfig {
  port: number;
  seed?: number;
  ambientTemperature: number;
  batteryCapacity: number;
  maxSpeedKph: number;
  corsOrigin: string;
}

/** Throws a ZodError naming every invalid variable. */
export function loadRigConfig(env: NodeJS.ProcessEnv = process.env): RigConfig {
  const parsed = rigEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    seed: parsed.SIM_SEED,
    ambientTemperature: parsed.AMBIENT_TEMP_C,
    batteryCapacity: parsed.BATTERY_CAPACITY_WH,
    maxSpeedKph: parsed.MAX_SPEED_KPH,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
