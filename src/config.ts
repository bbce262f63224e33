import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_TARGET_AREA_M2 } from './services/divisions/types.js';

// Load .env before anything reads process.env
loadEnv({ path: resolve(process.cwd(), '.env') });
loadEnv({ path: resolve(process.cwd(), '../.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  BACKEND_PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  DIVISION_TARGET_AREA_M2: z.coerce.number().positive().finite().default(DEFAULT_TARGET_AREA_M2),
  MAX_GRID_CELLS: z.coerce.number().int().positive().default(10000),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  frontendOrigin: string;
  divisions: {
    defaultTargetAreaM2: number;
    maxGridCells: number;
  };
}

/**
 * Parse configuration from an environment map. Throws a ZodError listing
 * every invalid variable.
 */
export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const env = envSchema.parse(source);
  return {
    env: env.NODE_ENV,
    port: env.BACKEND_PORT,
    frontendOrigin: env.FRONTEND_URL,
    divisions: {
      defaultTargetAreaM2: env.DIVISION_TARGET_AREA_M2,
      maxGridCells: env.MAX_GRID_CELLS,
    },
  };
}

export const config = parseConfig(process.env);
