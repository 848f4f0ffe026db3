/* config.ts — Simulation and server configuration */

import { z } from 'zod';
import { SimulationError } from './errors';
import { cellSchema, formatIssues } from './validation';

// ── Simulation ───────────────────────────────────────────────

export const simConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  numDrones: z.number().int().min(0).default(0),
  numTargets: z.number().int().min(0).default(0),
  /** Chebyshev radius; 0 sees only the drone's own cell */
  detectionRange: z.number().int().min(0).default(1),
  /** Same seed + same commands → same run */
  seed: z.union([z.string(), z.number()]).optional(),
  occupancy: z.enum(['shared', 'exclusive']).default('shared'),
  /** Blocked moves a behavior may retry before it stalls */
  maxRetries: z.number().int().min(0).default(1),
  obstacles: z.array(cellSchema).default([]),
  passiveSensing: z.boolean().default(false),
});

export type SimConfigInput = z.input<typeof simConfigSchema>;
export type SimConfig = z.output<typeof simConfigSchema>;

export function parseSimConfig(input: unknown): SimConfig {
  const result = simConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SimulationError('InvalidConfig', formatIssues(result.error));
  }
  return result.data;
}

// ── Server (environment) ─────────────────────────────────────

const flagSchema = z.enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(9754),
  TICK_INTERVAL_MS: z.coerce.number().int().min(10).default(100),
  SIM_WIDTH: z.coerce.number().int().positive().default(20),
  SIM_HEIGHT: z.coerce.number().int().positive().default(15),
  SIM_DRONES: z.coerce.number().int().min(0).default(3),
  SIM_TARGETS: z.coerce.number().int().min(0).default(3),
  SIM_DETECTION_RANGE: z.coerce.number().int().min(0).default(2),
  SIM_SEED: z.string().min(1).optional(),
  SIM_OCCUPANCY: z.enum(['shared', 'exclusive']).default('shared'),
  SIM_PASSIVE_SENSING: flagSchema.default('false'),
  NODE_ENV: z.string().optional(),
});

export interface ServerConfig {
  port: number;
  tickIntervalMs: number;
  isDev: boolean;
  sim: SimConfig;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new SimulationError('InvalidConfig', formatIssues(result.error));
  }
  const e = result.data;
  return {
    port: e.PORT,
    tickIntervalMs: e.TICK_INTERVAL_MS,
    isDev: e.NODE_ENV !== 'production',
    sim: parseSimConfig({
      width: e.SIM_WIDTH,
      height: e.SIM_HEIGHT,
      numDrones: e.SIM_DRONES,
      numTargets: e.SIM_TARGETS,
      detectionRange: e.SIM_DETECTION_RANGE,
      seed: e.SIM_SEED,
      occupancy: e.SIM_OCCUPANCY,
      passiveSensing: e.SIM_PASSIVE_SENSING,
    }),
  };
}
