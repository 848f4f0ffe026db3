/* registry.ts — Behavior kind name → factory, for building behaviors from parsed commands */

import { z } from 'zod';
import {
  type Behavior,
  Chain,
  Explore,
  MoveSteps,
  MoveToPosition,
  Patrol,
  Scan,
  Wait,
} from './behaviors';
import { SimulationError } from './errors';
import type { GridEnvironment } from './grid';
import { behaviorSpecSchema, cellSchema, directionSchema, formatIssues } from './validation';

// ── Spec schemas ─────────────────────────────────────────────

const moveStepsSpec = z.object({
  kind: z.literal('move_steps'),
  direction: directionSchema,
  count: z.number().int().min(0),
});

const chainSpec = z.object({
  kind: z.literal('chain'),
  steps: z.array(behaviorSpecSchema),
});

const patrolSpec = z.object({
  kind: z.literal('patrol'),
  waypoints: z.array(cellSchema).min(1),
  loops: z.number().int().min(1).optional(),
});

const exploreSpec = z.object({
  kind: z.literal('explore'),
  scanEvery: z.number().int().min(1).optional(),
  maxSteps: z.number().int().min(0).optional(),
  mode: z.enum(['frontier', 'seek']).optional(),
});

const moveToSpec = z.object({
  kind: z.literal('move_to'),
  x: z.number().int(),
  y: z.number().int(),
});

const moveToTargetSpec = z.object({
  kind: z.literal('move_to_target'),
  targetId: z.number().int(),
});

const waitSpec = z.object({
  kind: z.literal('wait'),
  ticks: z.number().int().min(0).optional(),
});

const scanSpec = z.object({ kind: z.literal('scan') });

function parseSpec<S extends z.ZodTypeAny>(schema: S, spec: unknown): z.infer<S> {
  const result = schema.safeParse(spec);
  if (!result.success) {
    throw new SimulationError('InvalidCommand', formatIssues(result.error));
  }
  return result.data;
}

// ── Registry ─────────────────────────────────────────────────

export interface FactoryDeps {
  registry: BehaviorRegistry;
  grid: GridEnvironment;
}

export type BehaviorFactory = (spec: unknown, deps: FactoryDeps) => Behavior;

export class BehaviorRegistry {
  private readonly factories = new Map<string, BehaviorFactory>();

  register(kind: string, factory: BehaviorFactory): this {
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Build a behavior from an untyped spec.
   * Throws UnknownBehavior for an unregistered kind and InvalidCommand
   * (or UnknownTarget) when the spec does not fit it.
   */
  create(spec: unknown, grid: GridEnvironment): Behavior {
    const head = parseSpec(behaviorSpecSchema, spec);
    const factory = this.factories.get(head.kind);
    if (!factory) {
      throw new SimulationError('UnknownBehavior', `Unknown behavior kind "${head.kind}"`);
    }
    return factory(spec, { registry: this, grid });
  }
}

export function createDefaultRegistry(): BehaviorRegistry {
  return new BehaviorRegistry()
    .register('move_steps', (spec) => {
      const s = parseSpec(moveStepsSpec, spec);
      return new MoveSteps(s.direction, s.count);
    })
    .register('chain', (spec, deps) => {
      const s = parseSpec(chainSpec, spec);
      return new Chain(s.steps.map(step => deps.registry.create(step, deps.grid)));
    })
    .register('patrol', (spec) => {
      const s = parseSpec(patrolSpec, spec);
      return new Patrol(s.waypoints, s.loops);
    })
    .register('explore', (spec) => {
      const s = parseSpec(exploreSpec, spec);
      return new Explore({ scanEvery: s.scanEvery, maxSteps: s.maxSteps, mode: s.mode });
    })
    .register('move_to', (spec) => {
      const s = parseSpec(moveToSpec, spec);
      return new MoveToPosition({ x: s.x, y: s.y });
    })
    .register('move_to_target', (spec, deps) => {
      const s = parseSpec(moveToTargetSpec, spec);
      const target = deps.grid.getTarget(s.targetId);
      if (!target) {
        throw new SimulationError('UnknownTarget', `Target ${s.targetId} does not exist`);
      }
      return new MoveToPosition(target.position);
    })
    .register('wait', (spec) => {
      const s = parseSpec(waitSpec, spec);
      return new Wait(s.ticks ?? 1);
    })
    .register('scan', (spec) => {
      parseSpec(scanSpec, spec);
      return new Scan();
    });
}
