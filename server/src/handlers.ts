/* handlers.ts — Command handlers shared by the REST routes and socket events */

import type { z } from 'zod';
import { parseCommand } from './commands';
import { isSimulationError, type SimErrorCode } from './errors';
import type { Simulation } from './simulator';
import {
  type behaviorCommandSchema,
  type cancelSchema,
  formatIssues,
  type moveLegsSchema,
  type spawnSchema,
} from './validation';

export type BehaviorCommandBody = z.output<typeof behaviorCommandSchema>;
export type MoveLegsBody = z.output<typeof moveLegsSchema>;
export type CancelBody = z.output<typeof cancelSchema>;
export type SpawnBody = z.output<typeof spawnSchema>;

export interface CommandReply {
  ok: true;
  droneId: number;
  msg: string;
}

export interface CommandRejection {
  ok: false;
  error: string;
  code?: SimErrorCode;
}

export function runBehaviorCommand(sim: Simulation, body: BehaviorCommandBody): CommandReply {
  const behavior = sim.issue(body);
  return { ok: true, droneId: body.droneId, msg: `${behavior.kind} (${body.mode})` };
}

export function runMoveCommand(sim: Simulation, body: MoveLegsBody): CommandReply {
  sim.moveLegs(body.droneId, body.legs, body.mode);
  const legs = body.legs.map(l => `${l.direction}=${l.steps}`).join(' and ');
  return { ok: true, droneId: body.droneId, msg: `move ${legs} (${body.mode})` };
}

export function runTextCommand(sim: Simulation, text: string): CommandReply {
  const parsed = parseCommand(text);
  if (parsed.type === 'stop') {
    sim.cancel(parsed.droneId);
    return { ok: true, droneId: parsed.droneId, msg: 'stopped' };
  }
  return runBehaviorCommand(sim, parsed);
}

export function runCancelCommand(sim: Simulation, body: CancelBody): CommandReply {
  const hadWork = sim.cancel(body.droneId);
  return { ok: true, droneId: body.droneId, msg: hadWork ? 'cancelled' : 'already idle' };
}

export function runSpawnCommand(sim: Simulation, body: SpawnBody): CommandReply {
  const cell = body.x !== undefined && body.y !== undefined ? { x: body.x, y: body.y } : undefined;
  const drone = sim.spawnDrone(cell);
  return { ok: true, droneId: drone.id, msg: `${drone.name} at (${drone.position.x}, ${drone.position.y})` };
}

/**
 * Socket commands have no middleware chain: validate, run, and turn
 * rejections into a reply for the ack callback.
 */
export function handleSocketCommand<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  run: (body: T) => CommandReply,
): CommandReply | CommandRejection {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: `Validation failed: ${formatIssues(parsed.error)}` };
  }
  try {
    return run(parsed.data);
  } catch (err) {
    if (isSimulationError(err)) {
      return { ok: false, error: err.message, code: err.code };
    }
    console.error('[WS] Command failed:', err);
    return { ok: false, error: 'Internal server error' };
  }
}
