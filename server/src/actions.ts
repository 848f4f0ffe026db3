/* actions.ts — Primitive one-tick actions and their execution against the grid */

import type { GridEnvironment } from './grid';
import type { Action, ActionResult, Direction, Occupant } from './types';

export const move = (direction: Direction, remaining = 1): Action => ({ kind: 'move', direction, remaining });
export const wait = (): Action => ({ kind: 'wait' });
export const scan = (): Action => ({ kind: 'scan' });

/**
 * Run one action for one drone. Rejections from the grid come back in
 * `outcome` for the owning behavior to handle; nothing here throws.
 */
export function executeAction(action: Action, drone: Occupant, grid: GridEnvironment): ActionResult {
  switch (action.kind) {
    case 'move': {
      const result = grid.move(drone, action.direction);
      return { action, outcome: result.ok ? 'ok' : result.error, detected: [] };
    }
    case 'wait':
      return { action, outcome: 'ok', detected: [] };
    case 'scan': {
      const result = grid.scan(drone);
      return { action, outcome: 'ok', detected: result.found.map(t => t.id) };
    }
  }
}
