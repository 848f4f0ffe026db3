/**
 * commands.ts — Text command parser
 *
 *   move drone1 up=3 and right=2
 *   goto drone2 4,7            goto drone2 target=3
 *   patrol drone1 0,0 5,0 5,5 [loops=2]
 *   explore drone3 [every=2] [steps=40] [seek]
 *   scan drone1                wait drone1 [5]
 *   stop drone1
 *
 * A leading `then` queues the behavior after the current one instead of
 * replacing it. Parsing never touches a simulation; the result is the
 * same command shape the REST API takes.
 */

import { SimulationError } from './errors';
import type { AssignMode } from './simulator';
import type { BehaviorSpec } from './validation';

export type ParsedCommand =
  | { type: 'behavior'; droneId: number; behavior: BehaviorSpec; mode: AssignMode }
  | { type: 'stop'; droneId: number };

const COMMAND_RE = /^(then\s+)?([a-z]+)\s+drone\s*(\d+)\b\s*(.*)$/;
const LEG_RE = /^(up|down|left|right)=(\d+)$/;
const CELL_RE = /^(-?\d+)\s*,\s*(-?\d+)$/;
const OPTION_RE = /^([a-z]+)=(\d+)$/;

function invalid(message: string): SimulationError {
  return new SimulationError('InvalidCommand', message);
}

/** `key=value` options plus bare words; anything else is an error */
function readOptions(args: string[], allowed: string[], flags: string[] = []): {
  values: Map<string, number>;
  flags: Set<string>;
} {
  const values = new Map<string, number>();
  const set = new Set<string>();
  for (const arg of args) {
    const m = OPTION_RE.exec(arg);
    if (m && allowed.includes(m[1])) {
      values.set(m[1], Number(m[2]));
    } else if (flags.includes(arg)) {
      set.add(arg);
    } else {
      throw invalid(`Unexpected argument "${arg}"`);
    }
  }
  return { values, flags: set };
}

function parseCell(token: string): { x: number; y: number } {
  const m = CELL_RE.exec(token);
  if (!m) throw invalid(`Expected a cell like 3,4 but got "${token}"`);
  return { x: Number(m[1]), y: Number(m[2]) };
}

function parseMove(rest: string): BehaviorSpec {
  const parts = rest
    .replace(/\s*=\s*/g, '=')
    .split(/[\s,]+/)
    .filter(p => p.length > 0 && p !== 'and');
  if (parts.length === 0) throw invalid('move needs at least one leg, e.g. up=3');

  const steps = parts.map(part => {
    const m = LEG_RE.exec(part);
    if (!m) throw invalid(`Bad leg "${part}", expected direction=steps`);
    return { kind: 'move_steps', direction: m[1], count: Number(m[2]) };
  });
  return { kind: 'chain', steps };
}

function parseGoto(args: string[]): BehaviorSpec {
  if (args.length === 1) {
    const target = /^target=(\d+)$/.exec(args[0]);
    if (target) return { kind: 'move_to_target', targetId: Number(target[1]) };
    const cell = parseCell(args[0]);
    return { kind: 'move_to', x: cell.x, y: cell.y };
  }
  if (args.length === 2) {
    const { values } = readOptions(args, ['x', 'y']);
    const x = values.get('x');
    const y = values.get('y');
    if (x !== undefined && y !== undefined) return { kind: 'move_to', x, y };
  }
  throw invalid('goto needs a cell (4,7), x=4 y=7 or target=N');
}

function parsePatrol(args: string[]): BehaviorSpec {
  const cells = args.filter(a => CELL_RE.test(a));
  if (cells.length === 0) throw invalid('patrol needs at least one waypoint');
  const { values } = readOptions(args.filter(a => !CELL_RE.test(a)), ['loops']);
  const loops = values.get('loops');
  return {
    kind: 'patrol',
    waypoints: cells.map(parseCell),
    ...(loops !== undefined ? { loops } : {}),
  };
}

function parseExplore(args: string[]): BehaviorSpec {
  const { values, flags } = readOptions(args, ['every', 'steps'], ['seek']);
  const scanEvery = values.get('every');
  const maxSteps = values.get('steps');
  return {
    kind: 'explore',
    ...(scanEvery !== undefined ? { scanEvery } : {}),
    ...(maxSteps !== undefined ? { maxSteps } : {}),
    ...(flags.has('seek') ? { mode: 'seek' } : {}),
  };
}

function parseWait(args: string[]): BehaviorSpec {
  if (args.length === 0) return { kind: 'wait' };
  if (args.length === 1 && /^\d+$/.test(args[0])) return { kind: 'wait', ticks: Number(args[0]) };
  const { values } = readOptions(args, ['ticks']);
  return { kind: 'wait', ticks: values.get('ticks') };
}

export function parseCommand(text: string): ParsedCommand {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
  const m = COMMAND_RE.exec(normalized);
  if (!m) throw invalid(`Could not parse "${text.trim()}", expected "<command> drone<N> ..."`);

  const [, then, verb, id, rest] = m;
  const droneId = Number(id);
  const args = rest.length > 0 ? rest.split(' ') : [];
  const mode: AssignMode = then ? 'enqueue' : 'replace';

  if (verb === 'stop') {
    if (then) throw invalid('stop cannot be queued');
    if (args.length > 0) throw invalid('stop takes no arguments');
    return { type: 'stop', droneId };
  }

  let behavior: BehaviorSpec;
  switch (verb) {
    case 'move':
      behavior = parseMove(rest);
      break;
    case 'goto':
      behavior = parseGoto(args);
      break;
    case 'patrol':
      behavior = parsePatrol(args);
      break;
    case 'explore':
      behavior = parseExplore(args);
      break;
    case 'scan':
      if (args.length > 0) throw invalid('scan takes no arguments');
      behavior = { kind: 'scan' };
      break;
    case 'wait':
      behavior = parseWait(args);
      break;
    default:
      throw invalid(`Unknown command "${verb}"`);
  }
  return { type: 'behavior', droneId, behavior, mode };
}
