/* index.ts — Express + Socket.io server for the grid swarm simulation */

import express from 'express';
import { createServer } from 'http';
import { Server } from 'socket.io';
import { loadServerConfig } from './config';
import {
  type BehaviorCommandBody,
  type CancelBody,
  handleSocketCommand,
  type MoveLegsBody,
  runBehaviorCommand,
  runCancelCommand,
  runMoveCommand,
  runSpawnCommand,
  runTextCommand,
  type SpawnBody,
} from './handlers';
import { setupSecurity, getSocketCorsConfig } from './security';
import { Simulation } from './simulator';
import {
  validateBody,
  validateRouteParams,
  behaviorCommandSchema,
  moveLegsSchema,
  textCommandSchema,
  cancelSchema,
  spawnSchema,
  replayParamsSchema,
  errorHandler,
} from './validation';

const config = loadServerConfig(process.env);

const app = express();

// Security headers + CORS: must come before other middleware
setupSecurity(app, { isDev: config.isDev });

app.use(express.json());

const httpServer = createServer(app);
const io = new Server(httpServer, {
  cors: getSocketCorsConfig({ isDev: config.isDev }),
});

const sim = new Simulation(config.sim);

sim.on('target_detected', (event) => {
  const { droneId, targetId, target } = event.payload;
  console.log(`[SIM] tick ${event.tick}: drone${droneId} found target ${targetId} at (${target.x}, ${target.y})`);
});

sim.on('behavior_stalled', (event) => {
  console.log(`[SIM] tick ${event.tick}: drone${event.payload.droneId} stalled in ${event.payload.behavior}`);
});

// ── REST endpoints for commands ──────────────────────────────

app.post('/cmd/behavior', validateBody(behaviorCommandSchema), (req, res) => {
  const body: BehaviorCommandBody = req.body;
  res.json(runBehaviorCommand(sim, body));
});

app.post('/cmd/move', validateBody(moveLegsSchema), (req, res) => {
  const body: MoveLegsBody = req.body;
  res.json(runMoveCommand(sim, body));
});

app.post('/cmd/text', validateBody(textCommandSchema), (req, res) => {
  const { text }: { text: string } = req.body;
  console.log(`[HTTP] text command: ${text}`);
  res.json(runTextCommand(sim, text));
});

app.post('/cmd/cancel', validateBody(cancelSchema), (req, res) => {
  const body: CancelBody = req.body;
  res.json(runCancelCommand(sim, body));
});

app.post('/cmd/spawn', validateBody(spawnSchema), (req, res) => {
  const body: SpawnBody = req.body;
  res.json(runSpawnCommand(sim, body));
});

app.get('/snapshot', (_req, res) => {
  res.json(sim.snapshot());
});

app.get('/events', (_req, res) => {
  res.json(sim.getEventHistory());
});

// Replay: /replay/info must be registered before /replay/:from/:to
// so Express doesn't match "info" as the :from parameter.
app.get('/replay/info', (_req, res) => {
  res.json(sim.recorder.getInfo());
});

app.get('/replay/:from/:to', validateRouteParams(replayParamsSchema), (req, res) => {
  const from = parseInt(req.params.from, 10);
  const to = parseInt(req.params.to, 10);
  res.json(sim.recorder.getRange(from, to));
});

app.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    uptime: process.uptime(),
    tick: sim.tick,
    droneCount: sim.listDrones().length,
    unfoundTargets: sim.grid.unfoundTargetCount(),
    behaviors: sim.registry.kinds(),
    memoryUsage: process.memoryUsage(),
  });
});

// ── Error handler (must be LAST middleware) ──────────────────
app.use(errorHandler);

// ── Socket.io ────────────────────────────────────────────────

function reply(ack: unknown, value: unknown): void {
  if (typeof ack === 'function') ack(value);
}

io.on('connection', (socket) => {
  console.log(`[WS] Client connected: ${socket.id}`);

  socket.emit('sim:history', sim.getEventHistory());
  socket.emit('sim:state', sim.snapshot());

  socket.on('cmd:behavior', (data: unknown, ack?: unknown) => {
    reply(ack, handleSocketCommand(behaviorCommandSchema, data, body => runBehaviorCommand(sim, body)));
  });

  socket.on('cmd:move', (data: unknown, ack?: unknown) => {
    reply(ack, handleSocketCommand(moveLegsSchema, data, body => runMoveCommand(sim, body)));
  });

  socket.on('cmd:text', (data: unknown, ack?: unknown) => {
    const payload = typeof data === 'string' ? { text: data } : data;
    reply(ack, handleSocketCommand(textCommandSchema, payload, body => runTextCommand(sim, body.text)));
  });

  socket.on('cmd:cancel', (data: unknown, ack?: unknown) => {
    reply(ack, handleSocketCommand(cancelSchema, data, body => runCancelCommand(sim, body)));
  });

  socket.on('cmd:spawn', (data: unknown, ack?: unknown) => {
    reply(ack, handleSocketCommand(spawnSchema, data ?? {}, body => runSpawnCommand(sim, body)));
  });

  socket.on('disconnect', () => {
    console.log(`[WS] Client disconnected: ${socket.id}`);
  });
});

// ── Start ────────────────────────────────────────────────────

function start(): void {
  // Simulation loop
  setInterval(() => {
    try {
      const snapshot = sim.step();
      io.emit('sim:state', snapshot);
    } catch (err) {
      console.error('[TICK] Error in simulation step:', err);
    }
  }, config.tickIntervalMs);

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`Port ${config.port} is already in use. Kill the other process or use a different port.`);
    } else {
      console.error('Server error:', err);
    }
    process.exit(1);
  });

  httpServer.listen(config.port, '0.0.0.0', () => {
    console.log(`\n  Grid Swarm Server`);
    console.log(`  ──────────────────────`);
    console.log(`  HTTP:      http://0.0.0.0:${config.port}`);
    console.log(`  WebSocket: ws://0.0.0.0:${config.port}`);
    console.log(`  Tick rate: ${1000 / config.tickIntervalMs} Hz`);
    console.log(`  Grid:      ${sim.grid.width}×${sim.grid.height}, ${sim.config.occupancy} cells`);
    console.log(`  Drones:    ${sim.listDrones().length}`);
    console.log(`  Targets:   ${sim.grid.targets().length}`);
    console.log(`  ──────────────────────\n`);
  });
}

try {
  start();
} catch (err) {
  console.error('Fatal startup error:', err);
  process.exit(1);
}
