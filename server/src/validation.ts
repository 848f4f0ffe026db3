/* validation.ts — Zod schemas + Express middleware for input validation */

import { z } from 'zod';
import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { httpStatusFor, isSimulationError } from './errors';

// ── Schemas ──────────────────────────────────────────────────

export const directionSchema = z.enum(['up', 'down', 'left', 'right']);

export const cellSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

/** Every spec names its kind; the factory for that kind checks the rest */
export const behaviorSpecSchema = z.object({ kind: z.string().min(1) }).passthrough();

export type BehaviorSpec = z.infer<typeof behaviorSpecSchema>;

export const droneIdSchema = z.number().int().min(1);

export const assignModeSchema = z.enum(['replace', 'enqueue']);

export const behaviorCommandSchema = z.object({
  droneId: droneIdSchema,
  behavior: behaviorSpecSchema,
  mode: assignModeSchema.default('replace'),
});

export const moveLegsSchema = z.object({
  droneId: droneIdSchema,
  legs: z.array(z.object({
    direction: directionSchema,
    steps: z.number().int().min(0),
  })).min(1),
  mode: assignModeSchema.default('replace'),
});

export const textCommandSchema = z.object({
  text: z.string().trim().min(1).max(200),
});

export const cancelSchema = z.object({
  droneId: droneIdSchema,
});

export const spawnSchema = z.object({
  x: z.number().int().optional(),
  y: z.number().int().optional(),
}).refine(b => (b.x === undefined) === (b.y === undefined), {
  message: 'x and y must be given together',
});

export const replayParamsSchema = z.object({
  from: z.string().regex(/^\d+$/, 'must be an integer').transform(Number),
  to: z.string().regex(/^\d+$/, 'must be an integer').transform(Number),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'value'}: ${issue.message}`)
    .join('; ');
}

// ── Middleware factories ─────────────────────────────────────

/**
 * Validates req.body against a Zod schema.
 * On success: replaces req.body with parsed data and calls next().
 * On failure: responds 400 with validation error details.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (result.success) {
      req.body = result.data;
      next();
    } else {
      res.status(400).json({
        ok: false,
        error: 'Validation failed',
        details: result.error.issues,
      });
    }
  };
}

/** Same as validateBody, for route parameters. */
export function validateRouteParams(schema: z.ZodTypeAny): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (result.success) {
      next();
    } else {
      res.status(400).json({
        ok: false,
        error: 'Validation failed',
        details: result.error.issues,
      });
    }
  };
}

// ── Error handler (must be LAST middleware) ───────────────────

export interface ErrorResponse {
  status: number;
  body: { ok: false; error: string; code?: string };
}

/** SimulationErrors are the caller's fault; anything else is ours */
export function errorResponse(err: unknown): ErrorResponse {
  if (isSimulationError(err)) {
    return { status: httpStatusFor(err), body: { ok: false, error: err.message, code: err.code } };
  }
  return { status: 500, body: { ok: false, error: 'Internal server error' } };
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  const { status, body } = errorResponse(err);
  if (status === 500) console.error('[ERROR]', err);
  res.status(status).json(body);
};
