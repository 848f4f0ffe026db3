/* security.ts — helmet + CORS configuration for the simulation server */

import helmet from 'helmet';
import cors from 'cors';
import type { Express } from 'express';

export interface SecurityOptions {
  /** Open CORS to any origin; off in production */
  isDev: boolean;
}

/**
 * Configure security middleware (helmet + CORS).
 * Must be called BEFORE other middleware / route registration.
 */
export function setupSecurity(app: Express, { isDev }: SecurityOptions): void {
  app.use(
    helmet({
      contentSecurityPolicy: false,       // UIs are served from elsewhere
      crossOriginEmbedderPolicy: false,
    }),
  );

  if (isDev) {
    // In development allow all origins (localhost, LAN IPs, etc.)
    app.use(
      cors({
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        credentials: true,
      }),
    );
  }
  // Production: no cors() at all, so browsers keep same-origin
}

/**
 * Socket.io CORS config mirroring the HTTP policy above.
 */
export function getSocketCorsConfig({ isDev }: SecurityOptions): { origin: boolean; methods: string[] } {
  return { origin: isDev, methods: ['GET', 'POST'] };
}
