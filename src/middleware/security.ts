/**
 * Security Middleware
 *
 * Security headers via helmet and configurable CORS.
 *
 * @module middleware/security
 */

import helmet from 'helmet';
import cors from 'cors';
import type { AppConfig } from '../config/env';

export function createSecurityHeadersMiddleware() {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin',
    },
  });
}

/**
 * CORS with an origin allow-list. `*` allows any origin, and so does any
 * non-production environment.
 */
export function createCorsMiddleware(security: AppConfig['security']) {
  const { allowedOrigins } = security;

  return cors({
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server)
      if (!origin) {
        return callback(null, true);
      }

      if (process.env.NODE_ENV !== 'production') {
        return callback(null, true);
      }

      if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error(`Origin ${origin} not allowed by CORS`));
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400,
  });
}
