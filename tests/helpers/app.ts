/**
 * Test app factory.
 *
 * Creates an Express app with the OAuth routes mounted, without starting
 * the server or listening on a port.
 */

import express from 'express';
import { createAuthRouter, type AuthRouterOptions } from '../../src/routes/auth.js';

/**
 * Create a test Express app with the consent routes configured.
 */
export function createTestApp(options: AuthRouterOptions): express.Application {
  const app = express();
  app.use(createAuthRouter(options));
  return app;
}
