#!/usr/bin/env node
/**
 * HTTP server entry point. All settings come from the environment
 * (see lib/config.ts).
 *
 * Usage:
 *   PORT=8000 ADMIN_KEY=change-me npx tsx cli/serve.ts
 */

import { JsonFileUserStore } from '../lib/accounts/user-store';
import { AdminAuth } from '../lib/admin/admin-auth';
import { loadConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { createApp } from '../lib/express';
import { createLogger, setLogLevel } from '../lib/logger';
import { PayPalCheckout } from '../lib/payment/paypal';

const log = createLogger('Server');

const SESSION_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

function main() {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  if (config.usingDefaultAdminKey) {
    log.warn('ADMIN_KEY is not set; using the development key. Set ADMIN_KEY before deploying.');
  }

  const checkout = new PayPalCheckout(config.paypal);
  if (!checkout.configured) {
    log.warn('PayPal credentials missing; checkout endpoints will return 503.');
  }

  const adminAuth = new AdminAuth({ adminKey: config.adminKey, sessionTtlMs: config.adminSessionTtlMs });
  const cleanup = setInterval(() => {
    const removed = adminAuth.cleanupExpiredSessions();
    if (removed > 0) log.debug(`Removed ${removed} expired admin session(s)`);
  }, SESSION_CLEANUP_INTERVAL_MS);
  cleanup.unref();

  const app = createApp({
    config,
    userStore: new JsonFileUserStore(config.usersFile),
    checkout,
    adminAuth,
  });

  const server = app.listen(config.port, () => {
    log.info(`Listening on port ${config.port} (${config.env})`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, closing server`);
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
}
