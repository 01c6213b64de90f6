/**
 * Express Router Module
 *
 * HTTP surface of the extractor: signup and trial status, workbook
 * processing, checkout, and the admin dashboard. All state (users, rate
 * limits, admin sessions) is injected or owned by the router instance.
 *
 * @example
 * ```typescript
 * import { createApp } from './lib/express';
 *
 * const config = loadConfig();
 * const app = createApp({
 *   config,
 *   userStore: new JsonFileUserStore(config.usersFile),
 *   checkout: new PayPalCheckout(config.paypal),
 * });
 *
 * app.listen(config.port);
 * // POST /process            multipart: files, imageColumn, nameColumn, userEmail
 * // POST /api/auth/signup    email
 * // POST /api/payment/create-session
 * ```
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response, type Router } from 'express';
import multer from 'multer';
import { checkUserAccess, getOrCreateUser } from '../accounts/access';
import type { UserStore } from '../accounts/user-store';
import { AdminAuth } from '../admin/admin-auth';
import { renderDashboard, summarizeUsers } from '../admin/dashboard';
import type { AppConfig } from '../config';
import {
  AccessDeniedError,
  ExtractorError,
  InvalidRequestError,
  RateLimitError,
  isExtractorError,
  errorMessage,
} from '../errors';
import { validateColumnSelection } from '../excel/column-mapper';
import { createLogger } from '../logger';
import { getPlans } from '../payment/plans';
import type { CheckoutProvider } from '../payment/paypal';
import { processWorkbooks } from '../pipeline';
import { RATE_LIMIT_RULES, SlidingWindowRateLimiter, clientKey, type RateLimitRule } from '../rate-limiter';
import type { PipelineResult } from '../types';
import {
  AdminLoginSchema,
  PaymentRequestSchema,
  ProcessRequestSchema,
  SignupRequestSchema,
  VerifyPaymentSchema,
  parseRequest,
  validateUploads,
} from '../validation';

const log = createLogger('Router');

export const ADMIN_COOKIE = 'admin_session';

/** Multipart field carrying the workbooks */
export const UPLOAD_FIELD = 'files';

export const SUMMARY_HEADERS = {
  processed: 'X-Extract-Processed',
  saved: 'X-Extract-Saved',
  duplicates: 'X-Extract-Duplicates',
  plan: 'X-Extract-Plan',
  message: 'X-Extract-Message',
} as const;

// ============================================================================
// Types
// ============================================================================

export interface AppDependencies {
  config: AppConfig;
  userStore: UserStore;
  checkout: CheckoutProvider;
  /** Created from config.adminKey when omitted */
  adminAuth?: AdminAuth;
  /** Fresh limiter per router when omitted */
  limiter?: SlidingWindowRateLimiter;
  /** Clock for trial and payment bookkeeping */
  now?: () => Date;
  /** Reported by /health */
  version?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/** Forward rejections of async handlers to the error middleware */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(';')) {
    const [key, ...rest] = part.trim().split('=');
    if (key === name) return decodeURIComponent(rest.join('='));
  }
  return undefined;
}

function adminToken(req: Request): string | undefined {
  const auth = req.headers.authorization;
  if (auth?.startsWith('Bearer ')) return auth.slice(7).trim();
  return readCookie(req.headers.cookie, ADMIN_COOKIE);
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

// ============================================================================
// Router Factory
// ============================================================================

export function createExtractorRouter(deps: AppDependencies): Router {
  const { config, userStore, checkout } = deps;
  const now = deps.now ?? (() => new Date());
  const limiter = deps.limiter ?? new SlidingWindowRateLimiter();
  const adminAuth = deps.adminAuth ?? new AdminAuth({
    adminKey: config.adminKey,
    sessionTtlMs: config.adminSessionTtlMs,
  });

  const router = express.Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: config.maxUploadBytes,
      files: config.maxFilesPerRequest,
    },
  });

  // Middleware: CORS
  router.use((req, res, next) => {
    // A list of origins echoes the caller's origin when it is allowed
    if (Array.isArray(config.corsOrigins)) {
      const requestOrigin = req.headers.origin;
      res.header('Access-Control-Allow-Origin',
        requestOrigin && config.corsOrigins.includes(requestOrigin) ? requestOrigin : config.corsOrigins[0]);
      res.header('Vary', 'Origin');
    } else {
      res.header('Access-Control-Allow-Origin', config.corsOrigins);
    }
    res.header('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.header('Access-Control-Expose-Headers', ['Content-Disposition', ...Object.values(SUMMARY_HEADERS)].join(', '));
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  const rateLimit = (rule: RateLimitRule): RequestHandler => (req, res, next) => {
    if (limiter.trackedKeys > 10_000) {
      limiter.prune(RATE_LIMIT_RULES.processing.windowMs);
    }
    const key = clientKey(req.headers['x-forwarded-for'], req.socket.remoteAddress);
    const decision = limiter.check(key, rule);
    if (!decision.allowed) {
      const windowSec = Math.round(rule.windowMs / 1000);
      next(new RateLimitError(
        `Rate limit exceeded. Maximum ${rule.maxRequests} requests per ${windowSec} seconds.`,
        { retryAfter: decision.retryAfterSec }
      ));
      return;
    }
    next();
  };

  const requireAdmin: RequestHandler = (req, res, next) => {
    if (!adminAuth.verifySession(adminToken(req))) {
      res.status(401).json({ error: 'ADMIN_AUTH_REQUIRED', message: 'Admin login required' });
      return;
    }
    next();
  };

  // ============================================================================
  // Routes
  // ============================================================================

  /**
   * GET /health
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: deps.version ?? process.env.npm_package_version ?? 'unknown',
      timestamp: now().toISOString(),
    });
  });

  /**
   * GET /api/plans
   */
  router.get('/api/plans', (_req, res) => {
    res.json({ plans: getPlans() });
  });

  /**
   * POST /api/auth/signup
   * Create an account with a trial, or return the existing one
   */
  router.post('/api/auth/signup', rateLimit(RATE_LIMIT_RULES.signup), route(async (req, res) => {
    const { email } = parseRequest(SignupRequestSchema, req.body);
    const { user, created } = await getOrCreateUser(userStore, email, {
      trialDays: config.trialDays,
      now: now(),
    });

    if (created) log.info(`New signup: ${email}`);

    res.status(created ? 201 : 200).json({
      message: created
        ? `Welcome! Your ${config.trialDays}-day free trial has started.`
        : 'Welcome back!',
      user,
    });
  }));

  /**
   * POST /api/auth/status
   * Report whether the user may process files
   */
  router.post('/api/auth/status', route(async (req, res) => {
    const { email } = parseRequest(SignupRequestSchema, req.body);
    const grant = await checkUserAccess(userStore, email, now());
    res.json({
      access: true,
      plan: grant.plan,
      message: grant.message,
      daysLeft: grant.daysLeft,
      credits: grant.user.credits,
    });
  }));

  /**
   * POST /process
   * Extract images from uploaded workbooks and return a ZIP
   */
  router.post(
    '/process',
    rateLimit(RATE_LIMIT_RULES.processing),
    upload.array(UPLOAD_FIELD, config.maxFilesPerRequest),
    route(async (req, res) => {
      const body = parseRequest(ProcessRequestSchema, req.body);
      const grant = await checkUserAccess(userStore, body.userEmail, now());

      const columns = validateColumnSelection({
        imageColumn: body.imageColumn,
        nameColumn: body.nameColumn,
      });

      const files = validateUploads(
        uploadedFiles(req).map(f => ({ fileName: f.originalname, data: f.buffer, contentType: f.mimetype })),
        { maxBytes: config.maxUploadBytes, maxFiles: config.maxFilesPerRequest }
      );

      // Credit is taken up front and given back if the run fails
      if (grant.consumesCredit && !(await userStore.consumeCredit(grant.user.email))) {
        throw new AccessDeniedError('No pay-per-file credits left. Please choose a plan to continue.', 'trial_expired');
      }

      let result: PipelineResult;
      try {
        result = await processWorkbooks(files, columns, {
          plan: grant.plan,
          includeManifest: body.includeManifest,
          now: now(),
        });
      } catch (err) {
        if (grant.consumesCredit) {
          await userStore.refundCredit(grant.user.email);
          log.info(`Refunded credit of ${grant.user.email} after a failed run`);
        }
        throw err;
      }

      res.set({
        'Content-Type': 'application/zip',
        'Content-Disposition': `attachment; filename="${result.fileName}"`,
        'X-Content-Type-Options': 'nosniff',
        [SUMMARY_HEADERS.processed]: String(result.summary.processed),
        [SUMMARY_HEADERS.saved]: String(result.summary.saved),
        [SUMMARY_HEADERS.duplicates]: String(result.summary.duplicates),
        [SUMMARY_HEADERS.plan]: result.summary.plan,
        [SUMMARY_HEADERS.message]: grant.message,
      });
      res.send(result.archive);
    })
  );

  /**
   * POST /api/payment/create-session
   */
  router.post('/api/payment/create-session', rateLimit(RATE_LIMIT_RULES.payment), route(async (req, res) => {
    const { plan, email } = parseRequest(PaymentRequestSchema, req.body);
    const user = await userStore.getUser(email);
    if (!user) {
      throw new AccessDeniedError('No account found for this email. Please sign up first.', 'not_registered');
    }

    const session = await checkout.createCheckoutSession(plan, user, {
      returnUrl: `${config.publicBaseUrl}/?payment=success&plan=${plan}`,
      cancelUrl: `${config.publicBaseUrl}/?payment=cancelled`,
    });

    res.json({ checkoutUrl: session.checkoutUrl, sessionId: session.sessionId });
  }));

  /**
   * POST /api/payment/verify
   * Confirm a completed checkout and activate the plan
   */
  router.post('/api/payment/verify', rateLimit(RATE_LIMIT_RULES.payment), route(async (req, res) => {
    const { sessionId, email } = parseRequest(VerifyPaymentSchema, req.body);
    const verification = await checkout.verifyPayment(sessionId);

    if (!verification.verified || !verification.plan) {
      res.status(402).json({
        verified: false,
        status: verification.status,
        error: verification.error ?? 'Payment not completed',
      });
      return;
    }
    if (verification.email !== email) {
      throw new InvalidRequestError('This payment belongs to a different account');
    }

    const user = await userStore.recordPayment(email, {
      orderId: verification.orderId,
      plan: verification.plan,
      amount: verification.amount ?? '',
      currency: verification.currency ?? '',
      paidAt: now().toISOString(),
    });
    if (!user) {
      throw new AccessDeniedError('No account found for this email. Please sign up first.', 'not_registered');
    }

    log.info(`Payment ${verification.orderId} recorded for ${email} (${verification.plan})`);
    res.json({ verified: true, plan: user.plan, user });
  }));

  // ============================================================================
  // Admin
  // ============================================================================

  router.post('/admin/login', rateLimit(RATE_LIMIT_RULES.adminLogin), (req, res) => {
    const { key } = parseRequest(AdminLoginSchema, req.body);
    if (!adminAuth.verifyKey(key)) {
      log.warn('Rejected admin login');
      res.status(401).json({ error: 'INVALID_ADMIN_KEY', message: 'Invalid admin key' });
      return;
    }

    const token = adminAuth.createSession();
    res.cookie(ADMIN_COOKIE, token, {
      httpOnly: true,
      sameSite: 'strict',
      secure: config.env === 'production',
      maxAge: config.adminSessionTtlMs,
    });
    res.json({ token, expiresInMs: config.adminSessionTtlMs });
  });

  router.post('/admin/logout', (req, res) => {
    const token = adminToken(req);
    if (token) adminAuth.invalidateSession(token);
    res.clearCookie(ADMIN_COOKIE);
    res.json({ ok: true });
  });

  router.get('/admin/users', requireAdmin, route(async (_req, res) => {
    const users = await userStore.listUsers();
    res.json({ total: users.length, users: summarizeUsers(users, now()) });
  }));

  router.get('/admin', requireAdmin, route(async (_req, res) => {
    const users = await userStore.listUsers();
    res.type('html').send(renderDashboard(users, now()));
  }));

  return router;
}

// ============================================================================
// Error Handling
// ============================================================================

function toExtractorError(error: unknown): ExtractorError {
  if (isExtractorError(error)) return error;
  if (error instanceof multer.MulterError) {
    // error.field is the form field, not the file name
    switch (error.code) {
      case 'LIMIT_FILE_SIZE':
        return new InvalidRequestError('File too large for the upload limit');
      case 'LIMIT_FILE_COUNT':
        return new InvalidRequestError('Too many files in one request');
      case 'LIMIT_UNEXPECTED_FILE':
        // upload.array() reports files past its maxCount this way too
        return new InvalidRequestError(
          error.field === UPLOAD_FIELD ? 'Too many files in one request' : `Unexpected file field "${error.field ?? ''}"`
        );
      default:
        return new InvalidRequestError(`Upload rejected: ${error.message}`);
    }
  }
  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    return new InvalidRequestError('Malformed request body');
  }
  return new ExtractorError(`Processing failed: ${errorMessage(error)}`, {
    cause: error instanceof Error ? error : undefined,
  });
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const err = toExtractorError(error);

  if (err.statusCode >= 500) {
    log.error(`${err.name}: ${err.message}`, err.cause ?? '');
  }

  const payload: Record<string, unknown> = { error: err.code, message: err.message };
  if (err instanceof AccessDeniedError) {
    payload.reason = err.reason;
    if (err.reason === 'trial_expired') payload.plansAvailable = true;
  }
  if (err instanceof InvalidRequestError && err.details.length > 0) {
    payload.details = err.details;
  }
  if (err instanceof RateLimitError) {
    res.setHeader('Retry-After', String(err.retryAfter));
  }

  res.status(err.statusCode).json(payload);
}

/**
 * Full application: body parsing, extractor routes, 404 and error handling.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', false);

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));
  app.use(createExtractorRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'NOT_FOUND', message: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
