/**
 * Admin HTTP API
 *
 * Thin express surface over an enhanced agent. The caller's actor id comes
 * from the X-Actor-Id header; role checks happen inside the agent. Amounts
 * and prices travel as decimal strings.
 */

import cors from 'cors';
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { z } from 'zod';
import { BPS_DENOMINATOR, MAX_BATCH_SIZE } from '../config/constant';
import type { EnhancedTradingAgent } from '../lib/agent/enhancedAgent';
import { uintSchema } from '../lib/config/tradingConfig';
import { TradingError, describeError, type ErrorCategory } from '../lib/errors';
import type { DecisionLogger } from '../lib/observability/decisionLog';
import { createLogger } from '../lib/utils/logger';

const log = createLogger('AdminApi');

export interface AdminApiOptions {
  allowedOrigins?: string[];
  /** Requests per minute on mutating routes */
  rateLimitPerMinute?: number;
}

// =============================================================================
// VALIDATION
// =============================================================================

const confidenceSchema = z.coerce.number().int().min(0).max(BPS_DENOMINATOR);
const deadlineSchema = z.coerce.number().int().positive();

const tradeBodySchema = z.object({
  amountIn: uintSchema,
  amountOutMin: uintSchema.default(0n),
  deadline: deadlineSchema,
  confidenceBps: confidenceSchema,
});

const batchBodySchema = z.object({
  amountsIn: z.array(uintSchema).max(MAX_BATCH_SIZE * 2),
  amountsOutMin: z.array(uintSchema).max(MAX_BATCH_SIZE * 2),
  deadline: deadlineSchema,
  confidenceBps: confidenceSchema,
});

const canTradeQuerySchema = z.object({
  amount: uintSchema,
  confidenceBps: confidenceSchema,
});

const emergencyBodySchema = z.object({
  reason: z.string().min(1).max(200),
});

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  VALIDATION: 400,
  ACCESS: 403,
  GATE: 409,
  LIFECYCLE: 409,
  CONCURRENCY: 409,
  DEPENDENCY: 503,
};

// =============================================================================
// HELPERS
// =============================================================================

/** Recursively turns bigints into decimal strings for JSON output. */
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJsonSafe(v)]));
  }
  return value;
}

class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code: string
  ) {
    super(message);
  }
}

function actorOf(req: Request): string {
  const actor = req.header('x-actor-id');
  if (!actor) {
    throw new HttpError(401, 'X-Actor-Id header is required', 'MISSING_ACTOR');
  }
  return actor;
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    throw new HttpError(400, details, 'VALIDATION_FAILED');
  }
  return result.data;
}

function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function send(res: Response, data: unknown, status: number = 200): void {
  res.status(status).json({ success: true, data: toJsonSafe(data) });
}

// =============================================================================
// APP
// =============================================================================

export function createAdminApi(
  agent: EnhancedTradingAgent,
  decisionLogger: DecisionLogger,
  options: AdminApiOptions = {}
): express.Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: options.allowedOrigins ?? ['http://localhost:5173'],
      methods: ['GET', 'POST', 'PUT'],
      allowedHeaders: ['Content-Type', 'X-Actor-Id', 'X-Request-ID'],
    })
  );
  app.use(express.json({ limit: '10kb' }));

  const strictLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.rateLimitPerMinute ?? 30,
    message: { success: false, error: 'Too many requests', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const readLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 300,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  app.get('/health', readLimiter, (_req, res) => {
    const emergency = agent.getEmergencyState();
    res.json({
      status: emergency.emergencyStop ? 'stopped' : emergency.paused ? 'paused' : 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    '/api/v1/stats',
    readLimiter,
    asyncHandler(async (_req, res) => {
      send(res, {
        stats: await agent.getAdvancedStats(),
        emergency: agent.getEmergencyState(),
        config: agent.getConfig(),
        metrics: decisionLogger.getMetrics(),
      });
    })
  );

  app.get(
    '/api/v1/can-trade',
    readLimiter,
    asyncHandler(async (req, res) => {
      const query = parseInput(canTradeQuerySchema, req.query);
      send(res, await agent.canTrade(query.amount, query.confidenceBps));
    })
  );

  app.get('/api/v1/audit', readLimiter, (_req, res) => {
    res.type('application/json').send(decisionLogger.exportFullAuditLog());
  });

  // ---------------------------------------------------------------------------
  // Trading
  // ---------------------------------------------------------------------------

  app.post(
    '/api/v1/trades',
    strictLimiter,
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const body = parseInput(tradeBodySchema, req.body);
      send(res, await agent.triggerTrade(actor, body), 201);
    })
  );

  app.post(
    '/api/v1/trades/batch',
    strictLimiter,
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      const body = parseInput(batchBodySchema, req.body);
      const outcome = await agent.triggerBatchTrade(
        actor,
        body.amountsIn,
        body.amountsOutMin,
        body.deadline,
        body.confidenceBps
      );
      send(res, outcome, 201);
    })
  );

  // ---------------------------------------------------------------------------
  // Emergency
  // ---------------------------------------------------------------------------

  app.post('/api/v1/emergency/activate', strictLimiter, (req, res) => {
    const body = parseInput(emergencyBodySchema, req.body);
    agent.activateEmergencyStop(actorOf(req), body.reason);
    send(res, agent.getEmergencyState());
  });

  app.post('/api/v1/emergency/deactivate', strictLimiter, (req, res) => {
    agent.deactivateEmergencyStop(actorOf(req));
    send(res, agent.getEmergencyState());
  });

  app.post('/api/v1/pause', strictLimiter, (req, res) => {
    agent.pause(actorOf(req));
    send(res, agent.getEmergencyState());
  });

  app.post('/api/v1/unpause', strictLimiter, (req, res) => {
    agent.unpause(actorOf(req));
    send(res, agent.getEmergencyState());
  });

  // ---------------------------------------------------------------------------
  // Admin
  // ---------------------------------------------------------------------------

  app.put('/api/v1/config', strictLimiter, (req, res) => {
    send(res, agent.updateConfig(actorOf(req), req.body));
  });

  app.post(
    '/api/v1/predictions/request',
    strictLimiter,
    asyncHandler(async (req, res) => {
      const requestId = await agent.requestPrediction(actorOf(req));
      send(res, { requestId }, 201);
    })
  );

  app.post(
    '/api/v1/predictions/reset',
    strictLimiter,
    asyncHandler(async (req, res) => {
      send(res, await agent.forcePendingReset(actorOf(req)));
    })
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ success: false, error: err.message, code: err.code });
      return;
    }

    // Malformed JSON from express.json()
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'VALIDATION_FAILED' });
      return;
    }

    if (err instanceof TradingError) {
      log.debug({ path: req.path, code: err.code }, 'Request rejected');
      res.status(STATUS_BY_CATEGORY[err.category]).json({ success: false, error: err.message, code: err.code });
      return;
    }

    log.error({ path: req.path, error: describeError(err) }, 'Unhandled error');
    res.status(500).json({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  return app;
}
