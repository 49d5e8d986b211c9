import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import formbody from '@fastify/formbody';
import rateLimit from '@fastify/rate-limit';
import { z } from 'zod';
import { CONVERSATION_STATES } from './conversation/types.ts';
import type { Engine } from './engine.ts';
import { isEngineError, type EngineErrorCode } from './errors.ts';
import { HealthCheckRegistry } from './health.ts';
import { createLogger } from './logger.ts';
import { getFullUrl, getSignatureHeader, toWebhookParams } from './webhooks/verification.ts';

const log = createLogger('server');

export type ServerOptions = {
  logger?: boolean;
  engine: Engine;
  health?: HealthCheckRegistry;
};

const ERROR_STATUS: Partial<Record<EngineErrorCode, number>> = {
  unknown_contact: 404,
  invalid_transition: 409,
  version_conflict: 409,
};

const StateSchema = z.enum(CONVERSATION_STATES);

const SetStateBodySchema = z.object({ state: StateSchema }).strict();

const ConversationQuerySchema = z.object({
  q: z.string().trim().min(1).optional(),
  state: StateSchema.optional(),
  sort: z.enum(['name', 'number', 'status', 'last_message']).default('last_message'),
  direction: z.enum(['asc', 'desc']).default('desc'),
});

const TranscriptQuerySchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

const CandidateFilterSchema = z
  .object({
    minDaysSinceService: z.number().int().min(0).optional(),
    maxDaysSinceService: z.number().int().min(0).optional(),
    cancelledOnly: z.boolean().optional(),
    limit: z.number().int().min(1).max(10_000).optional(),
  })
  .strict();

const PreviewBodySchema = z.object({ filter: CandidateFilterSchema.default({}) }).strict();

const LaunchBodySchema = z
  .object({
    filter: CandidateFilterSchema.default({}),
    maxActive: z.number().int().min(1).optional(),
  })
  .strict();

const IdParamsSchema = z.object({ id: z.string().min(1) });

/** Operator identity is authenticated upstream and forwarded in a header. */
function operatorId(req: FastifyRequest): string {
  const header = req.headers['x-operator-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || 'operator';
}

function sendValidationError(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.code(400).send({
    error: 'Validation failed',
    issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

export function buildServer(options: ServerOptions): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false, trustProxy: true });
  const { engine } = options;

  // Twilio webhooks are application/x-www-form-urlencoded
  app.register(formbody);

  // Skip rate limiting in test environment or when explicitly disabled
  const rateLimitEnabled = process.env.NODE_ENV !== 'test' && process.env.RATE_LIMIT_DISABLED !== 'true';

  if (rateLimitEnabled) {
    app.register(rateLimit, {
      max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
      timeWindow: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
      addHeaders: {
        'x-ratelimit-limit': true,
        'x-ratelimit-remaining': true,
        'x-ratelimit-reset': true,
        'retry-after': true,
      },
      onExceeded: (req) => {
        log.warn('Rate limit exceeded', { method: req.method, url: req.url, ip: req.ip });
      },
      errorResponseBuilder: (_req, context) => ({
        error: 'Too Many Requests',
        message: `Rate limit exceeded. Try again in ${Math.ceil((context.ttl ?? 60000) / 1000)} seconds.`,
        statusCode: 429,
        retryAfter: Math.ceil((context.ttl ?? 60000) / 1000),
      }),
      skipOnError: true,
      allowList: (req) => req.url.startsWith('/api/health'),
    });
  }

  app.setErrorHandler((error, req, reply) => {
    if (isEngineError(error)) {
      const status = ERROR_STATUS[error.code] ?? 500;
      if (status >= 500) {
        log.error('Request failed', { method: req.method, url: req.url, code: error.code, error: error.message });
      }
      return reply.code(status).send({ error: error.message, code: error.code });
    }

    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    log.error('Unhandled error', { method: req.method, url: req.url, error: error.message });
    return reply.code(500).send({ error: 'Internal Server Error' });
  });

  // Health check endpoints (Kubernetes-compatible)
  const healthRegistry = options.health ?? new HealthCheckRegistry();

  app.get('/api/health/live', async () => ({ status: 'ok' }));

  app.get('/api/health/ready', async (_req, reply) => {
    const ready = await healthRegistry.isReady();
    if (ready) {
      return { status: 'ok' };
    }
    return reply.code(503).send({ status: 'unavailable' });
  });

  app.get('/api/health', async (_req, reply) => {
    const health = await healthRegistry.checkAll();
    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    return reply.code(statusCode).send(health);
  });

  // POST /api/twilio/sms - inbound SMS webhook
  app.post(
    '/api/twilio/sms',
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: '1 minute',
        },
      },
    },
    async (req, reply) => {
      const result = await engine.inbound.handle({
        url: getFullUrl(req, engine.config.publicBaseUrl),
        params: toWebhookParams(req.body),
        signature: getSignatureHeader(req),
      });

      switch (result.kind) {
        case 'rejected':
          return reply.code(403).send({ error: 'Invalid signature' });
        case 'malformed':
          return reply.code(400).send({ error: 'Malformed webhook', issues: result.issues });
        case 'unknown_contact':
          return reply.code(404).send({ error: 'Unknown contact' });
        default:
          reply.header('Content-Type', 'application/xml');
          return reply.send(result.twiml);
      }
    },
  );

  // PUT /api/contacts/:id/state - operator state override
  app.put('/api/contacts/:id/state', async (req, reply) => {
    const params = IdParamsSchema.parse(req.params);
    const body = SetStateBodySchema.safeParse(req.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const contact = await engine.console.setContactState(operatorId(req), params.id, body.data.state);
    return reply.send({ contact });
  });

  // GET /api/conversations - conversation list with search, filter and sort
  app.get('/api/conversations', async (req, reply) => {
    const query = ConversationQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(reply, query.error);
    }

    const { q, state, sort, direction } = query.data;
    const conversations = await engine.console.listConversations({ q, state }, { key: sort, direction });
    return reply.send({ conversations, total: conversations.length });
  });

  // GET /api/conversations/:id/transcript - plain-text transcript export
  app.get('/api/conversations/:id/transcript', async (req, reply) => {
    const params = IdParamsSchema.parse(req.params);
    const query = TranscriptQuerySchema.safeParse(req.query);
    if (!query.success) {
      return sendValidationError(reply, query.error);
    }

    const transcript = await engine.console.exportTranscript(params.id, query.data);
    reply.header('Content-Type', 'text/plain; charset=utf-8');
    return reply.send(transcript);
  });

  // POST /api/campaigns/preview - candidates a campaign with this filter would consider
  app.post('/api/campaigns/preview', async (req, reply) => {
    const body = PreviewBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const candidates = await engine.console.previewCampaignCandidates(body.data.filter);
    return reply.send({ candidates, total: candidates.length });
  });

  // POST /api/campaigns - launch a campaign in the background
  app.post('/api/campaigns', async (req, reply) => {
    const body = LaunchBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const run = await engine.console.launchCampaign(operatorId(req), body.data.filter, body.data.maxActive);
    return reply.code(202).send({ run });
  });

  // POST /api/campaigns/:id/cancel
  app.post('/api/campaigns/:id/cancel', async (req, reply) => {
    const params = IdParamsSchema.parse(req.params);
    if (!engine.console.cancelCampaign(params.id)) {
      return reply.code(404).send({ error: 'Campaign not running' });
    }
    return reply.code(202).send({ cancelled: true });
  });

  // GET /api/campaigns/:id
  app.get('/api/campaigns/:id', async (req, reply) => {
    const params = IdParamsSchema.parse(req.params);
    const run = await engine.console.getCampaignRun(params.id);
    if (!run) {
      return reply.code(404).send({ error: 'Campaign not found' });
    }
    return reply.send({ run, running: engine.registry.isRunning(run.id) });
  });

  app.addHook('onClose', async () => {
    await engine.registry.shutdown();
  });

  return app;
}
