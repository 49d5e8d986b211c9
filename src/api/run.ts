import { createPool } from '../db.ts';
import { getGeneratorConfig, OpenAIReplyGenerator } from './composer/generator.ts';
import { loadEngineConfig } from './config.ts';
import { loadTransitionTable } from './conversation/state-machine.ts';
import { PgConversationStore } from './conversation/store.ts';
import { createEngine } from './engine.ts';
import { GatewayError } from './errors.ts';
import { DatabaseHealthChecker, HealthCheckRegistry, OutboundHealthChecker } from './health.ts';
import { createLogger } from './logger.ts';
import { buildServer } from './server.ts';
import { getTwilioConfig, getWebhookSecret, isTwilioConfigured } from './twilio/config.ts';
import { TwilioGateway } from './twilio/gateway.ts';
import type { MessageGateway } from './twilio/types.ts';

const log = createLogger('run');

const port = parseInt(process.env.PORT || '3000');
const host = process.env.HOST || '::';

// Configuration and transition table errors are fatal here, before anything listens.
const config = loadEngineConfig();
const transitions = loadTransitionTable(config.transitionTableFile);

const twilioConfigured = isTwilioConfigured();
if (config.outboundEnabled && !twilioConfigured) {
  log.warn('OUTBOUND_ENABLED is set but Twilio is not configured; every send will fail');
}

// Without carrier credentials there is nothing to send through; sends are still audited.
const gateway: MessageGateway = twilioConfigured
  ? new TwilioGateway(getTwilioConfig())
  : {
      send: async () => {
        throw new GatewayError('Twilio is not configured');
      },
    };

const generatorConfig = getGeneratorConfig();
if (!generatorConfig) {
  log.info('OPENAI_API_KEY not set, replies will use state templates');
}

const pool = createPool();
const engine = createEngine({
  config,
  store: new PgConversationStore(pool),
  gateway,
  generator: generatorConfig ? new OpenAIReplyGenerator(generatorConfig) : null,
  transitions,
  webhookSecret: getWebhookSecret(),
});

const health = new HealthCheckRegistry();
health.register(new DatabaseHealthChecker(pool));
health.register(new OutboundHealthChecker(config.outboundEnabled, twilioConfigured));

const app = buildServer({ logger: true, engine, health });
app.addHook('onClose', async () => {
  await pool.end();
});

await app.listen({ port, host });
log.info('Listening', { port, host, outboundEnabled: config.outboundEnabled, maxActive: config.maxActive });
