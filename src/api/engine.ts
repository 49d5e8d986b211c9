/**
 * Composition root: wires the conversation engine from its external collaborators.
 * `run.ts` passes the Postgres store and Twilio gateway; tests pass in-process fakes.
 */

import { AuditLog } from './audit/service.ts';
import { CampaignRegistry } from './campaigns/registry.ts';
import { OutboundDispatcher, type Sleep } from './campaigns/dispatcher.ts';
import { ComplianceGuard } from './compliance/guard.ts';
import { ComplianceService } from './compliance/service.ts';
import { ReplyComposer } from './composer/composer.ts';
import type { ReplyGenerator } from './composer/generator.ts';
import type { EngineConfig } from './config.ts';
import { ConsoleService } from './console/service.ts';
import { ContactLocks } from './conversation/lock.ts';
import { ConversationStateMachine, type TransitionTable } from './conversation/state-machine.ts';
import type { ConversationStore } from './conversation/types.ts';
import { InboundProcessor } from './inbound/processor.ts';
import { OutboundSender } from './messaging/sender.ts';
import type { MessageGateway } from './twilio/types.ts';

export interface EngineDeps {
  config: EngineConfig;
  store: ConversationStore;
  gateway: MessageGateway;
  /** null: every reply comes from the state templates */
  generator: ReplyGenerator | null;
  transitions: TransitionTable;
  webhookSecret: string | null;
  sleep?: Sleep;
  now?: () => number;
}

export interface Engine {
  config: EngineConfig;
  store: ConversationStore;
  locks: ContactLocks;
  audit: AuditLog;
  machine: ConversationStateMachine;
  guard: ComplianceGuard;
  compliance: ComplianceService;
  sender: OutboundSender;
  composer: ReplyComposer;
  inbound: InboundProcessor;
  dispatcher: OutboundDispatcher;
  registry: CampaignRegistry;
  console: ConsoleService;
}

export function createEngine(deps: EngineDeps): Engine {
  const { config, store } = deps;

  const locks = new ContactLocks();
  const audit = new AuditLog(store);
  const machine = new ConversationStateMachine(store, deps.transitions);
  const guard = new ComplianceGuard(config.optOutKeywords);
  const sender = new OutboundSender(deps.gateway, audit, config);
  const compliance = new ComplianceService(machine, sender);
  const composer = new ReplyComposer(deps.generator, config);

  const inbound = new InboundProcessor({
    store,
    locks,
    machine,
    guard,
    compliance,
    composer,
    sender,
    audit,
    secret: deps.webhookSecret,
  });

  const dispatcher = new OutboundDispatcher({
    store,
    locks,
    machine,
    guard,
    composer,
    sender,
    audit,
    config,
    sleep: deps.sleep,
    now: deps.now,
  });

  const registry = new CampaignRegistry();
  const consoleService = new ConsoleService({
    store,
    locks,
    machine,
    compliance,
    audit,
    dispatcher,
    registry,
    config,
  });

  return {
    config,
    store,
    locks,
    audit,
    machine,
    guard,
    compliance,
    sender,
    composer,
    inbound,
    dispatcher,
    registry,
    console: consoleService,
  };
}
