import type { ChatBufferManager } from '../services/chat-buffer.js';
import { ConversationLanes } from '../services/conversation-lanes.js';
import type { GatewayMetrics } from '../services/gateway-metrics.js';
import type { ReplyContextService } from '../services/reply-context.js';
import type { TaskTracker } from '../services/task-tracker.js';
import type { ContentHandlerMap } from '../handlers/types.js';
import type {
  AgentModeProvider,
  CollectModeProvider,
  CommandClassifier,
  Notifier,
  PersistenceSink,
  PluginHandler,
} from '../types/collaborators.js';
import type {
  ClassifiedCommand,
  CombinedMessage,
  HandlerResult,
  InboundEvent,
  RoutedContentKind,
  RoutingOutcome,
} from '../types/messaging.js';
import {
  errorMessage,
  isAbortError,
  throwIfAborted,
  toUserMessage,
} from '../utils/errors.js';
import { getLogger, logThought, type Logger } from '../utils/logger.js';

/** Runs a recognized command. */
export interface CommandRunner {
  handle(command: ClassifiedCommand, combined: CombinedMessage): Promise<HandlerResult>;
}

/** Processes a drained collect queue plus the message that triggered it. */
export interface CollectTriggerRunner {
  /** True when a voice note of `combined` says a trigger phrase. */
  hasSpokenTrigger(combined: CombinedMessage, signal?: AbortSignal): Promise<boolean>;
  handle(messages: CombinedMessage[], agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult>;
}

export interface DispatcherDeps {
  buffer: ChatBufferManager;
  plugins: PluginHandler;
  classifier: CommandClassifier;
  collect: CollectModeProvider;
  agentMode: AgentModeProvider;
  notifier: Notifier;
  handlers: ContentHandlerMap;
  commands: CommandRunner;
  collectTrigger: CollectTriggerRunner;
  tasks: TaskTracker;
  persistence?: PersistenceSink;
  lanes?: ConversationLanes;
  replyContext?: ReplyContextService;
  metrics?: GatewayMetrics;
  logger?: Logger;
  shutdownTimeoutMs?: number;
}

export interface DispatcherStats {
  accepting: boolean;
  pendingBuffers: number;
  activeConversations: number;
  activeTasks: number;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/** Content priority for the last routing step: images > voice > video > polls > contacts > documents > text. */
export function selectContentKind(combined: CombinedMessage): RoutedContentKind | null {
  if (combined.images.length > 0) return 'image';
  if (combined.voices.length > 0) return 'voice';
  if (combined.videos.length > 0) return 'video';
  if (combined.polls.length > 0) return 'poll';
  if (combined.contacts.length > 0) return 'contact';
  if (combined.documents.length > 0) return 'document';
  if (combined.combinedText.trim().length > 0) return 'text';
  return null;
}

export function overflowNotice(count: number): string {
  return `Note: ${count} message(s) were dropped because too many were sent at once.`;
}

/**
 * Inbound dispatcher.
 *
 * Connects the transport to the chat buffer and routes every flushed
 * CombinedMessage to exactly one handler:
 *   1. plugins, 2. recognized commands, 3. collect mode, 4. content kind.
 *
 * Messages of one conversation are routed strictly one after another;
 * different conversations are routed concurrently. Handler failures become a
 * generic notice; cancellation always propagates.
 */
export class Dispatcher {
  readonly #deps: DispatcherDeps;
  readonly #lanes: ConversationLanes;
  readonly #logger: Logger;
  readonly #shutdownTimeoutMs: number;
  readonly #controller = new AbortController();
  #accepting = false;

  constructor(deps: DispatcherDeps) {
    this.#deps = deps;
    this.#lanes = deps.lanes ?? new ConversationLanes();
    this.#logger = deps.logger ?? getLogger('dispatcher');
    this.#shutdownTimeoutMs = deps.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  start(): void {
    this.#deps.buffer.onFlush((combined) => this.#enqueue(combined));
    this.#accepting = true;
    this.#logger.info('Dispatcher started');
  }

  /** Entry point for transport adapters. */
  ingest(event: InboundEvent): void {
    if (!this.#accepting) {
      this.#logger.warn({ conversationId: event.conversationId, eventId: event.eventId }, 'Dispatcher not accepting, event dropped');
      return;
    }

    if (event.kind === 'text') {
      this.#deps.replyContext?.track({
        conversationId: event.conversationId,
        eventId: event.eventId,
        kind: 'user_text',
        originalText: event.payload.text,
      });
    }
    if (event.kind === 'photo') {
      this.#deps.replyContext?.track({
        conversationId: event.conversationId,
        eventId: event.eventId,
        kind: 'image',
        originalText: event.payload.caption,
      });
    }

    this.#deps.buffer.onEvent(event);
  }

  /**
   * Stop accepting input, route whatever is still buffered, wait for in-flight
   * routing, then cancel background tasks. Routing still running after the
   * timeout is aborted.
   */
  async shutdown(timeoutMs = this.#shutdownTimeoutMs): Promise<void> {
    this.#accepting = false;
    const flushed = this.#deps.buffer.flushAll();
    this.#logger.info({ flushed: flushed.length }, 'Dispatcher shutting down');

    const drained = await this.#idleWithin(timeoutMs);
    if (!drained) {
      this.#logger.warn({ timeoutMs, active: this.#lanes.activeCount() }, 'Routing did not finish in time, aborting');
      this.#controller.abort();
      await this.#idleWithin(timeoutMs);
    }

    const result = await this.#deps.tasks.cancelAll(timeoutMs);
    this.#logger.info({ ...result }, 'Dispatcher stopped');
  }

  stats(): DispatcherStats {
    return {
      accepting: this.#accepting,
      pendingBuffers: this.#deps.buffer.getPendingCount(),
      activeConversations: this.#lanes.activeCount(),
      activeTasks: this.#deps.tasks.activeCount(),
    };
  }

  // ── Routing ─────────────────────────────────────────────────────────────────

  /** Route one combined message. Rejects only on cancellation. */
  async route(combined: CombinedMessage, signal?: AbortSignal): Promise<RoutingOutcome> {
    throwIfAborted(signal);
    this.#persist(combined);

    const attempt: { kind?: RoutedContentKind } = {};
    let outcome: RoutingOutcome;

    try {
      outcome = await this.#select(combined, attempt, signal);
    } catch (err) {
      if (isAbortError(err)) throw err;

      const message = errorMessage(err);
      this.#deps.metrics?.increment('handler.failures');
      this.#logger.error(
        { conversationId: combined.conversationId, senderId: combined.senderId, kind: attempt.kind, err: message },
        'Handler failed',
      );
      void logThought(`[Dispatcher] Handler failure in conversation ${combined.conversationId}: ${message}`);
      await this.#notify(combined, toUserMessage(err));
      outcome = { type: 'failed', kind: attempt.kind };
    }

    if (combined.overflowCount > 0) {
      this.#deps.metrics?.increment('overflow.notices');
      await this.#notify(combined, overflowNotice(combined.overflowCount));
    }

    this.#deps.metrics?.increment(`routed.${outcome.type}`);
    this.#logger.debug({ conversationId: combined.conversationId, outcome }, 'Message routed');
    return outcome;
  }

  async #select(
    combined: CombinedMessage,
    attempt: { kind?: RoutedContentKind },
    signal?: AbortSignal,
  ): Promise<RoutingOutcome> {
    const deps = this.#deps;
    const conversationId = combined.conversationId;

    // 1. Plugins
    if (await this.#pluginClaims(combined)) {
      return { type: 'plugin_handled' };
    }
    throwIfAborted(signal);

    // 2. Commands
    for (const event of combined.events) {
      const command = deps.classifier.classify(event);
      if (command) {
        const result = await deps.commands.handle(command, combined);
        await this.#deliver(combined, result);
        return { type: 'command_handled', command: command.name };
      }
    }

    // 3. Collect mode
    if (await deps.collect.isCollecting(conversationId)) {
      const triggered =
        deps.collect.matchesTrigger(combined.combinedText) ||
        (await deps.collectTrigger.hasSpokenTrigger(combined, signal));
      if (!triggered) {
        await deps.collect.enqueue(conversationId, combined);
        return { type: 'collect_queued' };
      }
      const drained = await deps.collect.drainAndTrigger(conversationId);
      const agentMode = await deps.agentMode.isAgentMode(conversationId);
      const result = await deps.collectTrigger.handle([...drained, combined], agentMode, signal);
      await this.#deliver(combined, result);
      return { type: 'collect_triggered', drained: drained.length };
    }

    // 4. Content kind
    const kind = selectContentKind(combined);
    if (!kind) {
      return { type: 'empty' };
    }
    attempt.kind = kind;

    const agentMode = await deps.agentMode.isAgentMode(conversationId);
    throwIfAborted(signal);
    const result = await deps.handlers[kind].handle(combined, agentMode, signal);
    await this.#deliver(combined, result);
    return result.status === 'ok' ? { type: 'content_handled', kind } : { type: 'rejected', kind };
  }

  async #pluginClaims(combined: CombinedMessage): Promise<boolean> {
    try {
      return await this.#deps.plugins.tryHandle(combined);
    } catch (err) {
      if (isAbortError(err)) throw err;
      this.#logger.error({ conversationId: combined.conversationId, err: errorMessage(err) }, 'Plugin check failed, continuing');
      return false;
    }
  }

  // ── Outbound ────────────────────────────────────────────────────────────────

  async #deliver(combined: CombinedMessage, result: HandlerResult): Promise<void> {
    if (result.status !== 'ok') {
      await this.#notify(combined, result.reason);
      return;
    }

    for (const notice of result.notices ?? []) {
      await this.#notify(combined, notice);
    }

    if (result.reply) {
      const sentId = await this.#notify(combined, result.reply);
      if (sentId !== undefined) {
        this.#deps.replyContext?.track({
          conversationId: combined.conversationId,
          eventId: sentId,
          kind: 'agent_response',
          originalText: combined.combinedText,
          responseText: result.reply,
        });
      }
    }
  }

  /** Outbound failures are logged; they never turn into another notice. */
  async #notify(combined: CombinedMessage, text: string): Promise<number | undefined> {
    const lastEvent = combined.events[combined.events.length - 1];
    try {
      return await this.#deps.notifier.sendText(combined.conversationId, text, {
        replyToEventId: lastEvent?.eventId,
      });
    } catch (err) {
      this.#logger.error({ conversationId: combined.conversationId, err: errorMessage(err) }, 'Failed to send notice');
      return undefined;
    }
  }

  #persist(combined: CombinedMessage): void {
    const { persistence, tasks } = this.#deps;
    if (!persistence) return;
    tasks.spawn(`persist:${combined.conversationId}`, () => persistence.persist(combined));
  }

  // ── Scheduling ──────────────────────────────────────────────────────────────

  #enqueue(combined: CombinedMessage): void {
    const signal = this.#controller.signal;
    this.#lanes
      .run(combined.conversationId, () => this.route(combined, signal))
      .then(
        (outcome) => {
          this.#logger.info({ conversationId: combined.conversationId, outcome: outcome.type }, 'Routing complete');
        },
        (err: unknown) => {
          if (isAbortError(err)) {
            this.#logger.info({ conversationId: combined.conversationId }, 'Routing cancelled');
            return;
          }
          this.#logger.error({ conversationId: combined.conversationId, err: errorMessage(err) }, 'Routing failed');
        },
      );
  }

  async #idleWithin(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
    });
    try {
      return await Promise.race([this.#lanes.idle().then(() => true as const), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
