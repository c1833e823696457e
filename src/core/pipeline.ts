import type { GatewayConfig } from '../config/json-config.js';
import { Dispatcher } from '../interfaces/dispatcher.js';
import { BUILTIN_COMMANDS, CollectTriggerHandler, CommandHandler, createContentHandlers } from '../handlers/index.js';
import type { HandlerDeps } from '../handlers/types.js';
import { AgentModeStore } from '../services/agent-mode.js';
import { AssetManager } from '../services/asset-manager.js';
import { FfmpegAudioExtractor } from '../services/audio-extractor.js';
import { ChatBufferManager } from '../services/chat-buffer.js';
import { CollectService } from '../services/collect-service.js';
import { SlashCommandClassifier } from '../services/command-classifier.js';
import { ConversationLanes } from '../services/conversation-lanes.js';
import { GatewayMetrics } from '../services/gateway-metrics.js';
import { MediaValidator } from '../services/media-validator.js';
import { PluginRegistry } from '../services/plugin-registry.js';
import { ReplyContextService } from '../services/reply-context.js';
import { TaskTracker } from '../services/task-tracker.js';
import type {
  AgentGateway,
  AudioExtractor,
  MediaStore,
  Notifier,
  PersistenceSink,
  Transcriber,
} from '../types/collaborators.js';

export interface PipelineOptions {
  config: GatewayConfig;
  mediaStore: MediaStore;
  notifier: Notifier;
  agent: AgentGateway;
  transcriber?: Transcriber;
  extractor?: AudioExtractor;
  persistence?: PersistenceSink;
  botUsername?: string;
  metrics?: GatewayMetrics;
  now?: () => number;
}

/** Every long-lived piece of the inbound pipeline, wired together. */
export interface InboundPipeline {
  dispatcher: Dispatcher;
  buffer: ChatBufferManager;
  tasks: TaskTracker;
  lanes: ConversationLanes;
  plugins: PluginRegistry;
  collect: CollectService;
  agentMode: AgentModeStore;
  replyContext: ReplyContextService;
  assets: AssetManager;
  metrics: GatewayMetrics;
}

/**
 * Assemble the inbound pipeline from configuration and the transport /
 * agent collaborators. Nothing is started; call `dispatcher.start()`.
 */
export function createInboundPipeline(options: PipelineOptions): InboundPipeline {
  const { config } = options;
  const metrics = options.metrics ?? new GatewayMetrics();

  const replyContext = new ReplyContextService({ now: options.now });
  const buffer = new ChatBufferManager({
    debounceMs: config.buffer.debounceMs,
    maxWaitMs: config.buffer.maxWaitMs,
    maxCapacity: config.buffer.maxCapacity,
    textSeparator: config.buffer.textSeparator,
    now: options.now,
    metrics,
    resolveReplyContext: (conversationId, eventId) => replyContext.resolve(conversationId, eventId),
  });

  const assets = new AssetManager({
    mediaStore: options.mediaStore,
    tempDir: config.media.tempDir,
    downloadTimeoutMs: config.media.downloadTimeoutMs,
    metrics,
  });
  const validator = new MediaValidator({
    policies: {
      image: config.media.image,
      voice: config.media.voice,
      video: config.media.video,
      document: config.media.document,
    },
    metrics,
  });

  const handlerDeps: HandlerDeps = {
    assets,
    validator,
    agent: options.agent,
    extractor: options.extractor ?? new FfmpegAudioExtractor({ ffmpegPath: config.voice.ffmpegPath }),
    transcriber: options.transcriber,
    metrics,
    maxDocumentChars: config.media.maxDocumentChars,
  };

  const tasks = new TaskTracker({ metrics });
  const lanes = new ConversationLanes();
  const plugins = new PluginRegistry();
  const collect = new CollectService({ triggerKeywords: config.collect.triggerKeywords, now: options.now });
  const agentMode = new AgentModeStore();

  const dispatcher = new Dispatcher({
    buffer,
    plugins,
    classifier: new SlashCommandClassifier({ knownCommands: BUILTIN_COMMANDS, botUsername: options.botUsername }),
    collect,
    agentMode,
    notifier: options.notifier,
    handlers: createContentHandlers(handlerDeps),
    commands: new CommandHandler({ collect, agentMode, tasks, triggerKeywords: config.collect.triggerKeywords }),
    collectTrigger: new CollectTriggerHandler(handlerDeps, collect),
    tasks,
    persistence: options.persistence,
    lanes,
    replyContext,
    metrics,
    shutdownTimeoutMs: config.tasks.shutdownTimeoutMs,
  });

  return { dispatcher, buffer, tasks, lanes, plugins, collect, agentMode, replyContext, assets, metrics };
}
