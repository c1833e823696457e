import type {
  ClassifiedCommand,
  CombinedMessage,
  InboundEvent,
  MediaRef,
  NoticeOptions,
} from './messaging.js';

/** Plugin chain consulted before any built-in routing. */
export interface PluginHandler {
  tryHandle(combined: CombinedMessage): Promise<boolean>;
}

export interface CommandClassifier {
  classify(event: InboundEvent): ClassifiedCommand | null;
}

/** Alternate capture state where messages are queued until a trigger releases them. */
export interface CollectModeProvider {
  isCollecting(conversationId: string): Promise<boolean>;
  matchesTrigger(text: string): boolean;
  enqueue(conversationId: string, combined: CombinedMessage): Promise<void>;
  drainAndTrigger(conversationId: string): Promise<CombinedMessage[]>;
}

export interface AgentModeProvider {
  isAgentMode(conversationId: string): Promise<boolean>;
}

/** The transport's media store. Writes the file somewhere under `destinationDir`. */
export interface MediaStore {
  download(media: MediaRef, destinationDir: string, signal?: AbortSignal): Promise<string>;
}

export interface PersistenceSink {
  persist(combined: CombinedMessage): Promise<void>;
}

/** Outbound user-visible notices. Resolves with the sent message's event id when the transport reports one. */
export interface Notifier {
  sendText(conversationId: string, text: string, options?: NoticeOptions): Promise<number | undefined>;
}

export interface Transcriber {
  transcribeFile(filePath: string): Promise<string>;
}

export interface AudioExtractor {
  extractAudio(videoPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
}

export type AgentRequestMode = 'agent' | 'assistant';

/** Request handed to the AI agent collaborator once a handler has prepared its content. */
export interface AgentRequest {
  conversationId: string;
  senderId: string;
  mode: AgentRequestMode;
  prompt: string;
  /** Local paths that stay valid only until `processMessage` settles. */
  attachments: string[];
  source: string;
}

/**
 * Contract for the agent back end that turns a prepared request into a reply.
 * Implemented outside this package; imported here as a dependency boundary.
 */
export interface AgentGateway {
  processMessage(request: AgentRequest, signal?: AbortSignal): Promise<string>;
}
