import type { AssetManager } from '../services/asset-manager.js';
import type { MediaValidator } from '../services/media-validator.js';
import type { GatewayMetrics } from '../services/gateway-metrics.js';
import type {
    AgentGateway,
    AudioExtractor,
    Transcriber,
} from '../types/collaborators.js';
import type { CombinedMessage, HandlerResult, RoutedContentKind } from '../types/messaging.js';
import type { Logger } from '../utils/logger.js';

/** Collaborators shared by every content handler. */
export interface HandlerDeps {
    assets: AssetManager;
    validator: MediaValidator;
    agent: AgentGateway;
    extractor: AudioExtractor;
    /** Absent when no speech-to-text provider is configured. */
    transcriber?: Transcriber;
    metrics?: GatewayMetrics;
    logger?: Logger;
    /** Upper bound on characters inlined from a text document. */
    maxDocumentChars: number;
}

/** One handler per routed content kind. */
export interface ContentHandler {
    readonly kind: RoutedContentKind;
    handle(combined: CombinedMessage, agentMode: boolean, signal?: AbortSignal): Promise<HandlerResult>;
}

export type ContentHandlerMap = Record<RoutedContentKind, ContentHandler>;
