/** Content kinds a transport adapter can produce. */
export type ContentKind =
  | 'text'
  | 'photo'
  | 'voice'
  | 'video'
  | 'document'
  | 'contact'
  | 'poll'
  | 'command';

/** Kinds that carry a downloadable media reference. */
export type MediaKind = 'photo' | 'voice' | 'video' | 'document';

/** Pointer into the transport's media store. Nothing is downloaded until a handler asks. */
export interface MediaRef {
  fileId: string;
  /** Original filename as sent by the user, used for the extension allow-list. */
  fileName?: string;
  /** MIME type the transport declared for this file. */
  declaredMime?: string;
  /** Size reported by the transport, if known before download. */
  sizeBytes?: number;
}

export interface TextPayload {
  text: string;
}

export interface MediaPayload {
  media: MediaRef;
  caption?: string;
}

export interface ContactPayload {
  phoneNumber: string;
  firstName: string;
  lastName?: string;
  userId?: string;
}

export interface PollPayload {
  question: string;
  options: string[];
  allowsMultipleAnswers: boolean;
}

/** Where a forwarded event originally came from. */
export interface ForwardOrigin {
  type: 'user' | 'hidden_user' | 'channel' | 'chat';
  name?: string;
  username?: string;
  messageId?: number;
}

interface InboundEventBase {
  conversationId: string;
  senderId: string;
  /** Unique and monotonic within a conversation. */
  eventId: number;
  /** Epoch milliseconds. */
  arrivedAt: number;
  replyToEventId?: number;
  forward?: ForwardOrigin;
}

/** One raw arrival from the transport, normalized. */
export type InboundEvent =
  | (InboundEventBase & { kind: 'text'; payload: TextPayload })
  | (InboundEventBase & { kind: 'command'; payload: TextPayload })
  | (InboundEventBase & { kind: 'photo'; payload: MediaPayload })
  | (InboundEventBase & { kind: 'voice'; payload: MediaPayload })
  | (InboundEventBase & { kind: 'video'; payload: MediaPayload })
  | (InboundEventBase & { kind: 'document'; payload: MediaPayload })
  | (InboundEventBase & { kind: 'contact'; payload: ContactPayload })
  | (InboundEventBase & { kind: 'poll'; payload: PollPayload });

export type EventOfKind<K extends ContentKind> = Extract<InboundEvent, { kind: K }>;
export type MediaEvent = EventOfKind<MediaKind>;

export type FlushReason = 'debounce' | 'absolute_cap' | 'shutdown';

/** What the bot knows about the message a combined message replies to. */
export interface ReplyContext {
  eventId: number;
  conversationId: string;
  /** Summary line suitable for prepending to a prompt. */
  summary: string;
  originalText?: string;
  responseText?: string;
}

/**
 * Aggregate produced by a buffer flush. Immutable; consumed by exactly one
 * router invocation.
 */
export interface CombinedMessage {
  readonly conversationId: string;
  readonly senderId: string;
  readonly events: readonly InboundEvent[];
  readonly combinedText: string;
  readonly images: readonly EventOfKind<'photo'>[];
  readonly voices: readonly EventOfKind<'voice'>[];
  readonly videos: readonly EventOfKind<'video'>[];
  readonly documents: readonly EventOfKind<'document'>[];
  readonly contacts: readonly EventOfKind<'contact'>[];
  readonly polls: readonly EventOfKind<'poll'>[];
  readonly commands: readonly EventOfKind<'command'>[];
  readonly overflowCount: number;
  readonly replyToEventId?: number;
  readonly replyContext?: ReplyContext;
  readonly flushedAt: number;
  readonly flushReason: FlushReason;
}

/** Content kinds the router can select in its final priority step. */
export type RoutedContentKind = 'image' | 'voice' | 'video' | 'poll' | 'contact' | 'document' | 'text';

export interface ClassifiedCommand {
  name: string;
  args: string[];
  eventId: number;
}

/** Transient record of the routing decision for one combined message. */
export type RoutingOutcome =
  | { type: 'plugin_handled' }
  | { type: 'command_handled'; command: string }
  | { type: 'collect_queued' }
  | { type: 'collect_triggered'; drained: number }
  | { type: 'content_handled'; kind: RoutedContentKind }
  | { type: 'rejected'; kind: RoutedContentKind }
  | { type: 'failed'; kind?: RoutedContentKind }
  | { type: 'empty' };

export type RoutingOutcomeType = RoutingOutcome['type'];

/** Result returned by every content handler. */
export type HandlerResult =
  | { status: 'ok'; reply?: string; notices?: string[] }
  | { status: 'rejected'; reason: string }
  | { status: 'transient'; reason: string };

/** Options accepted by outbound notices. */
export interface NoticeOptions {
  replyToEventId?: number;
}
