import type { ContentHandlerMap, HandlerDeps } from './types.js';
import { ImageHandler } from './image.js';
import { VoiceHandler } from './voice.js';
import { VideoHandler } from './video.js';
import { DocumentHandler } from './document.js';
import { ContactHandler, PollHandler, TextHandler } from './structured.js';

export type { ContentHandler, ContentHandlerMap, HandlerDeps } from './types.js';
export { CommandHandler, BUILTIN_COMMANDS, type CommandHandlerDeps } from './command.js';
export { CollectTriggerHandler } from './collect-trigger.js';

export function createContentHandlers(deps: HandlerDeps): ContentHandlerMap {
    return {
        image: new ImageHandler(deps),
        voice: new VoiceHandler(deps),
        video: new VideoHandler(deps),
        poll: new PollHandler(deps),
        contact: new ContactHandler(deps),
        document: new DocumentHandler(deps),
        text: new TextHandler(deps),
    };
}
