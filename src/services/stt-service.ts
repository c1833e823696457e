import Groq from 'groq-sdk';
import { createReadStream } from 'node:fs';
import type { Transcriber } from '../types/collaborators.js';
import { MediaProcessingError, isAbortError, isTransientNetworkError } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';

/** Groq model IDs supported for audio transcription. */
type WhisperModel = 'whisper-large-v3' | 'whisper-large-v3-turbo';

const DEFAULT_MODEL: WhisperModel = 'whisper-large-v3-turbo';

/**
 * Speech-to-Text backed by Groq's hosted Whisper API.
 *
 * Transcription is fully awaited before the caller receives the text, so the
 * audio file stays in use (and undeleted) until the request settles.
 */
export class SttService implements Transcriber {
    readonly #client: Groq;
    readonly #model: WhisperModel;

    /**
     * @param apiKey - Groq API key (GROQ_API_KEY).
     * @param model  - Whisper model variant; defaults to `whisper-large-v3-turbo`.
     */
    constructor(apiKey: string, model: WhisperModel = DEFAULT_MODEL) {
        this.#client = new Groq({ apiKey });
        this.#model = model;
    }

    /**
     * Transcribe a local audio file (flac, mp3, mp4, mpeg, mpga, m4a, ogg,
     * wav, webm). Connection failures are retried; anything else surfaces as
     * a `MediaProcessingError`.
     */
    async transcribeFile(filePath: string): Promise<string> {
        try {
            const result = await withRetry(
                () =>
                    this.#client.audio.transcriptions.create({
                        file: createReadStream(filePath),
                        model: this.#model,
                        response_format: 'json',
                    }),
                { label: 'groq:transcribe', shouldRetry: isTransientNetworkError },
            );
            return result.text.trim();
        } catch (err) {
            if (isAbortError(err)) throw err;
            throw new MediaProcessingError('transcription', 'Transcription failed.', { cause: err });
        }
    }
}
