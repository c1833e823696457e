import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { AudioExtractor } from '../types/collaborators.js';
import { MediaProcessingError, isAbortError } from '../utils/errors.js';
import { getLogger, scrubSensitiveText, type Logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_STDERR_LENGTH = 2_000;

interface ExecError extends Error {
    code?: number | string;
    killed?: boolean;
    stderr?: string;
}

function isExecError(err: unknown): err is ExecError {
    return err instanceof Error;
}

/**
 * Extracts the audio track of a video with ffmpeg, writing Opus in an Ogg
 * container (accepted by the transcription API).
 */
export class FfmpegAudioExtractor implements AudioExtractor {
    readonly #ffmpegPath: string;
    readonly #timeoutMs: number;
    readonly #logger: Logger;

    constructor(options: { ffmpegPath?: string; timeoutMs?: number; logger?: Logger } = {}) {
        this.#ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
        this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.#logger = options.logger ?? getLogger('audio-extractor');
    }

    async extractAudio(videoPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
        const args = ['-i', videoPath, '-vn', '-acodec', 'libopus', '-b:a', '64k', '-y', outputPath];

        try {
            await execFileAsync(this.#ffmpegPath, args, {
                timeout: this.#timeoutMs,
                windowsHide: true,
                signal,
            });
        } catch (err) {
            if (isAbortError(err)) throw err;
            if (!isExecError(err)) {
                throw new MediaProcessingError('extraction', 'Audio extraction failed.', { cause: err });
            }

            const reason =
                err.code === 'ENOENT'
                    ? 'ffmpeg is not installed'
                    : err.killed
                      ? `ffmpeg timed out after ${this.#timeoutMs}ms`
                      : `ffmpeg exited with code ${String(err.code)}`;
            this.#logger.warn(
                { reason, stderr: scrubSensitiveText((err.stderr ?? '').slice(-MAX_STDERR_LENGTH)) },
                'Audio extraction failed',
            );
            throw new MediaProcessingError('extraction', 'Audio extraction failed.', { cause: err });
        }
    }
}
