import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { GroqAgentGateway } from '../../src/services/agent-gateway.js';
import { FfmpegAudioExtractor } from '../../src/services/audio-extractor.js';
import { SttService } from '../../src/services/stt-service.js';
import type { AgentRequest } from '../../src/types/collaborators.js';
import { MediaProcessingError } from '../../src/utils/errors.js';

const { createCompletion, createTranscription } = vi.hoisted(() => ({
    createCompletion: vi.fn(),
    createTranscription: vi.fn(),
}));

vi.mock('groq-sdk', () => ({
    default: class {
        chat = { completions: { create: createCompletion } };
        audio = { transcriptions: { create: createTranscription } };
    },
}));

const JPEG_BYTES = Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe0]), Buffer.alloc(16, 0x33)]);

describe('Groq-backed collaborators', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'groq-clients-test-'));
        createCompletion.mockReset();
        createTranscription.mockReset();
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('GroqAgentGateway', () => {
        const request = (overrides: Partial<AgentRequest> = {}): AgentRequest => ({
            conversationId: 'chat-1',
            senderId: 'user-1',
            mode: 'assistant',
            prompt: 'describe',
            attachments: [],
            source: 'text',
            ...overrides,
        });

        it('inlines images and names other attachments', async () => {
            const image = path.join(dir, 'photo.jpg');
            const pdf = path.join(dir, 'report.pdf');
            await writeFile(image, JPEG_BYTES);
            await writeFile(pdf, '%PDF-1.4\n%%EOF\n');
            createCompletion.mockResolvedValueOnce({ choices: [{ message: { content: '  a cat  ' } }] });

            const gateway = new GroqAgentGateway({ apiKey: 'test-secret', model: 'test-model', maxTokens: 64 });
            const reply = await gateway.processMessage(request({ attachments: [image, pdf] }));

            expect(reply).toBe('a cat');
            expect(createCompletion).toHaveBeenCalledWith(
                {
                    model: 'test-model',
                    max_tokens: 64,
                    messages: [
                        { role: 'system', content: 'You are a helpful assistant in a chat conversation. Answer concisely.' },
                        {
                            role: 'user',
                            content: [
                                { type: 'text', text: 'describe' },
                                { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${JPEG_BYTES.toString('base64')}` } },
                                { type: 'text', text: '[Attachment: report.pdf]' },
                            ],
                        },
                    ],
                },
                { signal: undefined },
            );
        });

        it('falls back to a fixed reply when the model returns nothing', async () => {
            createCompletion.mockResolvedValueOnce({ choices: [] });

            const gateway = new GroqAgentGateway({ apiKey: 'test-secret', model: 'test-model' });

            await expect(gateway.processMessage(request({ mode: 'agent' }))).resolves.toBe('I have nothing to add.');
        });

        it('does not retry a non-network failure', async () => {
            createCompletion.mockRejectedValue(new Error('invalid model'));

            const gateway = new GroqAgentGateway({ apiKey: 'test-secret', model: 'test-model' });

            await expect(gateway.processMessage(request())).rejects.toThrow('invalid model');
            expect(createCompletion).toHaveBeenCalledTimes(1);
        });
    });

    describe('SttService', () => {
        it('returns the trimmed transcript', async () => {
            const audio = path.join(dir, 'voice.ogg');
            await writeFile(audio, 'OggS');
            createTranscription.mockResolvedValueOnce({ text: ' hello there ' });

            const stt = new SttService('test-secret');

            await expect(stt.transcribeFile(audio)).resolves.toBe('hello there');
            expect(createTranscription).toHaveBeenCalledWith(
                expect.objectContaining({ model: 'whisper-large-v3-turbo', response_format: 'json' }),
            );
        });

        it('wraps provider failures', async () => {
            const audio = path.join(dir, 'voice.ogg');
            await writeFile(audio, 'OggS');
            createTranscription.mockRejectedValueOnce(new Error('413 payload too large'));

            const error = await new SttService('test-secret').transcribeFile(audio).catch((err: unknown) => err);

            expect(error).toBeInstanceOf(MediaProcessingError);
            expect(error).toMatchObject({ stage: 'transcription', message: 'Transcription failed.' });
        });
    });
});

describe('FfmpegAudioExtractor', () => {
    it('reports a missing ffmpeg binary as an extraction failure', async () => {
        const extractor = new FfmpegAudioExtractor({ ffmpegPath: '/nonexistent/ffmpeg-binary' });

        const error = await extractor.extractAudio('/tmp/in.mp4', '/tmp/out.ogg').catch((err: unknown) => err);

        expect(error).toBeInstanceOf(MediaProcessingError);
        expect(error).toMatchObject({ stage: 'extraction', message: 'Audio extraction failed.' });
    });
});
