import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG } from '../../src/config/json-config.js';
import { GatewayMetrics } from '../../src/services/gateway-metrics.js';
import { MediaValidator, canonicalMime, type MediaPolicies } from '../../src/services/media-validator.js';
import { MediaRejectedError } from '../../src/utils/errors.js';

const JPEG_BYTES = Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe0]), Buffer.alloc(256, 0x11)]);
const PDF_BYTES = Buffer.from('%PDF-1.4\n1 0 obj\n<< /Type /Catalog >>\nendobj\ntrailer\n%%EOF\n', 'latin1');

const policies = (): MediaPolicies => structuredClone({
    image: DEFAULT_CONFIG.media.image,
    voice: DEFAULT_CONFIG.media.voice,
    video: DEFAULT_CONFIG.media.video,
    document: DEFAULT_CONFIG.media.document,
});

async function rejectionOf(promise: Promise<unknown>): Promise<MediaRejectedError> {
    const error = await promise.then(
        () => undefined,
        (err: unknown) => err,
    );
    if (!(error instanceof MediaRejectedError)) {
        throw new Error('expected a MediaRejectedError');
    }
    return error;
}

describe('MediaValidator', () => {
    let dir: string;
    let metrics: GatewayMetrics;
    let validator: MediaValidator;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'media-validator-test-'));
        metrics = new GatewayMetrics();
        validator = new MediaValidator({ policies: policies(), metrics });
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    const file = async (name: string, content: Buffer | string): Promise<string> => {
        const target = path.join(dir, name);
        await writeFile(target, content);
        return target;
    };

    // ── Accepted ────────────────────────────────────────────────────────────────

    it('accepts a JPEG whose content, name and declared type agree', async () => {
        const target = await file('photo.jpg', JPEG_BYTES);

        const result = await validator.validate(target, { fileId: 'f', declaredMime: 'image/jpeg' }, 'image');

        expect(result).toEqual({ sizeBytes: JPEG_BYTES.length, extension: 'jpg', mimeType: 'image/jpeg', detected: true });
    });

    it('ignores an uninformative declared type', async () => {
        const target = await file('photo.jpg', JPEG_BYTES);

        const result = await validator.validate(target, { fileId: 'f', declaredMime: 'application/octet-stream' }, 'image');
        expect(result.mimeType).toBe('image/jpeg');
    });

    it('accepts a plain-text document by extension when no signature exists', async () => {
        const target = await file('download.bin', 'meeting notes\nline two\n');

        const result = await validator.validate(target, { fileId: 'f', fileName: 'notes.txt' }, 'document');

        expect(result).toEqual({ sizeBytes: 23, extension: 'txt', mimeType: 'text/plain', detected: false });
    });

    // ── Rejected ────────────────────────────────────────────────────────────────

    it('rejects a PDF disguised as a JPEG without naming the detected type or the path', async () => {
        const target = await file('photo.jpg', PDF_BYTES);

        const error = await rejectionOf(validator.validate(target, { fileId: 'f', fileName: 'photo.jpg' }, 'image'));

        expect(error.code).toBe('type_not_allowed');
        expect(error.message).toContain('type');
        expect(error.message).not.toContain('pdf');
        expect(error.message).not.toContain(dir);
        expect(metrics.get('validation.rejections')).toBe(1);
    });

    it('rejects a document whose content does not match its extension', async () => {
        const target = await file('notes.txt', PDF_BYTES);

        const error = await rejectionOf(validator.validate(target, { fileId: 'f', fileName: 'notes.txt' }, 'document'));

        expect(error.code).toBe('type_mismatch');
        expect(error.message).toBe('The file type does not match its name or declared type.');
    });

    it('rejects a declared type that contradicts the content', async () => {
        const target = await file('photo.jpg', JPEG_BYTES);

        const error = await rejectionOf(validator.validate(target, { fileId: 'f', declaredMime: 'image/png' }, 'image'));
        expect(error.code).toBe('type_mismatch');
    });

    it('rejects plain text posing as an image', async () => {
        const target = await file('photo.jpg', 'not really a picture');

        const error = await rejectionOf(validator.validate(target, { fileId: 'f' }, 'image'));
        expect(error.code).toBe('type_unverified');
        expect(error.message).toBe('The file type could not be verified.');
    });

    it('rejects binary content with a text extension', async () => {
        const target = await file('data.txt', Buffer.from([0x41, 0x00, 0x42, 0x00]));

        const error = await rejectionOf(validator.validate(target, { fileId: 'f' }, 'document'));
        expect(error.code).toBe('type_unverified');
    });

    it('rejects extensions outside the allow-list before sniffing', async () => {
        const target = await file('tool.exe', JPEG_BYTES);

        const error = await rejectionOf(validator.validate(target, { fileId: 'f' }, 'image'));
        expect(error.code).toBe('extension_not_allowed');
    });

    it('rejects empty files', async () => {
        const target = await file('photo.jpg', '');

        const error = await rejectionOf(validator.validate(target, { fileId: 'f' }, 'image'));
        expect(error.code).toBe('empty');
        expect(error.message).toBe('The file is empty.');
    });

    it('rejects files above the size limit and states the limit', async () => {
        const limited = policies();
        limited.image.maxBytes = 3 * 1024 * 1024;
        const strict = new MediaValidator({ policies: limited });
        const target = await file('photo.jpg', Buffer.alloc(3 * 1024 * 1024 + 1, 0x11));

        const error = await rejectionOf(strict.validate(target, { fileId: 'f' }, 'image'));
        expect(error.code).toBe('too_large');
        expect(error.message).toBe('The file is too large (limit 3 MB).');
    });

    it('rejects a reported size over the limit before anything is downloaded', () => {
        const limited = policies();
        limited.video.maxBytes = 20 * 1024 * 1024;
        const strict = new MediaValidator({ policies: limited, metrics });

        expect(() => strict.checkDeclared({ fileId: 'f', sizeBytes: 30 * 1024 * 1024 }, 'video')).toThrow(
            'The file is too large (limit 20 MB).',
        );
        expect(() => strict.checkDeclared({ fileId: 'f', sizeBytes: 1024 }, 'video')).not.toThrow();
        expect(() => strict.checkDeclared({ fileId: 'f' }, 'video')).not.toThrow();
        expect(metrics.get('validation.rejections')).toBe(1);
    });
});

describe('canonicalMime', () => {
    it('lowercases, strips parameters and resolves aliases', () => {
        expect(canonicalMime('Audio/Ogg; codecs=opus')).toBe('audio/ogg');
        expect(canonicalMime('image/jpg')).toBe('image/jpeg');
        expect(canonicalMime('audio/x-m4a')).toBe('audio/mp4');
    });
});
