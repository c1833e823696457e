import { open, stat } from 'node:fs/promises';
import path from 'node:path';
import { fileTypeFromFile } from 'file-type';
import type { MediaKindPolicy } from '../config/json-config.js';
import type { MediaRef } from '../types/messaging.js';
import type { GatewayMetrics } from './gateway-metrics.js';
import { MediaRejectedError, type MediaRejectionCode } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export type MediaPolicyKind = 'image' | 'voice' | 'video' | 'document';

export type MediaPolicies = Record<MediaPolicyKind, MediaKindPolicy>;

export interface ValidatedMedia {
    sizeBytes: number;
    extension?: string;
    /** Canonical MIME type, detected from content or inferred for undetectable text documents. */
    mimeType: string;
    detected: boolean;
}

/** Extension → MIME for the formats the default policies accept. */
const EXTENSION_MIME: Record<string, string> = {
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    png: 'image/png',
    webp: 'image/webp',
    ogg: 'audio/ogg',
    oga: 'audio/ogg',
    opus: 'audio/ogg',
    mp3: 'audio/mpeg',
    m4a: 'audio/mp4',
    wav: 'audio/wav',
    mp4: 'video/mp4',
    mov: 'video/quicktime',
    webm: 'video/webm',
    mkv: 'video/x-matroska',
    pdf: 'application/pdf',
    txt: 'text/plain',
    md: 'text/markdown',
    csv: 'text/csv',
    json: 'application/json',
};

/** Spellings that name the same container. */
const MIME_ALIASES: Record<string, string> = {
    'image/jpg': 'image/jpeg',
    'image/pjpeg': 'image/jpeg',
    'audio/opus': 'audio/ogg',
    'audio/x-wav': 'audio/wav',
    'audio/wave': 'audio/wav',
    'audio/vnd.wave': 'audio/wav',
    'audio/x-m4a': 'audio/mp4',
    'audio/m4a': 'audio/mp4',
    'audio/mp3': 'audio/mpeg',
    'video/x-m4v': 'video/mp4',
    'application/x-pdf': 'application/pdf',
    'text/x-markdown': 'text/markdown',
};

/** Containers that carry either audio or video under the same signature. */
const CONTAINER_FAMILY: Record<string, string> = {
    'audio/mp4': 'mp4',
    'video/mp4': 'mp4',
    'audio/ogg': 'ogg',
    'video/ogg': 'ogg',
    'audio/webm': 'webm',
    'video/webm': 'webm',
};

const REASONS: Record<MediaRejectionCode, string> = {
    empty: 'The file is empty.',
    too_large: 'The file is too large.',
    extension_not_allowed: 'Files with this extension are not supported.',
    type_not_allowed: 'This file type is not supported.',
    type_unverified: 'The file type could not be verified.',
    type_mismatch: 'The file type does not match its name or declared type.',
};

const TEXT_SNIFF_BYTES = 4096;

/** Declared types that say nothing about the content. */
const UNINFORMATIVE_MIME = new Set(['application/octet-stream', 'binary/octet-stream']);

export function canonicalMime(mime: string): string {
    const lowered = mime.trim().toLowerCase().split(';')[0]?.trim() ?? '';
    return MIME_ALIASES[lowered] ?? lowered;
}

function sameType(a: string, b: string): boolean {
    const left = canonicalMime(a);
    const right = canonicalMime(b);
    if (left === right) return true;
    const family = CONTAINER_FAMILY[left];
    return family !== undefined && family === CONTAINER_FAMILY[right];
}

function extensionOf(media: MediaRef, localPath: string): string | undefined {
    const source = media.fileName ?? localPath;
    const ext = path.extname(source).replace(/^\./, '').toLowerCase();
    return ext || undefined;
}

function formatLimit(bytes: number): string {
    const megabytes = Math.round((bytes / (1024 * 1024)) * 10) / 10;
    return `${megabytes} MB`;
}

async function looksLikeText(filePath: string): Promise<boolean> {
    const handle = await open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(TEXT_SNIFF_BYTES);
        const { bytesRead } = await handle.read(buffer, 0, TEXT_SNIFF_BYTES, 0);
        return !buffer.subarray(0, bytesRead).includes(0);
    } finally {
        await handle.close();
    }
}

/**
 * Checks a downloaded file against the policy of its media kind: size cap,
 * extension allow-list, content signature, and agreement between the
 * detected, extension-implied and declared types.
 *
 * Rejections carry a user-safe reason. Logs record the reason code only,
 * never the path, content or detected type.
 */
export class MediaValidator {
    readonly #policies: MediaPolicies;
    readonly #logger: Logger;
    readonly #metrics?: GatewayMetrics;

    constructor(options: { policies: MediaPolicies; logger?: Logger; metrics?: GatewayMetrics }) {
        this.#policies = options.policies;
        this.#logger = options.logger ?? getLogger('media-validator');
        this.#metrics = options.metrics;
    }

    /** Reject before download when the transport already reports a size over the limit. */
    checkDeclared(media: MediaRef, kind: MediaPolicyKind): void {
        const policy = this.#policies[kind];
        if (media.sizeBytes !== undefined && media.sizeBytes > policy.maxBytes) {
            throw this.#rejection(kind, 'too_large', `The file is too large (limit ${formatLimit(policy.maxBytes)}).`);
        }
    }

    async validate(filePath: string, media: MediaRef, kind: MediaPolicyKind): Promise<ValidatedMedia> {
        const policy = this.#policies[kind];
        const { size } = await stat(filePath);

        if (size === 0) {
            throw this.#rejection(kind, 'empty');
        }
        if (size > policy.maxBytes) {
            throw this.#rejection(kind, 'too_large', `The file is too large (limit ${formatLimit(policy.maxBytes)}).`);
        }

        const extension = extensionOf(media, filePath);
        if (extension !== undefined && !policy.allowedExtensions.includes(extension)) {
            throw this.#rejection(kind, 'extension_not_allowed');
        }

        const allowed = policy.allowedMimeTypes.map(canonicalMime);
        const impliedByExtension = extension !== undefined ? EXTENSION_MIME[extension] : undefined;
        const detected = await fileTypeFromFile(filePath);

        let mimeType: string;
        if (detected) {
            mimeType = canonicalMime(detected.mime);
            if (!allowed.some((candidate) => sameType(candidate, mimeType))) {
                throw this.#rejection(kind, 'type_not_allowed');
            }
            if (impliedByExtension !== undefined && !sameType(impliedByExtension, mimeType)) {
                throw this.#rejection(kind, 'type_mismatch');
            }
        } else {
            if (!policy.allowUndetected || impliedByExtension === undefined) {
                throw this.#rejection(kind, 'type_unverified');
            }
            mimeType = canonicalMime(impliedByExtension);
            if (!allowed.includes(mimeType) || !(await looksLikeText(filePath))) {
                throw this.#rejection(kind, 'type_unverified');
            }
        }

        const declared = media.declaredMime ? canonicalMime(media.declaredMime) : undefined;
        if (declared && !UNINFORMATIVE_MIME.has(declared) && !sameType(declared, mimeType)) {
            throw this.#rejection(kind, 'type_mismatch');
        }

        return { sizeBytes: size, extension, mimeType, detected: detected !== undefined };
    }

    #rejection(kind: MediaPolicyKind, code: MediaRejectionCode, reason: string = REASONS[code]): MediaRejectedError {
        this.#metrics?.increment('validation.rejections');
        this.#logger.info({ kind, code }, 'Media rejected by validation');
        return new MediaRejectedError(code, reason);
    }
}
