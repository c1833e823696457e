import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { getLogger } from '../utils/logger.js';

export interface MediaKindPolicy {
    maxBytes: number;
    allowedExtensions: string[];
    allowedMimeTypes: string[];
    /**
     * Accept files whose content signature cannot be detected, using the
     * extension to infer the type. Only sensible for plain-text documents.
     */
    allowUndetected: boolean;
}

export interface BufferConfig {
    debounceMs: number;
    maxWaitMs: number;
    maxCapacity: number;
    textSeparator: string;
}

export interface GatewayConfig {
    runtime: {
        apiPort: number;
    };
    buffer: BufferConfig;
    media: {
        tempDir: string;
        downloadTimeoutMs: number;
        sweepCron: string;
        sweepMaxAgeMs: number;
        maxDocumentChars: number;
        image: MediaKindPolicy;
        voice: MediaKindPolicy;
        video: MediaKindPolicy;
        document: MediaKindPolicy;
    };
    collect: {
        triggerKeywords: string[];
    };
    tasks: {
        shutdownTimeoutMs: number;
    };
    telegram: {
        botToken: string;
    };
    voice: {
        groqApiKey: string;
        ffmpegPath: string;
    };
    agent: {
        model: string;
        maxTokens: number;
    };
    storage: {
        dbPath: string;
    };
    logging: {
        level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
        file?: string;
    };
}

/** Bot API `getFile` refuses anything larger. */
const TELEGRAM_DOWNLOAD_LIMIT_BYTES = 20 * 1024 * 1024;

export const DEFAULT_CONFIG: GatewayConfig = {
    runtime: {
        apiPort: 18789,
    },
    buffer: {
        debounceMs: 2500,
        maxWaitMs: 30_000,
        maxCapacity: 10,
        textSeparator: ' ',
    },
    media: {
        tempDir: path.join(os.tmpdir(), 'inbound-gateway'),
        downloadTimeoutMs: 90_000,
        sweepCron: '0 * * * *',
        sweepMaxAgeMs: 60 * 60 * 1000,
        maxDocumentChars: 50_000,
        image: {
            maxBytes: 6_291_456,
            allowedExtensions: ['jpg', 'jpeg', 'png', 'webp'],
            allowedMimeTypes: ['image/jpeg', 'image/png', 'image/webp'],
            allowUndetected: false,
        },
        voice: {
            maxBytes: TELEGRAM_DOWNLOAD_LIMIT_BYTES,
            allowedExtensions: ['ogg', 'oga', 'opus', 'mp3', 'm4a', 'wav', 'mp4'],
            allowedMimeTypes: ['audio/ogg', 'audio/opus', 'audio/mpeg', 'audio/mp4', 'audio/x-m4a', 'audio/wav', 'audio/x-wav', 'video/mp4'],
            allowUndetected: false,
        },
        video: {
            maxBytes: TELEGRAM_DOWNLOAD_LIMIT_BYTES,
            allowedExtensions: ['mp4', 'mov', 'webm', 'mkv'],
            allowedMimeTypes: ['video/mp4', 'video/quicktime', 'video/webm', 'video/x-matroska'],
            allowUndetected: false,
        },
        document: {
            maxBytes: 10 * 1024 * 1024,
            allowedExtensions: ['pdf', 'txt', 'md', 'csv', 'json'],
            allowedMimeTypes: ['application/pdf', 'text/plain', 'text/markdown', 'text/csv', 'application/json'],
            allowUndetected: true,
        },
    },
    collect: {
        triggerKeywords: ['now respond', 'go ahead', 'process this', '/go'],
    },
    tasks: {
        shutdownTimeoutMs: 5000,
    },
    telegram: {
        botToken: '',
    },
    voice: {
        groqApiKey: '',
        ffmpegPath: 'ffmpeg',
    },
    agent: {
        model: 'meta-llama/llama-4-scout-17b-16e-instruct',
        maxTokens: 1024,
    },
    storage: {
        dbPath: 'memory/gateway.db',
    },
    logging: {
        level: 'info',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.GATEWAY_CONFIG_PATH) {
        return path.resolve(process.env.GATEWAY_CONFIG_PATH);
    }
    return path.resolve('gateway.json');
}

export async function readConfig(overridePath?: string): Promise<GatewayConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, fallback: string[]): string[] {
    return Array.isArray(value)
        ? value.filter((entry): entry is string => typeof entry === 'string')
        : fallback;
}

function positiveInt(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
}

function mergeMediaPolicy(base: MediaKindPolicy, loaded: unknown): MediaKindPolicy {
    if (!isRecord(loaded)) return { ...base };
    return {
        maxBytes: positiveInt(loaded.maxBytes, base.maxBytes),
        allowedExtensions: stringList(loaded.allowedExtensions, base.allowedExtensions).map((ext) =>
            ext.toLowerCase().replace(/^\./, ''),
        ),
        allowedMimeTypes: stringList(loaded.allowedMimeTypes, base.allowedMimeTypes).map((mime) => mime.toLowerCase()),
        allowUndetected: typeof loaded.allowUndetected === 'boolean' ? loaded.allowUndetected : base.allowUndetected,
    };
}

export function mergeWithDefaults(loaded: unknown): GatewayConfig {
    const record = isRecord(loaded) ? loaded : {};
    const config: GatewayConfig = structuredClone(DEFAULT_CONFIG);

    const runtime = isRecord(record.runtime) ? record.runtime : {};
    config.runtime.apiPort = positiveInt(runtime.apiPort, config.runtime.apiPort);

    if (isRecord(record.buffer)) {
        const buffer = record.buffer;
        config.buffer = {
            debounceMs: positiveInt(buffer.debounceMs, config.buffer.debounceMs),
            maxWaitMs: positiveInt(buffer.maxWaitMs, config.buffer.maxWaitMs),
            maxCapacity: Math.max(1, positiveInt(buffer.maxCapacity, config.buffer.maxCapacity)),
            textSeparator: typeof buffer.textSeparator === 'string' ? buffer.textSeparator : config.buffer.textSeparator,
        };
    }

    if (isRecord(record.media)) {
        const media = record.media;
        config.media = {
            tempDir: typeof media.tempDir === 'string' && media.tempDir.trim() ? media.tempDir : config.media.tempDir,
            downloadTimeoutMs: positiveInt(media.downloadTimeoutMs, config.media.downloadTimeoutMs),
            sweepCron: typeof media.sweepCron === 'string' ? media.sweepCron : config.media.sweepCron,
            sweepMaxAgeMs: positiveInt(media.sweepMaxAgeMs, config.media.sweepMaxAgeMs),
            maxDocumentChars: positiveInt(media.maxDocumentChars, config.media.maxDocumentChars),
            image: mergeMediaPolicy(config.media.image, media.image),
            voice: mergeMediaPolicy(config.media.voice, media.voice),
            video: mergeMediaPolicy(config.media.video, media.video),
            document: mergeMediaPolicy(config.media.document, media.document),
        };
    }

    if (isRecord(record.collect)) {
        config.collect.triggerKeywords = stringList(record.collect.triggerKeywords, config.collect.triggerKeywords);
    }
    if (isRecord(record.tasks)) {
        config.tasks.shutdownTimeoutMs = positiveInt(record.tasks.shutdownTimeoutMs, config.tasks.shutdownTimeoutMs);
    }
    if (isRecord(record.telegram) && typeof record.telegram.botToken === 'string') {
        config.telegram.botToken = record.telegram.botToken;
    }
    if (isRecord(record.voice)) {
        const voice = record.voice;
        if (typeof voice.groqApiKey === 'string') config.voice.groqApiKey = voice.groqApiKey;
        if (typeof voice.ffmpegPath === 'string') config.voice.ffmpegPath = voice.ffmpegPath;
    }
    if (isRecord(record.agent)) {
        const agent = record.agent;
        if (typeof agent.model === 'string' && agent.model.trim()) config.agent.model = agent.model;
        config.agent.maxTokens = positiveInt(agent.maxTokens, config.agent.maxTokens);
    }
    if (isRecord(record.storage) && typeof record.storage.dbPath === 'string') {
        config.storage.dbPath = record.storage.dbPath;
    }
    if (isRecord(record.logging)) {
        const level = record.logging.level;
        if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
            config.logging.level = level;
        }
        if (typeof record.logging.file === 'string') config.logging.file = record.logging.file;
    }

    return config;
}

// ── Flat key adapter ────────────────────────────────────────────────────────

let cachedConfig: GatewayConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): GatewayConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        getLogger('config').error(
            { configPath, err: error instanceof Error ? error.message : String(error) },
            'Failed to parse JSON config, using defaults',
        );
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

const ENV_OVERRIDES = new Set([
    'API_PORT',
    'BUFFER_DEBOUNCE_MS',
    'BUFFER_MAX_WAIT_MS',
    'BUFFER_MAX_CAPACITY',
    'MEDIA_TEMP_DIR',
    'MEDIA_SWEEP_CRON',
    'TELEGRAM_BOT_TOKEN',
    'GROQ_API_KEY',
    'FFMPEG_PATH',
    'AGENT_MODEL',
    'GATEWAY_DB_PATH',
    'LOG_LEVEL',
    'LOG_FILE',
]);

/**
 * Gets a configured value either from an env override or `gateway.json`
 * (merged with defaults).
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();
    let jsonValue: unknown = undefined;

    switch (key) {
        case 'API_PORT': jsonValue = config.runtime.apiPort; break;
        case 'BUFFER_DEBOUNCE_MS': jsonValue = config.buffer.debounceMs; break;
        case 'BUFFER_MAX_WAIT_MS': jsonValue = config.buffer.maxWaitMs; break;
        case 'BUFFER_MAX_CAPACITY': jsonValue = config.buffer.maxCapacity; break;
        case 'MEDIA_TEMP_DIR': jsonValue = config.media.tempDir; break;
        case 'MEDIA_SWEEP_CRON': jsonValue = config.media.sweepCron; break;
        case 'TELEGRAM_BOT_TOKEN': jsonValue = config.telegram.botToken; break;
        case 'GROQ_API_KEY': jsonValue = config.voice.groqApiKey; break;
        case 'FFMPEG_PATH': jsonValue = config.voice.ffmpegPath; break;
        case 'AGENT_MODEL': jsonValue = config.agent.model; break;
        case 'GATEWAY_DB_PATH': jsonValue = config.storage.dbPath; break;
        case 'LOG_LEVEL': jsonValue = config.logging.level; break;
        case 'LOG_FILE': jsonValue = config.logging.file; break;
    }

    const envValue = process.env[key];
    if (ENV_OVERRIDES.has(key) && envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }

    return undefined;
}

/** The merged config with every env override applied. */
export function loadGatewayConfig(): GatewayConfig {
    const config = structuredClone(reloadConfigSync());
    const numberOr = (key: string, fallback: number): number => {
        const parsed = Number(getConfigValue(key));
        return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
    };

    config.runtime.apiPort = numberOr('API_PORT', config.runtime.apiPort);
    config.buffer.debounceMs = numberOr('BUFFER_DEBOUNCE_MS', config.buffer.debounceMs);
    config.buffer.maxWaitMs = numberOr('BUFFER_MAX_WAIT_MS', config.buffer.maxWaitMs);
    config.buffer.maxCapacity = Math.max(1, numberOr('BUFFER_MAX_CAPACITY', config.buffer.maxCapacity));
    config.media.tempDir = getConfigValue('MEDIA_TEMP_DIR') ?? config.media.tempDir;
    config.media.sweepCron = getConfigValue('MEDIA_SWEEP_CRON') ?? config.media.sweepCron;
    config.telegram.botToken = getConfigValue('TELEGRAM_BOT_TOKEN') ?? '';
    config.voice.groqApiKey = getConfigValue('GROQ_API_KEY') ?? '';
    config.voice.ffmpegPath = getConfigValue('FFMPEG_PATH') ?? config.voice.ffmpegPath;
    config.agent.model = getConfigValue('AGENT_MODEL') ?? config.agent.model;
    config.storage.dbPath = getConfigValue('GATEWAY_DB_PATH') ?? config.storage.dbPath;

    const level = getConfigValue('LOG_LEVEL');
    if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent') {
        config.logging.level = level;
    }
    const logFile = getConfigValue('LOG_FILE');
    if (logFile) config.logging.file = logFile;

    return config;
}
