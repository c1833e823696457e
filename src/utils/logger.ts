import pino from 'pino';
import type { LoggerOptions } from 'pino';

export interface LogConfig {
    level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
    file?: string;
    pretty?: boolean;
}

export type Logger = pino.Logger;

/** Env vars whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN', 'GROQ_API_KEY', 'API_SECRET'];

const KEY_VALUE_SECRET_PATTERN =
    /\b(token|secret|api[_-]?key|password|authorization)\b(\s*[:=]\s*)("[^"]*"|'[^']*'|[^\s,;]+)/gi;

const BOT_TOKEN_PATTERN = /\b\d{6,}:[A-Za-z0-9_-]{30,}\b/g;

/** Redact secrets from free-form text before it is logged or shown to a user. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= 8) {
            scrubbed = scrubbed.split(value).join('[REDACTED]');
        }
    }
    scrubbed = scrubbed.replace(BOT_TOKEN_PATTERN, '[REDACTED]');
    return scrubbed.replace(KEY_VALUE_SECRET_PATTERN, (_match, key: string, sep: string) => `${key}${sep}[REDACTED]`);
}

export function createLogger(config: LogConfig): Logger {
    const prettyTarget = {
        target: 'pino-pretty',
        level: config.level,
        options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
        },
    };

    const options: LoggerOptions = {
        level: config.level,
        redact: {
            paths: ['token', 'apiKey', '*.token', '*.apiKey'],
            censor: '[REDACTED]',
        },
    };

    if (config.file) {
        options.transport = {
            targets: [
                ...(config.pretty === false ? [] : [prettyTarget]),
                {
                    target: 'pino/file',
                    level: config.level,
                    options: { destination: config.file, mkdir: true },
                },
            ],
        };
    } else if (config.pretty !== false) {
        options.transport = prettyTarget;
    }

    return pino(options);
}

function resolveDefaultLevel(): LogConfig['level'] {
    const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
        return raw;
    }
    return process.env.VITEST ? 'silent' : 'info';
}

let rootLogger: Logger = createLogger({
    level: resolveDefaultLevel(),
    pretty: !process.env.VITEST && process.stdout.isTTY === true,
});

/** Process-wide logger; modules take children of it. */
export function getLogger(component?: string): Logger {
    return component ? rootLogger.child({ component }) : rootLogger;
}

/** Replace the root logger, e.g. once the config file has been read. */
export function configureLogger(config: LogConfig): Logger {
    rootLogger = createLogger(config);
    return rootLogger;
}

/**
 * Record a free-form operational note. Kept async so call sites can
 * fire-and-forget it with `void`.
 */
export async function logThought(thought: string): Promise<void> {
    rootLogger.info({ kind: 'thought' }, scrubSensitiveText(thought));
}
