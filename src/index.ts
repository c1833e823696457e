import type { Server } from 'node:http';
import { startApiServer } from './api/router.js';
import { loadGatewayConfig } from './config/json-config.js';
import { createInboundPipeline } from './core/pipeline.js';
import { TelegramHandler } from './interfaces/telegram_handler.js';
import { GroqAgentGateway } from './services/agent-gateway.js';
import { openDatabase } from './services/db.js';
import { JobScheduler } from './services/job-scheduler.js';
import { MessagePersistenceService } from './services/message-persistence.js';
import { SttService } from './services/stt-service.js';
import { TempSweeper } from './services/temp-sweeper.js';
import { errorMessage } from './utils/errors.js';
import { configureLogger, getLogger, logThought } from './utils/logger.js';

const REPLY_CONTEXT_CLEANUP_CRON = '*/10 * * * *';

async function main(): Promise<void> {
    const config = loadGatewayConfig();
    configureLogger({
        level: config.logging.level,
        file: config.logging.file,
        pretty: process.stdout.isTTY === true,
    });
    const logger = getLogger('main');

    if (!config.telegram.botToken) {
        logger.error('TELEGRAM_BOT_TOKEN is not configured; nothing to receive messages from.');
        process.exitCode = 1;
        return;
    }
    if (!config.voice.groqApiKey) {
        logger.error('GROQ_API_KEY is not configured; the agent back end is unavailable.');
        process.exitCode = 1;
        return;
    }

    // ── Collaborators ────────────────────────────────────────────────────────────

    const telegram = new TelegramHandler(config.telegram.botToken);
    const db = openDatabase(config.storage.dbPath);
    const botUsername = await telegram.getUsername().catch((err: unknown) => {
        logger.warn({ err: errorMessage(err) }, 'Could not resolve bot username; commands addressed to other bots will not be filtered');
        return undefined;
    });

    const pipeline = createInboundPipeline({
        config,
        mediaStore: telegram,
        notifier: telegram,
        agent: new GroqAgentGateway({
            apiKey: config.voice.groqApiKey,
            model: config.agent.model,
            maxTokens: config.agent.maxTokens,
        }),
        transcriber: new SttService(config.voice.groqApiKey),
        persistence: new MessagePersistenceService(db),
        botUsername,
    });

    telegram.onEvent = (event) => pipeline.dispatcher.ingest(event);
    pipeline.dispatcher.start();

    // ── Scheduled Maintenance ────────────────────────────────────────────────────

    const scheduler = new JobScheduler();
    new TempSweeper({
        tempDir: config.media.tempDir,
        maxAgeMs: config.media.sweepMaxAgeMs,
        cronExpression: config.media.sweepCron,
        metrics: pipeline.metrics,
    }).register(scheduler);
    scheduler.register({
        id: 'reply-context-cleanup',
        cronExpression: REPLY_CONTEXT_CLEANUP_CRON,
        description: 'Drop expired reply contexts',
        handler: () => {
            pipeline.replyContext.cleanupExpired();
        },
    });

    // ── Control Plane HTTP API ───────────────────────────────────────────────────

    const server: Server = await startApiServer(
        { inbound: pipeline.dispatcher, metrics: pipeline.metrics, scheduler },
        config.runtime.apiPort,
    );

    void logThought('Inbound gateway started.');

    // ── Signal Handlers ──────────────────────────────────────────────────────────

    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, 'Shutting down');

        scheduler.stopAll();
        await telegram.stop();
        await pipeline.dispatcher.shutdown(config.tasks.shutdownTimeoutMs);
        await new Promise<void>((resolve) => server.close(() => resolve()));
        db.close();
        void logThought(`Inbound gateway received ${signal}; services stopped.`);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
            shutdown(signal).then(
                () => process.exit(0),
                (err: unknown) => {
                    logger.error({ err: errorMessage(err) }, 'Shutdown failed');
                    process.exit(1);
                },
            );
        });
    }
}

main().catch((err: unknown) => {
    getLogger('main').fatal({ err: errorMessage(err) }, 'Gateway failed to start');
    process.exit(1);
});
