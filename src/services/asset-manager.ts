import { randomUUID } from 'node:crypto';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import path from 'node:path';
import type { MediaRef } from '../types/messaging.js';
import type { MediaStore } from '../types/collaborators.js';
import type { GatewayMetrics } from './gateway-metrics.js';
import { getLogger, type Logger } from '../utils/logger.js';
import {
    TransientMediaError,
    errorMessage,
    isAbortError,
    isTransientNetworkError,
    throwIfAborted,
} from '../utils/errors.js';

/** A downloaded temporary file owned by exactly one scope. */
export interface ManagedAsset {
    readonly path: string;
    /** Private directory holding the file and anything derived from it. */
    readonly directory: string;
    readonly ownerScope: string;
    readonly media: MediaRef;
}

/** Acquisition context handed to {@link AssetManager.withScope} callbacks. */
export interface AssetScope {
    readonly id: string;
    readonly assets: readonly ManagedAsset[];
    acquire(media: MediaRef): Promise<ManagedAsset>;
    /** Path for a file derived from `asset`; it is released together with the asset. */
    derivePath(asset: ManagedAsset, fileName: string): string;
    /** Release one asset before the scope ends, e.g. after it failed validation. */
    release(asset: ManagedAsset): Promise<void>;
}

export interface AssetManagerOptions {
    mediaStore: MediaStore;
    tempDir: string;
    downloadTimeoutMs?: number;
    logger?: Logger;
    metrics?: GatewayMetrics;
}

export interface ScopeOptions {
    owner?: string;
    signal?: AbortSignal;
}

interface Lease {
    directory: string;
    asset?: ManagedAsset;
    /** Files the media store wrote outside the lease directory. */
    strayPaths: string[];
}

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 90_000;

function isInside(directory: string, candidate: string): boolean {
    const relative = path.relative(directory, path.resolve(candidate));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Scoped temporary files for downloaded media.
 *
 * Every acquisition gets its own directory under `tempDir`. When the scope
 * callback returns or throws, every directory the scope created is removed,
 * including ones whose download failed halfway. Removal is not cancellable
 * and a failed removal is logged and counted rather than thrown.
 */
export class AssetManager {
    readonly #mediaStore: MediaStore;
    readonly #tempDir: string;
    readonly #downloadTimeoutMs: number;
    readonly #logger: Logger;
    readonly #metrics?: GatewayMetrics;

    constructor(options: AssetManagerOptions) {
        this.#mediaStore = options.mediaStore;
        this.#tempDir = path.resolve(options.tempDir);
        this.#downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
        this.#logger = options.logger ?? getLogger('asset-manager');
        this.#metrics = options.metrics;
    }

    get tempDir(): string {
        return this.#tempDir;
    }

    /** Download one file, run `fn` with it and remove it afterwards. */
    async withAsset<T>(
        media: MediaRef,
        fn: (asset: ManagedAsset) => Promise<T>,
        options: ScopeOptions = {},
    ): Promise<T> {
        return this.withScope(async (scope) => fn(await scope.acquire(media)), options);
    }

    /** Download several files; all of them are removed once `fn` settles. */
    async withAssets<T>(
        media: readonly MediaRef[],
        fn: (assets: ManagedAsset[]) => Promise<T>,
        options: ScopeOptions = {},
    ): Promise<T> {
        return this.withScope(async (scope) => {
            const assets: ManagedAsset[] = [];
            for (const ref of media) {
                assets.push(await scope.acquire(ref));
            }
            return fn(assets);
        }, options);
    }

    /**
     * Run `fn` with a scope that can acquire any number of assets. Every asset
     * acquired through the scope is released when `fn` returns or throws.
     */
    async withScope<T>(fn: (scope: AssetScope) => Promise<T>, options: ScopeOptions = {}): Promise<T> {
        const scopeId = `${options.owner ?? 'scope'}:${randomUUID().slice(0, 8)}`;
        const leases: Lease[] = [];
        const assets: ManagedAsset[] = [];

        const scope: AssetScope = {
            id: scopeId,
            assets,
            acquire: async (media) => {
                throwIfAborted(options.signal);
                const lease = await this.#openLease(scopeId);
                leases.push(lease);
                const asset = await this.#download(media, lease, scopeId, options.signal);
                assets.push(asset);
                return asset;
            },
            derivePath: (asset, fileName) => path.join(asset.directory, path.basename(fileName)),
            release: async (asset) => {
                const index = leases.findIndex((lease) => lease.asset === asset);
                if (index === -1) return;
                const [lease] = leases.splice(index, 1);
                const assetIndex = assets.indexOf(asset);
                if (assetIndex !== -1) assets.splice(assetIndex, 1);
                if (lease) await this.#releaseAll(scopeId, [lease]);
            },
        };

        try {
            return await fn(scope);
        } finally {
            await this.#releaseAll(scopeId, leases);
        }
    }

    async #openLease(scopeId: string): Promise<Lease> {
        await mkdir(this.#tempDir, { recursive: true });
        const directory = await mkdtemp(path.join(this.#tempDir, 'asset-'));
        this.#metrics?.increment('assets.acquired');
        this.#logger.debug({ scope: scopeId, directory }, 'Asset directory created');
        return { directory, strayPaths: [] };
    }

    async #download(media: MediaRef, lease: Lease, scopeId: string, signal?: AbortSignal): Promise<ManagedAsset> {
        const controller = new AbortController();
        let timedOut = false;
        const onParentAbort = (): void => controller.abort(signal?.reason);
        signal?.addEventListener('abort', onParentAbort, { once: true });
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.#downloadTimeoutMs);

        try {
            const localPath = await this.#mediaStore.download(media, lease.directory, controller.signal);
            if (!isInside(lease.directory, localPath)) {
                lease.strayPaths.push(path.resolve(localPath));
            }
            throwIfAborted(signal);
            if (timedOut) {
                throw new TransientMediaError();
            }
            const asset: ManagedAsset = {
                path: path.resolve(localPath),
                directory: lease.directory,
                ownerScope: scopeId,
                media,
            };
            lease.asset = asset;
            return asset;
        } catch (err) {
            if (signal?.aborted) {
                throwIfAborted(signal);
            }
            if (timedOut || (!isAbortError(err) && isTransientNetworkError(err))) {
                this.#logger.warn({ scope: scopeId, timedOut, err: errorMessage(err) }, 'Media download failed transiently');
                throw err instanceof TransientMediaError ? err : new TransientMediaError(undefined, { cause: err });
            }
            throw err;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onParentAbort);
        }
    }

    async #releaseAll(scopeId: string, leases: Lease[]): Promise<void> {
        const targets = leases.flatMap((lease) => [lease.directory, ...lease.strayPaths]);
        const results = await Promise.allSettled(targets.map((target) => rm(target, { recursive: true, force: true })));

        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                this.#metrics?.increment('assets.cleanupFailures');
                this.#logger.warn(
                    { scope: scopeId, target: targets[index], err: errorMessage(result.reason) },
                    'Failed to remove temporary asset',
                );
            }
        });

        const released = leases.length;
        if (released > 0) {
            this.#metrics?.increment('assets.released', released);
            this.#logger.debug({ scope: scopeId, released }, 'Scope assets released');
        }
    }
}
