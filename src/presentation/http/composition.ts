import { Config, toMultiplierSettings } from '../../config';
import { RewriteAnnounceUseCase } from '../../application/use-cases/RewriteAnnounceUseCase';
import { IClock, ILogger, ITrackerForwarder, RandomSource } from '../../domain/interfaces';
import { AnnounceRecognizer, UploadedRewriter } from '../../infrastructure/announce';
import { GlobalRatioState, InMemoryTorrentStateStore } from '../../infrastructure/state';
import { HttpTrackerForwarder } from '../../infrastructure/forwarding';
import { SystemClock } from '../../infrastructure/runtime/SystemClock';
import { AppDependencies } from './app';

export interface ProxyDependencies extends AppDependencies {
    torrentStore: InMemoryTorrentStateStore;
    ratioState: GlobalRatioState;
}

export interface CompositionOverrides {
    clock?: IClock;
    random?: RandomSource;
    forwarder?: ITrackerForwarder;
}

/**
 * Wires the announce pipeline from a config snapshot
 */
export function createProxyDependencies(
    config: Config,
    logger: ILogger,
    overrides: CompositionOverrides = {}
): ProxyDependencies {
    const ratioState = new GlobalRatioState();
    const torrentStore = new InMemoryTorrentStateStore(ratioState, { maxTorrents: config.MAX_TRACKED_TORRENTS });

    const rewriteAnnounceUseCase = new RewriteAnnounceUseCase(
        new AnnounceRecognizer(),
        new UploadedRewriter(),
        torrentStore,
        ratioState,
        toMultiplierSettings(config),
        overrides.clock ?? new SystemClock(),
        logger,
        overrides.random
    );

    const forwarder = overrides.forwarder
        ?? new HttpTrackerForwarder({ timeoutMs: config.UPSTREAM_TIMEOUT_SECONDS * 1000 }, logger);

    return { rewriteAnnounceUseCase, forwarder, logger, torrentStore, ratioState };
}
