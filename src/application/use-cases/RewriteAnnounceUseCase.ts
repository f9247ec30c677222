/**
 * Use case for rewriting a tracker announce
 * Recognizes the request, folds it into torrent state, runs the multiplier
 * policy and substitutes the uploaded value
 */

import {
  IAnnounceRecognizer,
  IAnnounceRewriter,
  IClock,
  IGlobalRatioState,
  ILogger,
  ITorrentStateStore,
  RandomSource,
} from '../../domain/interfaces';
import { AnnounceRequest, MultiplierDecision, MultiplierSettings } from '../../domain/entities';
import { MalformedAnnounceError } from '../../domain/errors';
import { computeMultiplier } from '../services/MultiplierEngine';
import { ByteFormatter } from '../../utils/ByteFormatter';

export interface RewriteAnnounceRequest {
  method: string;
  /** Raw request target exactly as received */
  target: string;
}

export interface RewriteAnnounceResponse {
  /** Target to forward: rewritten, or the original byte for byte */
  target: string;
  rewritten: boolean;
  infoHash?: string;
  decision?: MultiplierDecision;
  error?: string;
}

export class RewriteAnnounceUseCase {
  constructor(
    private recognizer: IAnnounceRecognizer,
    private rewriter: IAnnounceRewriter,
    private torrentStore: ITorrentStateStore,
    private ratioState: IGlobalRatioState,
    private settings: MultiplierSettings,
    private clock: IClock,
    private logger: ILogger,
    private random: RandomSource = Math.random
  ) { }

  async execute(request: RewriteAnnounceRequest): Promise<RewriteAnnounceResponse> {
    let announce: AnnounceRequest;
    try {
      const recognition = this.recognizer.recognize(request.method, request.target);
      if (recognition.kind === 'passthrough') {
        return { target: request.target, rewritten: false };
      }
      announce = recognition.announce;
    } catch (error) {
      return this.forwardUnmodified(request, error);
    }

    return this.torrentStore.runExclusive(announce.infoHash, () => this.applyPolicy(request, announce));
  }

  private applyPolicy(request: RewriteAnnounceRequest, announce: AnnounceRequest): RewriteAnnounceResponse {
    const now = this.clock.now();

    if (this.ratioState.releaseExpiredCooldown(now)) {
      this.logger.info('Leaving cooldown', { at: new Date(now).toISOString() });
    }

    const torrent = this.torrentStore.recordAndGet(announce.infoHash, announce, now);
    if (torrent.becameCompleted) {
      this.logger.info('Torrent marked completed', { infoHash: announce.infoHash });
    }

    const decision = computeMultiplier({
      torrent,
      global: this.ratioState.snapshot(),
      settings: this.settings,
      now,
      random: this.random,
    });

    if (decision.enteringCooldown) {
      this.ratioState.enterCooldown(decision.cooldownUntil);
      this.logger.warn('Entering cooldown', {
        ratio: Number(decision.prospectiveRatio.toFixed(3)),
        limit: this.settings.globalRatioLimit,
        until: new Date(decision.cooldownUntil).toISOString(),
      });
    }

    let target: string;
    try {
      target = this.rewriter.rewrite(request.target, decision.fakeUploadedBytes);
    } catch (error) {
      return this.forwardUnmodified(request, error);
    }

    this.torrentStore.commit(announce.infoHash, decision.fakeUploadedBytes, now);

    this.logger.info(
      `Announce rewritten | Multiplier: ${ByteFormatter.toMultiplier(decision.multiplier)} | ` +
      `Downloaded: ${ByteFormatter.toMB(torrent.realDownloadedBytes)} | ` +
      `Reported Upload: ${ByteFormatter.toMB(decision.fakeUploadedBytes)}`,
      {
        infoHash: announce.infoHash,
        downloaded: torrent.realDownloadedBytes,
        fakeUploaded: decision.fakeUploadedBytes,
        multiplier: decision.multiplier,
        seeding: decision.seeding,
        cooldown: decision.inCooldown,
        speedCapped: decision.speedCapped,
      }
    );

    return {
      target,
      rewritten: true,
      infoHash: announce.infoHash,
      decision,
    };
  }

  private forwardUnmodified(request: RewriteAnnounceRequest, error: unknown): RewriteAnnounceResponse {
    if (!(error instanceof MalformedAnnounceError)) {
      throw error;
    }
    this.logger.warn(`Forwarding unmodified announce: ${error.message}`, {
      target: request.target.slice(0, 120),
    });
    return { target: request.target, rewritten: false, error: error.message };
  }
}
