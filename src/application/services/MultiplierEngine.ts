/**
 * Multiplier policy for rewritten announces
 *
 * Pure: time and randomness come in as arguments so results are reproducible.
 */

import {
  GlobalRatioSnapshot,
  MultiplierDecision,
  MultiplierSettings,
  TorrentSnapshot,
  ratioOf,
} from '../../domain/entities';
import { RandomSource } from '../../domain/interfaces';

const BYTES_PER_MEGABIT = 1_000_000 / 8;
const MS_PER_MINUTE = 60_000;

export interface MultiplierInput {
  torrent: TorrentSnapshot;
  global: GlobalRatioSnapshot;
  settings: MultiplierSettings;
  /** Epoch milliseconds */
  now: number;
  random: RandomSource;
}

/**
 * Linear ramp from 1.0 at first sight to the configured maximum, held flat afterwards
 */
export function rampMultiplier(settings: MultiplierSettings, elapsedMs: number): number {
  if (settings.rampUpSeconds <= 0) {
    return settings.maxUploadMultiplier;
  }
  const progress = Math.min(1, Math.max(0, elapsedMs / 1000 / settings.rampUpSeconds));
  return 1 + (settings.maxUploadMultiplier - 1) * progress;
}

/**
 * Per-request jitter drawn uniformly from [1 - factor, 1 + factor)
 */
export function jitterFactor(randomizationFactor: number, random: RandomSource): number {
  if (randomizationFactor <= 0) {
    return 1;
  }
  return 1 - randomizationFactor + 2 * randomizationFactor * random();
}

interface CappedUpload {
  multiplier: number;
  fakeUploadedBytes: number;
  speedCapped: boolean;
}

/**
 * Keeps the increase since the previous report within the simulated link speed.
 * The clamped report never drops below a straight 1:1 report.
 */
export function applySpeedCap(
  torrent: TorrentSnapshot,
  multiplier: number,
  maxSimulatedSpeedMbps: number,
  now: number
): CappedUpload {
  const real = torrent.realDownloadedBytes;
  const candidate = Math.floor(real * multiplier);

  if (torrent.lastReportAt === null) {
    return { multiplier, fakeUploadedBytes: candidate, speedCapped: false };
  }

  const elapsedSeconds = Math.max(0, (now - torrent.lastReportAt) / 1000);
  const allowedIncrease = maxSimulatedSpeedMbps * BYTES_PER_MEGABIT * elapsedSeconds;

  if (candidate - torrent.lastReportedUploadedBytes <= allowedIncrease) {
    return { multiplier, fakeUploadedBytes: candidate, speedCapped: false };
  }

  const clamped = Math.max(real, Math.floor(torrent.lastReportedUploadedBytes + allowedIncrease));
  return {
    multiplier: real > 0 ? clamped / real : 1,
    fakeUploadedBytes: clamped,
    speedCapped: true,
  };
}

/**
 * Decides the multiplier and uploaded figure for one announce.
 *
 * Order: active cooldown, boost (seeding or ramp, jitter, speed cap), then the
 * aggregate ratio limit, which is checked against the ratio this announce
 * would produce.
 */
export function computeMultiplier(input: MultiplierInput): MultiplierDecision {
  const { torrent, global, settings, now } = input;
  const real = torrent.realDownloadedBytes;
  const seeding = torrent.completed;
  const currentRatio = ratioOf(global.aggregateFakeUploaded, global.aggregateRealDownloaded);

  const unboosted = (enteringCooldown: boolean, cooldownUntil: number, prospectiveRatio: number): MultiplierDecision => ({
    multiplier: 1,
    fakeUploadedBytes: real,
    seeding,
    inCooldown: true,
    enteringCooldown,
    cooldownUntil,
    speedCapped: false,
    prospectiveRatio,
  });

  if (now < global.cooldownUntil) {
    return unboosted(false, global.cooldownUntil, currentRatio);
  }

  const base = seeding
    ? settings.seedingMultiplier
    : rampMultiplier(settings, now - torrent.firstSeenAt);
  const jittered = base * jitterFactor(settings.randomizationFactor, input.random);
  const capped = applySpeedCap(torrent, jittered, settings.maxSimulatedSpeedMbps, now);

  const prospectiveRatio = ratioOf(
    global.aggregateFakeUploaded + capped.fakeUploadedBytes - torrent.lastReportedUploadedBytes,
    global.aggregateRealDownloaded + real - torrent.lastReportedDownloadedBytes
  );

  if (currentRatio >= settings.globalRatioLimit || prospectiveRatio >= settings.globalRatioLimit) {
    return unboosted(true, now + settings.cooldownDurationMinutes * MS_PER_MINUTE, prospectiveRatio);
  }

  return {
    multiplier: capped.multiplier,
    fakeUploadedBytes: capped.fakeUploadedBytes,
    seeding,
    inCooldown: false,
    enteringCooldown: false,
    cooldownUntil: global.cooldownUntil,
    speedCapped: capped.speedCapped,
    prospectiveRatio,
  };
}
