/**
 * Unit tests for the multiplier engine
 */

import { describe, it, expect } from 'vitest';
import { applySpeedCap, computeMultiplier, jitterFactor, rampMultiplier } from './MultiplierEngine';
import { GlobalRatioSnapshot, MultiplierSettings, TorrentSnapshot } from '../../domain/entities';

const MB = 1024 * 1024;
const T0 = Date.UTC(2024, 0, 1);

const settings: MultiplierSettings = {
    maxUploadMultiplier: 5,
    seedingMultiplier: 1.5,
    rampUpSeconds: 3600,
    randomizationFactor: 0,
    maxSimulatedSpeedMbps: 1000,
    globalRatioLimit: 100,
    cooldownDurationMinutes: 30
};

const emptyGlobal: GlobalRatioSnapshot = {
    aggregateRealDownloaded: 0,
    aggregateFakeUploaded: 0,
    cooldownUntil: 0
};

function torrent(overrides: Partial<TorrentSnapshot> = {}): TorrentSnapshot {
    return {
        infoHash: 'aa',
        realDownloadedBytes: 100 * MB,
        realUploadedBytes: 0,
        firstSeenAt: T0,
        completed: false,
        lastReportedUploadedBytes: 0,
        lastReportedDownloadedBytes: 0,
        lastReportAt: null,
        becameCompleted: false,
        ...overrides
    };
}

const noJitter = () => 0.5;

describe('MultiplierEngine', () => {
    describe('rampMultiplier', () => {
        it('should start at 1.0 on first sight', () => {
            expect(rampMultiplier(settings, 0)).toBe(1);
        });

        it('should be halfway at half the ramp time', () => {
            expect(rampMultiplier(settings, 1800 * 1000)).toBe(3);
        });

        it('should follow the linear formula across the ramp', () => {
            let previous = 0;
            for (let t = 0; t <= 3600; t += 300) {
                const value = rampMultiplier(settings, t * 1000);
                expect(value).toBeCloseTo(1 + (5 - 1) * t / 3600, 10);
                expect(value).toBeGreaterThanOrEqual(previous);
                previous = value;
            }
        });

        it('should hold the maximum after the ramp', () => {
            expect(rampMultiplier(settings, 3601 * 1000)).toBe(5);
            expect(rampMultiplier(settings, 10 * 3600 * 1000)).toBe(5);
        });

        it('should jump to the maximum when the ramp is zero', () => {
            expect(rampMultiplier({ ...settings, rampUpSeconds: 0 }, 0)).toBe(5);
        });
    });

    describe('jitterFactor', () => {
        it('should be exactly 1 when randomization is off', () => {
            expect(jitterFactor(0, () => 0.99)).toBe(1);
        });

        it('should span [1 - r, 1 + r)', () => {
            expect(jitterFactor(0.25, () => 0)).toBe(0.75);
            expect(jitterFactor(0.25, () => 0.5)).toBe(1);
            expect(jitterFactor(0.25, () => 0.999)).toBeCloseTo(1.2495, 10);
        });
    });

    describe('applySpeedCap', () => {
        it('should not cap the first report of a torrent', () => {
            const result = applySpeedCap(torrent(), 5, 1, T0);
            expect(result).toEqual({ multiplier: 5, fakeUploadedBytes: 500 * MB, speedCapped: false });
        });

        it('should clamp the increase to the configured rate', () => {
            // 8 Mbps over 10 s allows 10,000,000 bytes
            const snapshot = torrent({
                realDownloadedBytes: 100_000_000,
                lastReportedUploadedBytes: 100_000_000,
                lastReportAt: T0
            });

            const result = applySpeedCap(snapshot, 3, 8, T0 + 10_000);

            expect(result.speedCapped).toBe(true);
            expect(result.fakeUploadedBytes).toBe(110_000_000);
            expect(result.multiplier).toBeCloseTo(1.1, 10);
        });

        it('should never clamp below a 1:1 report', () => {
            const snapshot = torrent({
                realDownloadedBytes: 100_000_000,
                lastReportedUploadedBytes: 50_000_000,
                lastReportAt: T0
            });

            const result = applySpeedCap(snapshot, 3, 8, T0 + 1000);

            expect(result).toEqual({ multiplier: 1, fakeUploadedBytes: 100_000_000, speedCapped: true });
        });

        it('should leave increases within the cap untouched', () => {
            const snapshot = torrent({
                realDownloadedBytes: 1_000_000,
                lastReportedUploadedBytes: 1_000_000,
                lastReportAt: T0
            });

            const result = applySpeedCap(snapshot, 2, 8, T0 + 60_000);

            expect(result).toEqual({ multiplier: 2, fakeUploadedBytes: 2_000_000, speedCapped: false });
        });
    });

    describe('computeMultiplier', () => {
        it('should report downloaded times the ramp multiplier', () => {
            const decision = computeMultiplier({
                torrent: torrent(),
                global: emptyGlobal,
                settings,
                now: T0 + 1800 * 1000,
                random: noJitter
            });

            expect(decision.multiplier).toBe(3);
            expect(decision.fakeUploadedBytes).toBe(300 * MB);
            expect(decision.inCooldown).toBe(false);
            expect(decision.enteringCooldown).toBe(false);
        });

        it('should use the seeding multiplier for completed torrents', () => {
            const decision = computeMultiplier({
                torrent: torrent({ completed: true }),
                global: emptyGlobal,
                settings,
                now: T0 + 1800 * 1000,
                random: noJitter
            });

            expect(decision.seeding).toBe(true);
            expect(decision.multiplier).toBe(1.5);
            expect(decision.fakeUploadedBytes).toBe(150 * MB);
        });

        it('should apply per-request jitter', () => {
            const decision = computeMultiplier({
                torrent: torrent(),
                global: emptyGlobal,
                settings: { ...settings, randomizationFactor: 0.5 },
                now: T0 + 3600 * 1000,
                random: () => 0
            });

            expect(decision.multiplier).toBe(2.5);
            expect(decision.fakeUploadedBytes).toBe(250 * MB);
        });

        it('should force 1.0 while a cooldown is active', () => {
            const decision = computeMultiplier({
                torrent: torrent(),
                global: { ...emptyGlobal, cooldownUntil: T0 + 3600 * 1000 },
                settings,
                now: T0 + 1800 * 1000,
                random: noJitter
            });

            expect(decision.multiplier).toBe(1);
            expect(decision.fakeUploadedBytes).toBe(100 * MB);
            expect(decision.inCooldown).toBe(true);
            expect(decision.enteringCooldown).toBe(false);
            expect(decision.cooldownUntil).toBe(T0 + 3600 * 1000);
        });

        it('should enter cooldown when the announce would push the ratio past the limit', () => {
            // 1950 / 1000 before, this announce adds 100 MB real and 360 MB fake: 2310 / 1100 = 2.1
            const now = T0 + 3600 * 1000;
            const decision = computeMultiplier({
                torrent: torrent(),
                global: {
                    aggregateRealDownloaded: 1000 * MB,
                    aggregateFakeUploaded: 1950 * MB,
                    cooldownUntil: 0
                },
                settings: { ...settings, maxUploadMultiplier: 3.6, globalRatioLimit: 2 },
                now,
                random: noJitter
            });

            expect(decision.prospectiveRatio).toBeCloseTo(2.1, 6);
            expect(decision.multiplier).toBe(1);
            expect(decision.fakeUploadedBytes).toBe(100 * MB);
            expect(decision.enteringCooldown).toBe(true);
            expect(decision.cooldownUntil).toBe(now + 30 * 60 * 1000);
        });

        it('should enter cooldown when the ratio already meets the limit', () => {
            const decision = computeMultiplier({
                torrent: torrent({ realDownloadedBytes: 0 }),
                global: {
                    aggregateRealDownloaded: 100,
                    aggregateFakeUploaded: 200,
                    cooldownUntil: 0
                },
                settings: { ...settings, globalRatioLimit: 2 },
                now: T0,
                random: noJitter
            });

            expect(decision.enteringCooldown).toBe(true);
            expect(decision.multiplier).toBe(1);
        });

        it('should treat an empty aggregate as ratio zero', () => {
            const decision = computeMultiplier({
                torrent: torrent({ realDownloadedBytes: 0 }),
                global: emptyGlobal,
                settings: { ...settings, globalRatioLimit: 0.5 },
                now: T0,
                random: noJitter
            });

            expect(decision.prospectiveRatio).toBe(0);
            expect(decision.enteringCooldown).toBe(false);
            expect(decision.fakeUploadedBytes).toBe(0);
        });

        it('should keep the simulated rate between two reports within the cap', () => {
            const capMbps = 10;
            const first = torrent({ realDownloadedBytes: 50 * MB });
            const firstDecision = computeMultiplier({
                torrent: first,
                global: emptyGlobal,
                settings: { ...settings, maxSimulatedSpeedMbps: capMbps },
                now: T0 + 3600 * 1000,
                random: noJitter
            });

            const second = torrent({
                realDownloadedBytes: 400 * MB,
                lastReportedUploadedBytes: firstDecision.fakeUploadedBytes,
                lastReportedDownloadedBytes: 50 * MB,
                lastReportAt: T0 + 3600 * 1000
            });
            const secondDecision = computeMultiplier({
                torrent: second,
                global: { aggregateRealDownloaded: 50 * MB, aggregateFakeUploaded: firstDecision.fakeUploadedBytes, cooldownUntil: 0 },
                settings: { ...settings, maxSimulatedSpeedMbps: capMbps },
                now: T0 + 3900 * 1000,
                random: noJitter
            });

            const increase = secondDecision.fakeUploadedBytes - firstDecision.fakeUploadedBytes;
            const rateMbps = (increase * 8) / 1_000_000 / 300;

            expect(secondDecision.speedCapped).toBe(true);
            expect(rateMbps).toBeLessThanOrEqual(capMbps + 1e-6);
            expect(rateMbps).toBeCloseTo(capMbps, 3);
        });
    });
});
