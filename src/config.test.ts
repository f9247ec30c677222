/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, parseConfigFile, toMultiplierSettings } from './config';
import { ConfigInvalidError } from './domain/errors';

describe('config', () => {
    it('should apply defaults when nothing is set', () => {
        const config = loadConfig({});

        expect(config).toEqual({
            LISTEN_PORT: 3456,
            LISTEN_HOST: '0.0.0.0',
            MAX_UPLOAD_MULTIPLIER: 5,
            SEEDING_MULTIPLIER: 1.5,
            RAMP_UP_SECONDS: 3600,
            RANDOMIZATION_FACTOR: 0.1,
            MAX_SIMULATED_SPEED_MBPS: 100,
            GLOBAL_RATIO_LIMIT: 3,
            COOLDOWN_DURATION_MINUTES: 30,
            LOG_FILE: './logs/announce-proxy.log',
            LOG_RETENTION_DAYS: 7,
            UPSTREAM_TIMEOUT_SECONDS: 15,
            MAX_TRACKED_TORRENTS: 10000,
            UPDATE_CHECK_URL: undefined
        });
    });

    it('should coerce values from the environment', () => {
        const config = loadConfig({
            LISTEN_PORT: '8080',
            MAX_UPLOAD_MULTIPLIER: '2.5',
            RANDOMIZATION_FACTOR: '0',
            UPDATE_CHECK_URL: 'http://releases.example/latest.json'
        });

        expect(config.LISTEN_PORT).toBe(8080);
        expect(config.MAX_UPLOAD_MULTIPLIER).toBe(2.5);
        expect(config.RANDOMIZATION_FACTOR).toBe(0);
        expect(config.UPDATE_CHECK_URL).toBe('http://releases.example/latest.json');
    });

    it('should treat blank variables as unset', () => {
        expect(loadConfig({ LISTEN_PORT: '  ', LOG_FILE: '' })).toMatchObject({
            LISTEN_PORT: 3456,
            LOG_FILE: './logs/announce-proxy.log'
        });
    });

    it('should list every invalid variable', () => {
        let caught: unknown;
        try {
            loadConfig({ MAX_UPLOAD_MULTIPLIER: '0.5', LISTEN_PORT: 'abc', RANDOMIZATION_FACTOR: '1' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigInvalidError);
        if (caught instanceof ConfigInvalidError) {
            expect(caught.kind).toBe('ConfigInvalid');
            expect(caught.issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
                'LISTEN_PORT',
                'MAX_UPLOAD_MULTIPLIER',
                'RANDOMIZATION_FACTOR'
            ]);
        }
    });

    it('should map to multiplier settings', () => {
        expect(toMultiplierSettings(loadConfig({ COOLDOWN_DURATION_MINUTES: '5' }))).toEqual({
            maxUploadMultiplier: 5,
            seedingMultiplier: 1.5,
            rampUpSeconds: 3600,
            randomizationFactor: 0.1,
            maxSimulatedSpeedMbps: 100,
            globalRatioLimit: 3,
            cooldownDurationMinutes: 5
        });
    });

    describe('ini file', () => {
        let dir: string;
        let configFile: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'announce-proxy-config-'));
            configFile = path.join(dir, 'config.ini');
            fs.writeFileSync(
                configFile,
                [
                    '; announce proxy settings',
                    '[DEFAULT]',
                    'listen_port = 4000',
                    'max_upload_multiplier = 2.5',
                    'ramp_up_seconds = 600',
                    'unknown_setting = 1',
                    ''
                ].join('\n')
            );
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should read snake_case keys from the DEFAULT section', () => {
            const config = loadConfig({ CONFIG_FILE: configFile });

            expect(config.LISTEN_PORT).toBe(4000);
            expect(config.MAX_UPLOAD_MULTIPLIER).toBe(2.5);
            expect(config.RAMP_UP_SECONDS).toBe(600);
            expect(config.SEEDING_MULTIPLIER).toBe(1.5);
        });

        it('should let the environment override the file', () => {
            const config = loadConfig({ CONFIG_FILE: configFile, LISTEN_PORT: '5000', RAMP_UP_SECONDS: ' ' });

            expect(config.LISTEN_PORT).toBe(5000);
            expect(config.RAMP_UP_SECONDS).toBe(600);
        });

        it('should validate file values with the same rules', () => {
            fs.writeFileSync(configFile, '[DEFAULT]\nmax_upload_multiplier = 0.5\n');

            expect(() => loadConfig({ CONFIG_FILE: configFile })).toThrow(ConfigInvalidError);
            expect(() => loadConfig({ CONFIG_FILE: configFile })).toThrow(/MAX_UPLOAD_MULTIPLIER:/);
        });

        it('should fail when an explicitly named file is missing', () => {
            const missing = path.join(dir, 'absent.ini');

            expect(() => loadConfig({ CONFIG_FILE: missing })).toThrow(
                `Invalid configuration: CONFIG_FILE: cannot read ${missing}:`
            );
        });

        it('should accept keys outside any section and ignore other sections', () => {
            expect(parseConfigFile('global_ratio_limit = 2\n[other]\nlisten_port = 1\n')).toEqual({
                GLOBAL_RATIO_LIMIT: '2'
            });
        });
    });
});
