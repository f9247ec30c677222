/**
 * Unit tests for ProxyTarget
 */

import { describe, it, expect } from 'vitest';
import { ProxyTarget } from './ProxyTarget';
import { ProxyTargetError } from '../errors';

describe('ProxyTarget', () => {
    it('should split an absolute-URI into host, port and origin-form path', () => {
        const target = ProxyTarget.parse('http://tracker.example:6969/announce?info_hash=%AA&uploaded=1');

        expect(target.host).toBe('tracker.example');
        expect(target.port).toBe(6969);
        expect(target.path).toBe('/announce?info_hash=%AA&uploaded=1');
        expect(target.authority).toBe('tracker.example:6969');
    });

    it('should default to port 80 and path /', () => {
        const target = ProxyTarget.parse('HTTP://tracker.example');

        expect(target.port).toBe(80);
        expect(target.path).toBe('/');
        expect(target.authority).toBe('tracker.example');
    });

    it('should prefix a bare query with /', () => {
        expect(ProxyTarget.parse('http://tracker.example?x=1').path).toBe('/?x=1');
    });

    it('should parse IPv6 authorities and drop userinfo', () => {
        const target = ProxyTarget.parse('http://user:secret@[::1]:8080/announce');

        expect(target.host).toBe('::1');
        expect(target.port).toBe(8080);
        expect(target.authority).toBe('[::1]:8080');
    });

    it('should take the destination of origin-form targets from the Host header', () => {
        const target = ProxyTarget.parse('/announce?uploaded=1', 'tracker.example:2710');

        expect(target.host).toBe('tracker.example');
        expect(target.port).toBe(2710);
        expect(target.path).toBe('/announce?uploaded=1');
    });

    it('should reject targets it cannot route', () => {
        expect(() => ProxyTarget.parse('https://tracker.example/announce')).toThrow('Unsupported scheme: https');
        expect(() => ProxyTarget.parse('/announce')).toThrow('Missing Host header for origin-form request');
        expect(() => ProxyTarget.parse('tracker.example:443')).toThrow(ProxyTargetError);
        expect(() => ProxyTarget.parse('http://tracker.example:99999/')).toThrow('Invalid port in authority');
        expect(() => ProxyTarget.parse('http:///announce')).toThrow('Missing host in authority');
    });

    it('should take a rewritten path while keeping the destination', () => {
        const original = 'http://tracker.example:6969/announce?uploaded=1&downloaded=5';
        const target = ProxyTarget.parse(original).retarget('http://tracker.example:6969/announce?uploaded=999&downloaded=5');

        expect(target.host).toBe('tracker.example');
        expect(target.port).toBe(6969);
        expect(target.path).toBe('/announce?uploaded=999&downloaded=5');
    });

    it('should retarget origin-form requests', () => {
        const target = ProxyTarget.parse('/announce?uploaded=1', 'tracker.example').retarget('/announce?uploaded=22');

        expect(target.path).toBe('/announce?uploaded=22');
        expect(target.port).toBe(80);
    });
});
