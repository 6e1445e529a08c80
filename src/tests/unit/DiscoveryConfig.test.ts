import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
    buildDiscoveryConfig,
    ConfigError,
    DEFAULT_DISCOVERY_CONFIG,
    normalizeHost,
    readConfigFile,
} from '../../scraper/config/DiscoveryConfig.js';

const EXAMPLE_CONFIG = fileURLToPath(new URL('../../../config/discovery.example.json', import.meta.url));

describe('DiscoveryConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobtrail-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function writeConfig(content: string): string {
        const file = path.join(tmpDir, 'discovery.json');
        fs.writeFileSync(file, content);
        return file;
    }

    it('should ship frozen defaults', () => {
        expect(Object.isFrozen(DEFAULT_DISCOVERY_CONFIG)).toBe(true);
        expect(Object.isFrozen(DEFAULT_DISCOVERY_CONFIG.vocabulary)).toBe(true);
        expect(DEFAULT_DISCOVERY_CONFIG.maxHops).toBe(4);
        expect(DEFAULT_DISCOVERY_CONFIG.stepSize).toBe(800);
        expect(DEFAULT_DISCOVERY_CONFIG.vocabulary['careers']).toBe(1.0);
    });

    it('should return defaults when nothing is layered on top', () => {
        expect(buildDiscoveryConfig()).toEqual(DEFAULT_DISCOVERY_CONFIG);
    });

    it('should apply overrides and ignore undefined ones', () => {
        const config = buildDiscoveryConfig({ overrides: { maxHops: 2, stepSize: undefined } });

        expect(config.maxHops).toBe(2);
        expect(config.stepSize).toBe(800);
    });

    it('should layer the file under the overrides', () => {
        const file = writeConfig(JSON.stringify({
            maxHops: 6,
            clickRetries: 0,
            careerDomainFallbacks: { 'WWW.Example-Music.com': 'https://www.lifeatexample-music.com/jobs' },
        }));

        const config = buildDiscoveryConfig({ configFile: file, overrides: { maxHops: 3 } });

        expect(config.maxHops).toBe(3);
        expect(config.clickRetries).toBe(0);
        expect(config.careerDomainFallbacks).toEqual({ 'example-music.com': 'https://www.lifeatexample-music.com/jobs' });
    });

    it('should normalize trap domains', () => {
        const config = buildDiscoveryConfig({ overrides: { redirectTrapDomains: [' WWW.Login.Example.com'] } });

        expect(config.redirectTrapDomains).toEqual(['login.example.com']);
    });

    it('should freeze the built config deeply', () => {
        const config = buildDiscoveryConfig({ overrides: { careerDomainFallbacks: { 'example.com': 'https://careers.example.com/' } } });

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.careerDomainFallbacks)).toBe(true);
        expect(Object.isFrozen(config.listingUrlPatterns)).toBe(true);
    });

    it('should name the invalid key of a config file', () => {
        const file = writeConfig(JSON.stringify({ stepSize: 0 }));

        expect(() => buildDiscoveryConfig({ configFile: file })).toThrow(new ConfigError(`Invalid value for "stepSize" in ${file}`));
    });

    it('should reject keys the config does not declare', () => {
        const file = writeConfig(JSON.stringify({ maxhops: 2 }));

        expect(() => buildDiscoveryConfig({ configFile: file })).toThrow(new ConfigError(`Unknown key "maxhops" in ${file}`));
    });

    it('should reject malformed JSON and missing files', () => {
        const file = writeConfig('{ "maxHops": ');

        expect(() => readConfigFile(file)).toThrow(/^Invalid JSON/);
        expect(() => readConfigFile(path.join(tmpDir, 'missing.json'))).toThrow(`File not found: ${path.join(tmpDir, 'missing.json')}`);
    });

    it('should reject invalid overrides', () => {
        expect(() => buildDiscoveryConfig({ overrides: { clickRetries: -1 } })).toThrow('Invalid value for "clickRetries"');
        expect(() => buildDiscoveryConfig({ overrides: { vocabulary: { careers: 2 } } })).toThrow('Invalid value for "vocabulary"');
        expect(() => buildDiscoveryConfig({ overrides: { listingUrlPatterns: ['('] } })).toThrow('Invalid value for "listingUrlPatterns"');
    });

    it('should load the example config', () => {
        const overrides = readConfigFile(EXAMPLE_CONFIG);

        expect(overrides.careerDomainFallbacks).toEqual({ 'spotify.com': 'https://www.lifeatspotify.com/jobs' });
        expect(overrides.maxHops).toBe(4);
    });

    it('should normalize hosts', () => {
        expect(normalizeHost(' WWW.Example.COM ')).toBe('example.com');
        expect(normalizeHost('careers.example.com')).toBe('careers.example.com');
    });
});
