import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, loadConfigFromEnv, resolveConfig, SETTINGS_ENV_VAR } from '../src/config';
import { ConfigError, ErrorCategory } from '../src/errors';

describe('resolveConfig', () => {
    it('returns the defaults without overrides', () => {
        const config = resolveConfig();
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.sinkTarget).toBe('linetrace.log');
        expect(config.functionColumnWidth).toBe(32);
        expect(config.messageWidth).toBe(0);
    });

    it('merges overrides over the defaults', () => {
        const config = resolveConfig({ messageWidth: 40, maskKeys: ['password'] });
        expect(config.messageWidth).toBe(40);
        expect(config.maskKeys).toEqual(['password']);
        expect(config.fileColumnWidth).toBe(20);
    });

    it('freezes the result', () => {
        const config = resolveConfig();
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.maskKeys)).toBe(true);
    });

    it('rejects an unknown option', () => {
        expect(() => resolveConfig({ bogus: 1 })).toThrow('Unrecognised option in <inline settings>: bogus');
    });

    it('rejects a value of the wrong type without coercing it', () => {
        let caught: unknown;
        try {
            resolveConfig({ messageWidth: '10' });
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        if (!(caught instanceof ConfigError)) return;
        expect(caught.option).toBe('messageWidth');
        expect(caught.category).toBe(ErrorCategory.CONFIG);
        expect(caught.message).toMatch(/^Invalid type\/value for messageWidth in <inline settings> - /);
    });

    it('rejects out-of-range widths', () => {
        expect(() => resolveConfig({ functionColumnWidth: 0 })).toThrow(/functionColumnWidth/);
        expect(() => resolveConfig({ messageWidth: -1 })).toThrow(/messageWidth/);
        expect(() => resolveConfig({ lineColumnMinWidth: 1.5 })).toThrow(/lineColumnMinWidth/);
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'linetrace-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    const write = (name: string, text: string): string => {
        const path = join(dir, name);
        writeFileSync(path, text);
        return path;
    };

    it('reads a JSON object of overrides', () => {
        const path = write('settings.json', JSON.stringify({ messageWrap: true, messageWidth: 60 }));
        const config = loadConfig(path);
        expect(config.messageWrap).toBe(true);
        expect(config.messageWidth).toBe(60);
        expect(config.timeEnabled).toBe(true);
    });

    it('names the file in validation errors', () => {
        const path = write('bad.json', JSON.stringify({ timeEnabled: 'yes' }));
        expect(() => loadConfig(path)).toThrow(`Invalid type/value for timeEnabled in ${path}`);
    });

    it('rejects a file that is not a JSON object', () => {
        const path = write('list.json', '[1, 2]');
        expect(() => loadConfig(path)).toThrow(`Settings in ${path} must be a JSON object, got array`);
    });

    it('reports unreadable and malformed files', () => {
        const missing = join(dir, 'missing.json');
        expect(() => loadConfig(missing)).toThrow(`Could not load settings from ${missing}`);
        const broken = write('broken.json', '{ not json');
        expect(() => loadConfig(broken)).toThrow(ConfigError);
    });

    it('follows the settings environment variable', () => {
        const path = write('env.json', JSON.stringify({ enabled: false }));
        expect(loadConfigFromEnv({ [SETTINGS_ENV_VAR]: path }).enabled).toBe(false);
        expect(loadConfigFromEnv({ [SETTINGS_ENV_VAR]: '  ' })).toEqual(DEFAULT_CONFIG);
        expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
    });
});
