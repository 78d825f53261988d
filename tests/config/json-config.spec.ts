import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    readConfig,
    writeConfig,
    getConfigPath,
    toRetentionPolicy,
    DEFAULT_CONFIG,
    CONFIG_FILE_NAME,
    type BackupConfig,
} from '../../src/config/json-config.js';

describe('Backup config file', () => {
    const tempDir = path.join(os.tmpdir(), 'strata-test-config', Date.now().toString());
    const tempConfigPath = path.join(tempDir, 'nested', 'strata-backup.json');

    beforeEach(async () => {
        vi.stubEnv('STRATA_BACKUP_CONFIG', tempConfigPath);
        vi.stubEnv('BACKUP_LOG_LEVEL', '');
        if (!existsSync(tempDir)) {
            await fs.mkdir(tempDir, { recursive: true });
        }
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        if (existsSync(tempDir)) {
            await fs.rm(tempDir, { recursive: true, force: true });
        }
    });

    it('loads defaults when the file is missing', async () => {
        const config = await readConfig();
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.retention.maxAge).toBe('30d');
        expect(config.schedule.enabled).toBe(false);
    });

    it('resolves the path from an override, then the environment, then the working directory', () => {
        expect(getConfigPath('relative.json')).toBe(path.resolve('relative.json'));
        expect(getConfigPath()).toBe(tempConfigPath);

        vi.stubEnv('STRATA_BACKUP_CONFIG', '  ');
        expect(getConfigPath()).toBe(path.resolve(CONFIG_FILE_NAME));
    });

    it('saves and reads structured config, creating the directory', async () => {
        const customConfig: BackupConfig = JSON.parse(JSON.stringify(DEFAULT_CONFIG));
        customConfig.defaults.compression = 'brotli';
        customConfig.defaults.exclusions = ['*.log', 'node_modules'];
        customConfig.retention = { maxAge: null, maxCount: 7 };
        customConfig.schedule = {
            enabled: true,
            cronExpression: '30 3 * * *',
            sourcePath: '/srv/data',
            destinationPath: '/mnt/backups',
            type: 'full',
        };

        await writeConfig(customConfig);

        const loaded = await readConfig();
        expect(loaded).toEqual(customConfig);
        expect((await fs.readdir(path.dirname(tempConfigPath)))).toEqual(['strata-backup.json']);
    });

    it('fills missing keys of a partial file from the defaults', async () => {
        await fs.mkdir(path.dirname(tempConfigPath), { recursive: true });
        await fs.writeFile(tempConfigPath, JSON.stringify({ defaults: { concurrency: 8 }, retention: { maxCount: 3 } }), 'utf8');

        const config = await readConfig();
        expect(config.defaults).toEqual({ ...DEFAULT_CONFIG.defaults, concurrency: 8 });
        expect(config.retention).toEqual({ maxAge: '30d', maxCount: 3 });
    });

    it('throws on malformed JSON', async () => {
        await fs.mkdir(path.dirname(tempConfigPath), { recursive: true });
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');
        await expect(readConfig()).rejects.toThrow(/Failed to parse config file/);
    });

    it('rejects values of the wrong type or out of range', async () => {
        await fs.mkdir(path.dirname(tempConfigPath), { recursive: true });

        const cases: Array<[unknown, string]> = [
            [{ defaults: { compression: 'zip' } }, "'defaults.compression'"],
            [{ defaults: { exclusions: '*.log' } }, "'defaults.exclusions'"],
            [{ defaults: { concurrency: 0 } }, "'defaults.concurrency'"],
            [{ defaults: { idPrefix: '../x' } }, "'defaults.idPrefix'"],
            [{ retention: { maxAge: 'eventually' } }, "'retention.maxAge'"],
            [{ retention: { maxCount: -2 } }, "'retention.maxCount'"],
            [{ schedule: { type: 'differential' } }, "'schedule.type'"],
            [{ schedule: { enabled: 'yes' } }, "'schedule.enabled'"],
            [{ logging: { level: 'loud' } }, "'logging.level'"],
        ];

        for (const [content, key] of cases) {
            await fs.writeFile(tempConfigPath, JSON.stringify(content), 'utf8');
            await expect(readConfig()).rejects.toThrow(`Invalid config file at ${tempConfigPath}: ${key}`);
        }
    });

    it('lets BACKUP_LOG_LEVEL override the configured level', async () => {
        vi.stubEnv('BACKUP_LOG_LEVEL', 'DEBUG');
        const config = await readConfig();
        expect(config.logging.level).toBe('debug');
    });

    it('converts the retention section to a policy', () => {
        expect(toRetentionPolicy({ maxAge: '7d', maxCount: null })).toEqual({ maxAge: '7d' });
        expect(toRetentionPolicy({ maxAge: null, maxCount: 2 })).toEqual({ maxCount: 2 });
        expect(toRetentionPolicy({ maxAge: null, maxCount: null })).toBeNull();
    });
});
