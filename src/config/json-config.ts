import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { SNAPSHOT_ID_PATTERN, type CompressionAlgorithm, type RetentionPolicy, type SnapshotType } from '../types/backup.js';
import { errorMessage } from '../types/errors.js';
import { isCompressionAlgorithm } from '../utils/compression.js';
import { parseDuration } from '../utils/duration.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'strata-backup.json';
export const CONFIG_PATH_ENV = 'STRATA_BACKUP_CONFIG';

export interface BackupConfig {
    defaults: {
        compression: CompressionAlgorithm;
        exclusions: string[];
        verifyContent: boolean;
        concurrency: number;
        idPrefix: string;
    };
    retention: {
        /** Duration such as '30d', or milliseconds. */
        maxAge: string | number | null;
        maxCount: number | null;
    };
    schedule: {
        enabled: boolean;
        cronExpression: string;
        sourcePath: string;
        destinationPath: string;
        type: SnapshotType;
    };
    logging: {
        level: LogLevel;
    };
}

export const DEFAULT_CONFIG: BackupConfig = {
    defaults: {
        compression: 'gzip',
        exclusions: [],
        verifyContent: false,
        concurrency: 4,
        idPrefix: 'backup',
    },
    retention: {
        maxAge: '30d',
        maxCount: null,
    },
    schedule: {
        enabled: false,
        cronExpression: '0 2 * * *',
        sourcePath: '',
        destinationPath: '',
        type: 'incremental',
    },
    logging: {
        level: 'info',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    const fromEnv = process.env[CONFIG_PATH_ENV]?.trim();
    if (fromEnv) return path.resolve(fromEnv);
    return path.resolve(CONFIG_FILE_NAME);
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<BackupConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
            return applyEnvOverrides(mergeWithDefaults({}, targetPath));
        }
        throw new Error(`Failed to read config file at ${targetPath}: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${errorMessage(error)}`, { cause: error });
    }
    return applyEnvOverrides(mergeWithDefaults(parsed, targetPath));
}

export async function writeConfig(config: BackupConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = `${JSON.stringify(config, null, 2)}\n`;
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${errorMessage(error)}`, { cause: error });
    }
}

/** Retention section as a policy, or null when neither limit is set. */
export function toRetentionPolicy(retention: BackupConfig['retention']): RetentionPolicy | null {
    const policy: RetentionPolicy = {};
    if (retention.maxAge !== null) policy.maxAge = retention.maxAge;
    if (retention.maxCount !== null) policy.maxCount = retention.maxCount;
    return policy.maxAge === undefined && policy.maxCount === undefined ? null : policy;
}

function applyEnvOverrides(config: BackupConfig): BackupConfig {
    const level = process.env.BACKUP_LOG_LEVEL?.trim().toLowerCase();
    if (isLogLevel(level)) {
        config.logging.level = level;
    }
    return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    return isRecord(value) ? value : {};
}

class ConfigReader {
    readonly #configPath: string;

    constructor(configPath: string) {
        this.#configPath = configPath;
    }

    fail(key: string, expected: string): never {
        throw new Error(`Invalid config file at ${this.#configPath}: '${key}' must be ${expected}.`);
    }

    string(record: Record<string, unknown>, key: string, fallback: string, label: string): string {
        const value = record[key];
        if (value === undefined) return fallback;
        return typeof value === 'string' ? value : this.fail(label, 'a string');
    }

    boolean(record: Record<string, unknown>, key: string, fallback: boolean, label: string): boolean {
        const value = record[key];
        if (value === undefined) return fallback;
        return typeof value === 'boolean' ? value : this.fail(label, 'a boolean');
    }

    positiveInteger(record: Record<string, unknown>, key: string, fallback: number, label: string): number {
        const value = record[key];
        if (value === undefined) return fallback;
        return typeof value === 'number' && Number.isInteger(value) && value > 0
            ? value
            : this.fail(label, 'a positive integer');
    }
}

function mergeWithDefaults(loaded: unknown, configPath: string): BackupConfig {
    const root = isRecord(loaded) ? loaded : {};
    const reader: ConfigReader = new ConfigReader(configPath);
    const base = DEFAULT_CONFIG;

    const defaults = section(root, 'defaults');
    const compression = defaults.compression ?? base.defaults.compression;
    if (!isCompressionAlgorithm(compression)) {
        reader.fail('defaults.compression', "one of 'none', 'gzip', 'brotli'");
    }
    const exclusions = defaults.exclusions ?? base.defaults.exclusions;
    if (!Array.isArray(exclusions) || !exclusions.every((pattern): pattern is string => typeof pattern === 'string')) {
        reader.fail('defaults.exclusions', 'an array of glob strings');
    }

    const retention = section(root, 'retention');
    const maxAge = retention.maxAge === undefined ? base.retention.maxAge : retention.maxAge;
    if (maxAge !== null) {
        if (typeof maxAge !== 'string' && typeof maxAge !== 'number') {
            reader.fail('retention.maxAge', "a duration such as '30d', or null");
        }
        try {
            parseDuration(maxAge);
        } catch (error) {
            reader.fail('retention.maxAge', `a valid duration (${errorMessage(error)})`);
        }
    }
    const maxCount = retention.maxCount === undefined ? base.retention.maxCount : retention.maxCount;
    if (maxCount !== null && !(typeof maxCount === 'number' && Number.isInteger(maxCount) && maxCount >= 0)) {
        reader.fail('retention.maxCount', 'a non-negative integer or null');
    }

    const schedule = section(root, 'schedule');
    const scheduleType = schedule.type ?? base.schedule.type;
    if (scheduleType !== 'full' && scheduleType !== 'incremental') {
        reader.fail('schedule.type', "'full' or 'incremental'");
    }

    const idPrefix = reader.string(defaults, 'idPrefix', base.defaults.idPrefix, 'defaults.idPrefix');
    if (!SNAPSHOT_ID_PATTERN.test(idPrefix)) {
        reader.fail('defaults.idPrefix', "letters, digits, '.', '_' and '-', starting with a letter or digit");
    }

    const logging = section(root, 'logging');
    const level = logging.level ?? base.logging.level;
    if (!isLogLevel(level)) {
        reader.fail('logging.level', 'a pino log level');
    }

    return {
        defaults: {
            compression,
            exclusions: [...exclusions],
            verifyContent: reader.boolean(defaults, 'verifyContent', base.defaults.verifyContent, 'defaults.verifyContent'),
            concurrency: reader.positiveInteger(defaults, 'concurrency', base.defaults.concurrency, 'defaults.concurrency'),
            idPrefix,
        },
        retention: { maxAge, maxCount },
        schedule: {
            enabled: reader.boolean(schedule, 'enabled', base.schedule.enabled, 'schedule.enabled'),
            cronExpression: reader.string(schedule, 'cronExpression', base.schedule.cronExpression, 'schedule.cronExpression'),
            sourcePath: reader.string(schedule, 'sourcePath', base.schedule.sourcePath, 'schedule.sourcePath'),
            destinationPath: reader.string(schedule, 'destinationPath', base.schedule.destinationPath, 'schedule.destinationPath'),
            type: scheduleType,
        },
        logging: { level },
    };
}
