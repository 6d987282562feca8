import * as fs from 'fs';
import * as path from 'path';
import { CONFIG } from './constants';
import { ConfigError, errorMessage } from './errors';
import Logger, { isLogLevel, type LogLevel } from './logger';
import { isRepresentationMode, type RepresentationMode } from '../models/moduleData';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Effective settings for one run, after defaults and overrides. */
export interface Settings {
    depth: number;
    mode: RepresentationMode;
    moduleInfo: string;
    testSegments: string[];
    ignoredSourceDirs: string[];
    attachSrcjars: boolean;
    concurrency: number;
    logLevel: LogLevel;
}

/**
 * Key/value settings read from `.modsrc.json` at the repository root.
 * Lookups take a default, and a value of the wrong type is a ConfigError.
 */
export class ConfigurationStore {
    private values: Record<string, unknown>;

    constructor(values: Record<string, unknown> = {}) {
        this.values = values;
    }

    /** Load `.modsrc.json` from rootPath; a missing file yields an empty store. */
    static load(rootPath: string): ConfigurationStore {
        const filePath = path.join(rootPath, CONFIG.CONFIG_FILE_NAME);
        if (!fs.existsSync(filePath)) {
            return new ConfigurationStore();
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (e) {
            throw new ConfigError(CONFIG.CONFIG_FILE_NAME, `cannot parse: ${errorMessage(e)}`);
        }
        if (!isRecord(parsed)) {
            throw new ConfigError(CONFIG.CONFIG_FILE_NAME, 'expected a JSON object');
        }
        Logger.debug(`Loaded settings from ${filePath}`);
        return new ConfigurationStore(parsed);
    }

    /** Overlay values (CLI flags); undefined entries are ignored. */
    withOverrides(overrides: Record<string, unknown>): ConfigurationStore {
        const merged = { ...this.values };
        for (const [key, value] of Object.entries(overrides)) {
            if (value !== undefined) {
                merged[key] = value;
            }
        }
        return new ConfigurationStore(merged);
    }

    has(key: string): boolean {
        return this.values[key] !== undefined;
    }

    getString(key: string, defaultValue: string): string {
        const value = this.values[key];
        if (value === undefined) { return defaultValue; }
        if (typeof value !== 'string') {
            throw new ConfigError(key, 'expected a string');
        }
        return value;
    }

    getNumber(key: string, defaultValue: number): number {
        const value = this.values[key];
        if (value === undefined) { return defaultValue; }
        const num = typeof value === 'string' ? Number(value) : value;
        if (typeof num !== 'number' || !Number.isInteger(num) || num < 0) {
            throw new ConfigError(key, 'expected a non-negative integer');
        }
        return num;
    }

    getBoolean(key: string, defaultValue: boolean): boolean {
        const value = this.values[key];
        if (value === undefined) { return defaultValue; }
        if (typeof value !== 'boolean') {
            throw new ConfigError(key, 'expected true or false');
        }
        return value;
    }

    getStringArray(key: string, defaultValue: string[]): string[] {
        const value = this.values[key];
        if (value === undefined) { return [...defaultValue]; }
        if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
            throw new ConfigError(key, 'expected an array of strings');
        }
        return [...value];
    }

    toSettings(): Settings {
        const mode = this.getString('mode', 'combined-project');
        if (!isRepresentationMode(mode)) {
            throw new ConfigError('mode', `unknown mode "${mode}"`);
        }
        const logLevel = this.getString('logLevel', 'info');
        if (!isLogLevel(logLevel)) {
            throw new ConfigError('logLevel', `unknown level "${logLevel}"`);
        }
        const concurrency = this.getNumber('concurrency', CONFIG.DEFAULT_CONCURRENCY);
        if (concurrency === 0) {
            throw new ConfigError('concurrency', 'must be at least 1');
        }
        return {
            depth: this.getNumber('depth', CONFIG.DEFAULT_DEPTH),
            mode,
            moduleInfo: this.getString('moduleInfo', CONFIG.DEFAULT_MODULE_INFO),
            testSegments: this.getStringArray('testSegments', CONFIG.TEST_SEGMENTS),
            ignoredSourceDirs: this.getStringArray('ignoredSourceDirs', CONFIG.IGNORED_SOURCE_DIRS),
            attachSrcjars: this.getBoolean('attachSrcjars', true),
            concurrency,
            logLevel,
        };
    }
}
