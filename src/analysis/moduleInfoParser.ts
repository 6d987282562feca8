import * as fs from 'fs';
import * as path from 'path';
import { type BuildModule, createBuildModule } from '../models/buildModule';
import type { ModuleGraphProvider } from '../models/collaborators';
import { isRecord } from '../utils/config';
import { ERROR_MESSAGES } from '../utils/constants';
import { ModuleInfoError, errorMessage } from '../utils/errors';
import { normalizePath } from '../utils/pathUtils';
import Logger from '../utils/logger';

/**
 * Reads a build system's `module-info.json`: an object keyed by module
 * name whose values carry list fields such as
 *
 *   { "class": ["APPS"], "path": ["packages/apps/Foo"],
 *     "srcs": [...], "srcjars": [...], "jars": [...], "installed": [...],
 *     "dependencies": [...], "classes_jar": [...], "jarjar_rules": [...] }
 *
 * Missing lists become empty; malformed entries are skipped with a warning.
 */
export class ModuleInfoParser implements ModuleGraphProvider {
    private filePath: string;

    /** `moduleInfoPath` may be absolute or relative to rootPath. */
    constructor(rootPath: string, moduleInfoPath: string) {
        this.filePath = path.isAbsolute(moduleInfoPath)
            ? moduleInfoPath
            : path.join(rootPath, moduleInfoPath);
    }

    async loadModules(): Promise<Map<string, BuildModule>> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.filePath, 'utf-8');
        } catch (e) {
            throw new ModuleInfoError(ERROR_MESSAGES.MODULE_INFO_UNREADABLE, this.filePath, { cause: e });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new ModuleInfoError(
                `${ERROR_MESSAGES.MODULE_INFO_INVALID} ${errorMessage(e)}`,
                this.filePath,
                { cause: e },
            );
        }
        if (!isRecord(raw)) {
            throw new ModuleInfoError(ERROR_MESSAGES.MODULE_INFO_INVALID, this.filePath);
        }

        const modules = ModuleInfoParser.parseModules(raw);
        Logger.info(`Loaded ${modules.size} module(s) from ${this.filePath}.`);
        return modules;
    }

    static parseModules(raw: Record<string, unknown>): Map<string, BuildModule> {
        const modules = new Map<string, BuildModule>();
        for (const [name, entry] of Object.entries(raw)) {
            const mod = ModuleInfoParser.parseModule(name, entry);
            if (mod) {
                modules.set(name, mod);
            }
        }
        return modules;
    }

    static parseModule(name: string, entry: unknown): BuildModule | null {
        if (!isRecord(entry)) {
            Logger.warn(`Skipping module "${name}": entry is not an object.`);
            return null;
        }
        const depth = entry.depth;
        return createBuildModule(name, {
            path: pathList(entry.path),
            srcs: pathList(entry.srcs),
            srcjars: pathList(entry.srcjars),
            jars: pathList(entry.jars),
            installed: pathList(entry.installed),
            dependencies: stringList(entry.dependencies),
            classes: stringList(entry.class),
            classesJar: pathList(entry.classes_jar),
            jarjarRules: stringList(entry.jarjar_rules).length > 0,
            depth: typeof depth === 'number' && Number.isInteger(depth) && depth >= 0 ? depth : undefined,
        });
    }
}

function stringList(value: unknown): string[] {
    if (!Array.isArray(value)) {
        return [];
    }
    return value.filter((v): v is string => typeof v === 'string' && v.length > 0);
}

function pathList(value: unknown): string[] {
    return stringList(value).map(normalizePath);
}
