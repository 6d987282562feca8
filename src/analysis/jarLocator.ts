import * as fs from 'fs';
import * as path from 'path';
import type { BuildModule } from '../models/buildModule';
import { EXTENSIONS } from '../utils/constants';
import { isJarFile, joinRelative, normalizePath } from '../utils/pathUtils';

/** Existence check for a repo-relative path. */
export type FileProbe = (relPath: string) => boolean;

export function createFileProbe(rootPath: string): FileProbe {
    return (relPath) => fs.existsSync(path.join(rootPath, relPath));
}

export type JarStrategy = 'declared' | 'installed' | 'classes-jar' | 'none';

export interface JarSelection {
    strategy: JarStrategy;
    /** Jars found on disk (repo-relative) */
    jarFiles: string[];
    /** Jars that were chosen but are not on disk */
    missingJars: string[];
}

function noJars(): JarSelection {
    return { strategy: 'none', jarFiles: [], missingJars: [] };
}

/** Primary module root, or '' for modules without a path. */
export function moduleRoot(module: BuildModule): string {
    return module.path.length > 0 ? normalizePath(module.path[0]) : '';
}

// ── Collectors ──────────────────────────────────────────────────────

/** Every `jars` entry joined with the module root, split by existence. */
export function collectDeclaredJars(module: BuildModule, probe: FileProbe): JarSelection {
    const root = moduleRoot(module);
    const jarFiles: string[] = [];
    const missingJars: string[] = [];
    for (const jar of module.jars) {
        const rel = joinRelative(root, jar);
        if (!isJarFile(rel)) {
            continue;
        }
        if (probe(rel)) {
            jarFiles.push(rel);
        } else {
            missingJars.push(rel);
        }
    }
    if (jarFiles.length === 0 && missingJars.length === 0) {
        return noJars();
    }
    return { strategy: 'declared', jarFiles, missingJars };
}

/**
 * The first `.jar` build output, skipping `.aar` archives. With a prefix
 * only outputs under it qualify, e.g. to pick a test variant jar.
 */
export function selectInstalledJar(
    module: BuildModule,
    probe: FileProbe,
    prefix?: string,
): JarSelection {
    const normalizedPrefix = prefix ? normalizePath(prefix) : undefined;
    for (const entry of module.installed) {
        const rel = normalizePath(entry);
        if (normalizedPrefix && !rel.startsWith(normalizedPrefix)) {
            continue;
        }
        if (rel.toLowerCase().endsWith(EXTENSIONS.AAR) || !isJarFile(rel)) {
            continue;
        }
        return probe(rel)
            ? { strategy: 'installed', jarFiles: [rel], missingJars: [] }
            : { strategy: 'installed', jarFiles: [], missingJars: [rel] };
    }
    return noJars();
}

/** The first existing classes jar; if none exists the first one is missing. */
export function selectClassesJar(module: BuildModule, probe: FileProbe): JarSelection {
    const candidates = module.classesJar.map(normalizePath).filter(isJarFile);
    if (candidates.length === 0) {
        return noJars();
    }
    const found = candidates.find((jar) => probe(jar));
    return found
        ? { strategy: 'classes-jar', jarFiles: [found], missingJars: [] }
        : { strategy: 'classes-jar', jarFiles: [], missingJars: [candidates[0]] };
}

export function hasResolvableDeclaredJars(module: BuildModule, probe: FileProbe): boolean {
    return collectDeclaredJars(module, probe).jarFiles.length > 0;
}

// ── Mode-specific strategies ────────────────────────────────────────

/**
 * Jar collection for the combined project: declared jars first, then the
 * representative installed jar when no declared jar is on disk.
 */
export function collectJarFiles(
    module: BuildModule,
    probe: FileProbe,
    installedPrefix?: string,
): JarSelection {
    const declared = collectDeclaredJars(module, probe);
    if (declared.jarFiles.length > 0) {
        return declared;
    }
    const installed = selectInstalledJar(module, probe, installedPrefix);
    if (installed.strategy === 'none') {
        return declared;
    }
    return {
        strategy: installed.strategy,
        jarFiles: installed.jarFiles,
        missingJars: [...declared.missingJars, ...installed.missingJars],
    };
}

/**
 * Jar resolution for a module that is not opened as its own project:
 *   1. jarjar rules   → installed output (declared jars are not repackaged)
 *   2. declared jars on disk
 *   3. classes jar
 *   4. installed output
 */
export function locateJarPath(module: BuildModule, probe: FileProbe): JarSelection {
    if (module.jarjarRules) {
        return selectInstalledJar(module, probe);
    }
    if (hasResolvableDeclaredJars(module, probe)) {
        return collectDeclaredJars(module, probe);
    }
    if (module.classesJar.length > 0) {
        return selectClassesJar(module, probe);
    }
    return selectInstalledJar(module, probe);
}
