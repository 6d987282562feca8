import type { BuildModule } from '../models/buildModule';
import { type ModuleData, ModuleDataBuilder, type Representation } from '../models/moduleData';
import { PackageResolver } from './packageResolver';
import { ArtifactMapper } from './artifactMapper';
import { collectJarFiles, createFileProbe, type FileProbe, type JarSelection, locateJarPath } from './jarLocator';
import { APPS_CLASS, CONFIG } from '../utils/constants';
import { hasPathSegment, isJavaFile, isSrcjarFile, normalizePath } from '../utils/pathUtils';
import Logger from '../utils/logger';

export interface ResolverOptions {
    /** Path components that mark a source root as a test root */
    testSegments: string[];
    /** Source roots never added to the project */
    ignoredSourceDirs: string[];
    /** Attach every `srcjars` entry as a jar-root pseudo path */
    attachSrcjars: boolean;
}

/**
 * combined-project:   one IDE project holds every module; depth decides
 *                     between source and jar.
 * per-module-project: each requested module is its own project; the rest
 *                     are attached as jars.
 */
export type ResolveRequest =
    | {
        mode: 'combined-project';
        requestedDepth: number;
        /** Restrict the installed-jar fallback to outputs under this prefix */
        installedPrefix?: string;
    }
    | {
        mode: 'per-module-project';
        isProject: boolean;
        referencedByJar: boolean;
    };

export interface ResolutionPlan {
    representation: Representation;
    /** The module is only reached as a dependency; missing jars must be built */
    referencedByJar: boolean;
    /** Generated resources are collected for in-scope app modules only: targets, or projects */
    resourcesInScope: boolean;
}

/** Depth policy of the combined project. */
export function planCombined(module: BuildModule, requestedDepth: number): ResolutionPlan {
    const depth = module.depth ?? 0;
    const asSource = depth <= requestedDepth;
    return {
        representation: asSource ? 'source' : 'jar',
        referencedByJar: !asSource,
        // R sources belong to the requested targets only
        resourcesInScope: depth === 0,
    };
}

/** Project/jar branching of the per-module layout. */
export function planPerModule(isProject: boolean, referencedByJar: boolean): ResolutionPlan {
    return {
        representation: isProject ? 'source' : 'jar',
        referencedByJar,
        resourcesInScope: isProject,
    };
}

export function planResolution(module: BuildModule, request: ResolveRequest): ResolutionPlan {
    switch (request.mode) {
        case 'combined-project':
            return planCombined(module, request.requestedDepth);
        case 'per-module-project':
            return planPerModule(request.isProject, request.referencedByJar);
    }
}

/**
 * Works out, from build-graph metadata and the filesystem, what a module
 * contributes to an IDE project: source and test roots, generated R
 * sources, srcjar roots, or compiled jars.
 *
 * The resolver keeps no state between modules; each call returns a fresh
 * immutable ModuleData, so modules can be resolved in any order.
 */
export class ModuleResolver {
    private packageResolver: PackageResolver;
    private probe: FileProbe;
    private options: ResolverOptions;

    constructor(rootPath: string, options: Partial<ResolverOptions> = {}, probe?: FileProbe) {
        this.packageResolver = new PackageResolver(rootPath);
        this.probe = probe ?? createFileProbe(rootPath);
        this.options = {
            testSegments: options.testSegments ?? CONFIG.TEST_SEGMENTS,
            ignoredSourceDirs: (options.ignoredSourceDirs ?? CONFIG.IGNORED_SOURCE_DIRS).map(normalizePath),
            attachSrcjars: options.attachSrcjars ?? true,
        };
    }

    // ── Public API ───────────────────────────────────────────────────

    /** Resolve one module; never throws for missing files. */
    async resolve(module: BuildModule, request: ResolveRequest): Promise<ModuleData> {
        const plan = planResolution(module, request);
        const data = new ModuleDataBuilder(module.name, plan.representation);

        if (plan.representation === 'source') {
            await this.collectSourcePaths(module, data);
            this.collectGeneratedResourcePaths(module, data, plan.resourcesInScope);
        } else {
            const selection = request.mode === 'combined-project'
                ? collectJarFiles(module, this.probe, request.installedPrefix)
                : locateJarPath(module, this.probe);
            this.applyJarSelection(selection, data);
        }
        this.collectMissingJars(data, plan.referencedByJar);

        Logger.debug(
            `${module.name}: ${plan.representation}, ${data.srcDirs.size} src, ` +
            `${data.testDirs.size} test, ${data.jarFiles.size} jar(s), ` +
            `${data.missingJars.size} missing.`,
        );
        return data.build();
    }

    // ── Collectors ───────────────────────────────────────────────────

    /**
     * Source and test roots from the module's java files; srcjars listed
     * among the sources become pseudo jar roots.
     */
    async collectSourcePaths(module: BuildModule, data: ModuleDataBuilder): Promise<void> {
        for (const src of module.srcs) {
            const rel = normalizePath(src);
            if (isSrcjarFile(rel)) {
                data.srcjarPaths.add(ArtifactMapper.deriveJarPseudoPath(rel));
                continue;
            }
            if (!isJavaFile(rel)) {
                continue;
            }
            const lookup = await this.packageResolver.locateSourceFolder(rel);
            switch (lookup.status) {
                case 'missing':
                    data.addIssue('file-not-found', rel);
                    break;
                case 'no-package':
                    data.addIssue('malformed-package', rel);
                    break;
                case 'found':
                    this.addToSourceOrTestDirs(lookup.dir, data);
                    break;
            }
        }
    }

    /**
     * R sources of an in-scope app module. A recognised srcjar whose
     * extracted directory is absent has not been built yet, so the srcjar
     * itself becomes a build target.
     */
    collectGeneratedResourcePaths(module: BuildModule, data: ModuleDataBuilder, inScope: boolean): void {
        if (this.options.attachSrcjars) {
            for (const srcjar of module.srcjars) {
                const pseudo = ArtifactMapper.toSrcjarPseudoPath(srcjar);
                if (pseudo) {
                    data.srcjarPaths.add(pseudo);
                }
            }
        }

        if (!inScope || !module.classes.includes(APPS_CLASS)) {
            return;
        }
        for (const entry of module.srcjars) {
            const srcjar = normalizePath(entry);
            const rDir = ArtifactMapper.deriveResourceDir(srcjar);
            if (!rDir) {
                data.addIssue('unrecognized-artifact', srcjar);
                continue;
            }
            if (this.probe(rDir)) {
                data.rJavaPaths.add(rDir);
            } else {
                data.addIssue('file-not-found', rDir);
                data.buildTargets.add(srcjar);
            }
        }
    }

    /** Unresolved jars are scheduled for build only for pure dependencies. */
    collectMissingJars(data: ModuleDataBuilder, referencedByJar: boolean): void {
        if (!referencedByJar) {
            return;
        }
        for (const jar of data.missingJars) {
            data.buildTargets.add(jar);
        }
    }

    // ── Helpers ──────────────────────────────────────────────────────

    private applyJarSelection(selection: JarSelection, data: ModuleDataBuilder): void {
        for (const jar of selection.jarFiles) {
            data.jarFiles.add(jar);
        }
        for (const jar of selection.missingJars) {
            data.missingJars.add(jar);
            data.addIssue('file-not-found', jar);
        }
    }

    private addToSourceOrTestDirs(dir: string, data: ModuleDataBuilder): void {
        if (this.options.ignoredSourceDirs.includes(dir)) {
            return;
        }
        data.addSourceDir(dir, hasPathSegment(dir, this.options.testSegments));
    }
}
