import type { BuildModule } from '../models/buildModule';
import type { LocateResult, ModuleGraphProvider } from '../models/collaborators';
import { mergeResolvedSets, type ModuleData, type RepresentationMode } from '../models/moduleData';
import { ModuleGraph } from './moduleGraph';
import { ModuleResolver, type ResolveRequest, type ResolverOptions } from './moduleResolver';
import type { FileProbe } from './jarLocator';
import { CONFIG } from '../utils/constants';
import Logger from '../utils/logger';

export interface LocateOptions {
    mode: RepresentationMode;
    /** Modules up to this depth are kept as source in the combined project */
    requestedDepth: number;
    /** Modules resolved at the same time */
    concurrency?: number;
}

/**
 * Orchestrates a run:
 *   1. Load the build graph from the provider
 *   2. Find every module reachable from the targets, with its minimum depth
 *   3. Resolve each module independently
 *   4. Union the per-module sets for the project-file writer
 */
export class SourceLocator {
    private rootPath: string;
    private provider: ModuleGraphProvider;
    private resolver: ModuleResolver;

    constructor(
        rootPath: string,
        provider: ModuleGraphProvider,
        resolverOptions: Partial<ResolverOptions> = {},
        probe?: FileProbe,
    ) {
        this.rootPath = rootPath;
        this.provider = provider;
        this.resolver = new ModuleResolver(rootPath, resolverOptions, probe);
    }

    async locate(
        targets: string[],
        options: LocateOptions,
        onProgress?: (message: string) => void,
    ): Promise<LocateResult> {
        const report = (msg: string) => {
            Logger.info(msg);
            onProgress?.(msg);
        };

        const modules = await this.provider.loadModules();
        const reachable = this.collectReachable(modules, targets);
        report(`${reachable.length} module(s) reachable from ${targets.join(', ')}.`);

        const targetSet = new Set(targets);
        const concurrency = Math.max(1, options.concurrency ?? CONFIG.DEFAULT_CONCURRENCY);
        const results: ModuleData[] = [];

        for (let start = 0; start < reachable.length; start += concurrency) {
            const batch = reachable.slice(start, start + concurrency);
            const resolved = await Promise.all(
                batch.map((mod) => this.resolver.resolve(mod, this.requestFor(mod, targetSet, options))),
            );
            results.push(...resolved);
            report(`Resolved ${results.length}/${reachable.length} module(s)…`);
        }

        const aggregate = mergeResolvedSets(results);
        const issueCount = results.reduce((n, r) => n + r.issues.length, 0);
        report(
            `Done: ${aggregate.srcDirs.size} source root(s), ${aggregate.testDirs.size} test root(s), ` +
            `${aggregate.jarFiles.size} jar(s), ${aggregate.buildTargets.size} build target(s), ` +
            `${issueCount} issue(s).`,
        );
        if (aggregate.buildTargets.size > 0) {
            Logger.warn(`${aggregate.buildTargets.size} artifact(s) must be built before the project is complete.`);
        }

        return {
            rootPath: this.rootPath,
            mode: options.mode,
            requestedDepth: options.requestedDepth,
            targets: [...targets],
            modules: results,
            aggregate,
        };
    }

    // ── Helpers ───────────────────────────────────────────────────────

    /**
     * Reachable modules in BFS order. A depth supplied by the provider is
     * kept; otherwise the computed minimum depth is filled in.
     */
    private collectReachable(modules: Map<string, BuildModule>, targets: string[]): BuildModule[] {
        const graph = new ModuleGraph(modules.values());
        const depths = graph.computeDepths(targets);
        const reachable: BuildModule[] = [];
        for (const [name, depth] of depths) {
            const mod = modules.get(name);
            if (!mod) { continue; }
            reachable.push(mod.depth === undefined ? { ...mod, depth } : mod);
        }
        return reachable;
    }

    private requestFor(mod: BuildModule, targets: Set<string>, options: LocateOptions): ResolveRequest {
        if (options.mode === 'per-module-project') {
            const isProject = targets.has(mod.name);
            return { mode: 'per-module-project', isProject, referencedByJar: !isProject };
        }
        return { mode: 'combined-project', requestedDepth: options.requestedDepth };
    }
}
