import type { BuildModule } from '../models/buildModule';
import Logger from '../utils/logger';

/**
 * Directed module → dependency graph with an index-based node store.
 * Edges to modules that are not part of the graph are dropped.
 */
export class ModuleGraph {
    /** node index → module name */
    private names: string[] = [];
    /** module name → node index */
    private index = new Map<string, number>();
    /** node index → indices of its dependencies */
    private edges: number[][] = [];

    constructor(modules: Iterable<BuildModule>) {
        const list = Array.from(modules);
        for (const mod of list) {
            this.addNode(mod.name);
        }
        for (const mod of list) {
            const from = this.index.get(mod.name);
            if (from === undefined) { continue; }
            for (const dep of mod.dependencies) {
                const to = this.index.get(dep);
                if (to !== undefined && !this.edges[from].includes(to)) {
                    this.edges[from].push(to);
                }
            }
        }
    }

    get size(): number {
        return this.names.length;
    }

    has(name: string): boolean {
        return this.index.has(name);
    }

    /** Direct dependencies of a module, in declaration order. */
    getDependencies(name: string): string[] {
        const i = this.index.get(name);
        if (i === undefined) {
            return [];
        }
        return this.edges[i].map((to) => this.names[to]);
    }

    /**
     * Minimum distance of every reachable module from the roots (roots are
     * at depth 0). Unknown roots are skipped. With `maxDepth`, traversal
     * stops expanding past that distance.
     */
    computeDepths(roots: Iterable<string>, maxDepth?: number): Map<string, number> {
        const depth = new Array<number>(this.names.length).fill(-1);
        const queue: number[] = [];

        for (const root of roots) {
            const i = this.index.get(root);
            if (i === undefined) {
                Logger.warn(`Target module "${root}" is not in the build graph.`);
                continue;
            }
            if (depth[i] !== 0) {
                depth[i] = 0;
                queue.push(i);
            }
        }

        // BFS visits nodes in non-decreasing depth, so the first visit is minimal
        let head = 0;
        while (head < queue.length) {
            const current = queue[head++];
            const next = depth[current] + 1;
            if (maxDepth !== undefined && next > maxDepth) {
                continue;
            }
            for (const dep of this.edges[current]) {
                if (depth[dep] === -1) {
                    depth[dep] = next;
                    queue.push(dep);
                }
            }
        }

        const result = new Map<string, number>();
        for (const i of queue) {
            result.set(this.names[i], depth[i]);
        }
        return result;
    }

    private addNode(name: string): void {
        if (this.index.has(name)) {
            return;
        }
        this.index.set(name, this.names.length);
        this.names.push(name);
        this.edges.push([]);
    }
}
