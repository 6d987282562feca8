import type { BuildModule } from './buildModule';
import type { ModuleData, RepresentationMode, ResolvedSets } from './moduleData';

/** Supplies the raw build-graph metadata, keyed by module name. */
export interface ModuleGraphProvider {
    loadModules(): Promise<Map<string, BuildModule>>;
}

/** Everything resolved for one run. */
export interface LocateResult {
    rootPath: string;
    mode: RepresentationMode;
    requestedDepth: number;
    targets: string[];
    /** Per-module results in resolution order */
    modules: ModuleData[];
    /** Union of all per-module sets */
    aggregate: ResolvedSets;
}

/** Turns resolved sets into IDE project files (or any other report). */
export interface ProjectFileWriter {
    write(result: LocateResult): Promise<void>;
}
