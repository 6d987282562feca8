import * as fs from 'fs';
import * as path from 'path';
import type { LocateResult, ProjectFileWriter } from '../models/collaborators';
import type { ModuleData, ResolvedSets } from '../models/moduleData';
import Logger from '../utils/logger';

type SerializedSets = Record<keyof ResolvedSets, string[]>;

function sorted(set: ReadonlySet<string>): string[] {
    return Array.from(set).sort();
}

export function serializeSets(sets: ResolvedSets): SerializedSets {
    return {
        srcDirs: sorted(sets.srcDirs),
        testDirs: sorted(sets.testDirs),
        jarFiles: sorted(sets.jarFiles),
        missingJars: sorted(sets.missingJars),
        rJavaPaths: sorted(sets.rJavaPaths),
        srcjarPaths: sorted(sets.srcjarPaths),
        buildTargets: sorted(sets.buildTargets),
    };
}

function serializeModule(mod: ModuleData) {
    return {
        name: mod.name,
        representation: mod.representation,
        ...serializeSets(mod),
        issues: mod.issues,
    };
}

/** Plain-object form of a run, with every set as a sorted array. */
export function toReport(result: LocateResult) {
    return {
        rootPath: result.rootPath,
        mode: result.mode,
        requestedDepth: result.requestedDepth,
        targets: result.targets,
        aggregate: serializeSets(result.aggregate),
        modules: [...result.modules]
            .sort((a, b) => a.name.localeCompare(b.name))
            .map(serializeModule),
    };
}

/**
 * Writes the run as JSON, to a file when a path is given and to stdout
 * otherwise. Stands in for the IDE-specific project writers.
 */
export class JsonReportWriter implements ProjectFileWriter {
    private outputPath: string | undefined;
    private stdout: (text: string) => void;

    constructor(
        outputPath?: string,
        stdout: (text: string) => void = (text) => process.stdout.write(text),
    ) {
        this.outputPath = outputPath;
        this.stdout = stdout;
    }

    async write(result: LocateResult): Promise<void> {
        const json = JSON.stringify(toReport(result), null, 2) + '\n';
        if (!this.outputPath) {
            this.stdout(json);
            return;
        }
        await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
        await fs.promises.writeFile(this.outputPath, json, 'utf-8');
        Logger.info(`Report written to ${this.outputPath}`);
    }
}
