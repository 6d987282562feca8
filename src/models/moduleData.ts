export type RepresentationMode = 'combined-project' | 'per-module-project';

export const REPRESENTATION_MODES: readonly RepresentationMode[] = [
    'combined-project',
    'per-module-project',
];

export function isRepresentationMode(value: string): value is RepresentationMode {
    return REPRESENTATION_MODES.some((m) => m === value);
}

/** How a module ends up in the IDE project. */
export type Representation = 'source' | 'jar';

export type IssueKind = 'file-not-found' | 'malformed-package' | 'unrecognized-artifact';

/** Non-fatal problem met while probing the filesystem. */
export interface ResolutionIssue {
    kind: IssueKind;
    module: string;
    /** Repo-relative path the issue is about */
    path: string;
}

/** The result sets handed to the project-file writer. */
export interface ResolvedSets {
    readonly srcDirs: ReadonlySet<string>;
    readonly testDirs: ReadonlySet<string>;
    readonly jarFiles: ReadonlySet<string>;
    readonly missingJars: ReadonlySet<string>;
    readonly rJavaPaths: ReadonlySet<string>;
    readonly srcjarPaths: ReadonlySet<string>;
    readonly buildTargets: ReadonlySet<string>;
}

export interface ModuleData extends ResolvedSets {
    readonly name: string;
    readonly representation: Representation;
    readonly issues: readonly ResolutionIssue[];
}

/**
 * Mutable accumulator used while a single module is being resolved.
 * `build()` hands out an immutable snapshot.
 */
export class ModuleDataBuilder {
    readonly srcDirs = new Set<string>();
    readonly testDirs = new Set<string>();
    readonly jarFiles = new Set<string>();
    readonly missingJars = new Set<string>();
    readonly rJavaPaths = new Set<string>();
    readonly srcjarPaths = new Set<string>();
    readonly buildTargets = new Set<string>();
    readonly issues: ResolutionIssue[] = [];

    constructor(readonly name: string, public representation: Representation = 'source') {}

    /** Classify a directory; a test dir is never kept as a source dir. */
    addSourceDir(dir: string, isTest: boolean): void {
        if (isTest) {
            this.srcDirs.delete(dir);
            this.testDirs.add(dir);
        } else if (!this.testDirs.has(dir)) {
            this.srcDirs.add(dir);
        }
    }

    addIssue(kind: IssueKind, path: string): void {
        this.issues.push({ kind, module: this.name, path });
    }

    build(): ModuleData {
        return Object.freeze({
            name: this.name,
            representation: this.representation,
            srcDirs: new Set(this.srcDirs),
            testDirs: new Set(this.testDirs),
            jarFiles: new Set(this.jarFiles),
            missingJars: new Set(this.missingJars),
            rJavaPaths: new Set(this.rJavaPaths),
            srcjarPaths: new Set(this.srcjarPaths),
            buildTargets: new Set(this.buildTargets),
            issues: Object.freeze([...this.issues]),
        });
    }
}

export function emptyResolvedSets(): ResolvedSets {
    return {
        srcDirs: new Set(),
        testDirs: new Set(),
        jarFiles: new Set(),
        missingJars: new Set(),
        rJavaPaths: new Set(),
        srcjarPaths: new Set(),
        buildTargets: new Set(),
    };
}

/**
 * Union per-module results. The outcome does not depend on input order;
 * a directory that any module classifies as test is dropped from sources.
 */
export function mergeResolvedSets(items: Iterable<ResolvedSets>): ResolvedSets {
    const srcDirs = new Set<string>();
    const testDirs = new Set<string>();
    const jarFiles = new Set<string>();
    const missingJars = new Set<string>();
    const rJavaPaths = new Set<string>();
    const srcjarPaths = new Set<string>();
    const buildTargets = new Set<string>();

    for (const item of items) {
        item.srcDirs.forEach((d) => srcDirs.add(d));
        item.testDirs.forEach((d) => testDirs.add(d));
        item.jarFiles.forEach((j) => jarFiles.add(j));
        item.missingJars.forEach((j) => missingJars.add(j));
        item.rJavaPaths.forEach((p) => rJavaPaths.add(p));
        item.srcjarPaths.forEach((p) => srcjarPaths.add(p));
        item.buildTargets.forEach((t) => buildTargets.add(t));
    }
    for (const dir of testDirs) {
        srcDirs.delete(dir);
    }

    return { srcDirs, testDirs, jarFiles, missingJars, rJavaPaths, srcjarPaths, buildTargets };
}
