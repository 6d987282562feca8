/**
 * One node of the build graph as described by the module-info provider.
 * All paths are repo-relative with forward slashes.
 */
export interface BuildModule {
    /** Module name, unique within the build graph */
    name: string;
    /** Module root directories; the first one is the primary root */
    path: string[];
    /** Declared sources (.java, .srcjar, others are ignored) */
    srcs: string[];
    /** Generated source containers (aapt2, R, aidl, proto...) */
    srcjars: string[];
    /** Jar names relative to the module root */
    jars: string[];
    /** Build outputs relative to the repository root */
    installed: string[];
    /** Names of the modules this one depends on */
    dependencies: string[];
    /** Class tags such as "APPS" or "JAVA_LIBRARIES" */
    classes: string[];
    /** Prebuilt "classes jar" outputs */
    classesJar: string[];
    /** Whether jarjar repackaging rules apply to the module's output */
    jarjarRules: boolean;
    /** Distance from the requested targets, when already known */
    depth?: number;
}

/** Build a module with every list empty; handy for providers and tests. */
export function createBuildModule(name: string, fields: Partial<BuildModule> = {}): BuildModule {
    return {
        name,
        path: [],
        srcs: [],
        srcjars: [],
        jars: [],
        installed: [],
        dependencies: [],
        classes: [],
        classesJar: [],
        jarjarRules: false,
        ...fields,
    };
}
