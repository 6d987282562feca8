export { PackageResolver } from './analysis/packageResolver';
export type { SourceFolderLookup } from './analysis/packageResolver';
export { ArtifactMapper } from './analysis/artifactMapper';
export {
    collectDeclaredJars,
    collectJarFiles,
    createFileProbe,
    locateJarPath,
    selectClassesJar,
    selectInstalledJar,
} from './analysis/jarLocator';
export type { FileProbe, JarSelection, JarStrategy } from './analysis/jarLocator';
export {
    ModuleResolver,
    planCombined,
    planPerModule,
    planResolution,
} from './analysis/moduleResolver';
export type { ResolveRequest, ResolverOptions, ResolutionPlan } from './analysis/moduleResolver';
export { ModuleGraph } from './analysis/moduleGraph';
export { ModuleInfoParser } from './analysis/moduleInfoParser';
export { SourceLocator } from './analysis/sourceLocator';
export type { LocateOptions } from './analysis/sourceLocator';
export { createBuildModule } from './models/buildModule';
export type { BuildModule } from './models/buildModule';
export {
    emptyResolvedSets,
    isRepresentationMode,
    mergeResolvedSets,
    ModuleDataBuilder,
    REPRESENTATION_MODES,
} from './models/moduleData';
export type {
    IssueKind,
    ModuleData,
    Representation,
    RepresentationMode,
    ResolutionIssue,
    ResolvedSets,
} from './models/moduleData';
export type { LocateResult, ModuleGraphProvider, ProjectFileWriter } from './models/collaborators';
export { JsonReportWriter, toReport } from './commands/reportWriter';
export { runLocate } from './commands/locateSources';
export type { LocateCommandOptions } from './commands/locateSources';
export { ModuleLocatorError, ModuleInfoError, ConfigError } from './utils/errors';
