import { resolveRootPath, GitService } from '../git/gitService';
import { ModuleInfoParser } from '../analysis/moduleInfoParser';
import { SourceLocator } from '../analysis/sourceLocator';
import type { LocateResult, ProjectFileWriter } from '../models/collaborators';
import { JsonReportWriter } from './reportWriter';
import { ConfigurationStore } from '../utils/config';
import { ERROR_MESSAGES } from '../utils/constants';
import { ModuleLocatorError } from '../utils/errors';
import Logger from '../utils/logger';

/** Flag values as commander hands them over; all optional. */
export interface LocateCommandOptions {
    root?: string;
    depth?: string;
    mode?: string;
    moduleInfo?: string;
    output?: string;
    concurrency?: string;
    logLevel?: string;
}

export interface LocateEnvironment {
    env: NodeJS.ProcessEnv;
    cwd: string;
    git?: Pick<GitService, 'getRepoRoot'>;
    writer?: ProjectFileWriter;
}

/**
 * Command handler: finds the repository root, merges `.modsrc.json` with
 * the flags, resolves every module reachable from the targets and hands
 * the result to the writer.
 */
export async function runLocate(
    targets: string[],
    options: LocateCommandOptions,
    environment: LocateEnvironment = { env: process.env, cwd: process.cwd() },
): Promise<LocateResult> {
    if (targets.length === 0) {
        throw new ModuleLocatorError(ERROR_MESSAGES.NO_TARGETS);
    }

    const rootPath = await resolveRootPath(
        options.root,
        environment.env,
        environment.cwd,
        environment.git ?? new GitService(environment.cwd),
    );
    if (!rootPath) {
        throw new ModuleLocatorError(ERROR_MESSAGES.NO_ROOT);
    }

    const settings = ConfigurationStore.load(rootPath)
        .withOverrides({
            depth: options.depth,
            mode: options.mode,
            moduleInfo: options.moduleInfo,
            concurrency: options.concurrency,
            logLevel: options.logLevel,
        })
        .toSettings();
    Logger.setLevel(settings.logLevel);
    Logger.info(`Root: ${rootPath} (mode ${settings.mode}, depth ${settings.depth})`);

    const locator = new SourceLocator(
        rootPath,
        new ModuleInfoParser(rootPath, settings.moduleInfo),
        {
            testSegments: settings.testSegments,
            ignoredSourceDirs: settings.ignoredSourceDirs,
            attachSrcjars: settings.attachSrcjars,
        },
    );
    const result = await locator.locate(targets, {
        mode: settings.mode,
        requestedDepth: settings.depth,
        concurrency: settings.concurrency,
    });

    const writer = environment.writer ?? new JsonReportWriter(options.output);
    await writer.write(result);
    return result;
}
