import simpleGit, { type SimpleGit } from 'simple-git';
import * as fs from 'fs';
import * as path from 'path';
import { CONFIG } from '../utils/constants';
import { normalizePath } from '../utils/pathUtils';
import Logger from '../utils/logger';

export class GitService {
    private git: SimpleGit;

    constructor(workingDir: string) {
        this.git = simpleGit(workingDir);
    }

    /** Top-level directory of the enclosing checkout, or null outside one. */
    async getRepoRoot(): Promise<string | null> {
        try {
            const result = await this.git.revparse(['--show-toplevel']);
            return result.trim() || null;
        } catch {
            return null;
        }
    }
}

/**
 * Root the module paths are relative to, by priority:
 *   1. an explicit directory (CLI flag)
 *   2. the build-top environment variable
 *   3. the git checkout around `cwd`
 */
export async function resolveRootPath(
    explicit: string | undefined,
    env: NodeJS.ProcessEnv,
    cwd: string,
    git: Pick<GitService, 'getRepoRoot'> = new GitService(cwd),
): Promise<string | null> {
    const fromEnv = env[CONFIG.ROOT_ENV_VAR];
    const candidates: [string, string | undefined][] = [
        ['--root', explicit],
        [CONFIG.ROOT_ENV_VAR, fromEnv],
    ];
    for (const [source, candidate] of candidates) {
        if (!candidate) { continue; }
        const abs = path.resolve(cwd, candidate);
        if (fs.existsSync(abs)) {
            Logger.debug(`Repository root from ${source}: ${abs}`);
            return normalizePath(abs);
        }
        Logger.warn(`Ignoring ${source}: ${abs} does not exist.`);
    }

    const fromGit = await git.getRepoRoot();
    if (fromGit) {
        Logger.debug(`Repository root from git: ${fromGit}`);
        return normalizePath(fromGit);
    }
    return null;
}
