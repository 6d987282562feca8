#!/usr/bin/env node
import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { runLocate, type LocateCommandOptions } from './commands/locateSources';
import { errorMessage } from './utils/errors';
import { REPRESENTATION_MODES } from './models/moduleData';
import Logger from './utils/logger';

function readVersion(): string {
    for (const rel of ['../package.json', '../../package.json']) {
        const candidate = path.join(__dirname, rel);
        if (fs.existsSync(candidate)) {
            const pkg: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
            if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                return pkg.version;
            }
        }
    }
    return '0.0.0';
}

const program = new Command();

program
    .name('modsrc')
    .description('Resolve source roots and jar dependencies of build modules for IDE projects')
    .version(readVersion());

program
    .command('locate')
    .description('Resolve the modules reachable from the given targets and print a JSON report')
    .argument('<targets...>', 'module names to open')
    .option('-r, --root <dir>', 'repository root (default: $ANDROID_BUILD_TOP, then the git top level)')
    .option('-d, --depth <n>', 'dependency depth kept as source in the combined project')
    .option('-m, --mode <mode>', `representation mode (${REPRESENTATION_MODES.join(' | ')})`)
    .option('-i, --module-info <file>', 'module-info.json, absolute or relative to the root')
    .option('-o, --output <file>', 'write the report to a file instead of stdout')
    .option('-j, --concurrency <n>', 'modules resolved at the same time')
    .option('--log-level <level>', 'silent | error | warn | info | debug')
    .action(async (targets: string[], options: LocateCommandOptions) => {
        try {
            await runLocate(targets, options);
        } catch (err) {
            Logger.error(errorMessage(err));
            process.exitCode = 1;
        }
    });

program.parseAsync().catch((err: unknown) => {
    Logger.error(errorMessage(err));
    process.exitCode = 1;
});
