import * as fs from 'fs';
import * as path from 'path';
import { normalizePath } from '../utils/pathUtils';
import Logger from '../utils/logger';

/** Block or line comment, whichever opens first. */
const COMMENT = /\/\*[\s\S]*?\*\/|\/\/[^\n]*/g;
const PACKAGE_STATEMENT =
    /^\s*package\s+([A-Za-z_$][\w$]*(?:\s*\.\s*[A-Za-z_$][\w$]*)*)\s*;/m;

export type SourceFolderLookup =
    | { status: 'found'; dir: string }
    | { status: 'missing' }
    | { status: 'no-package' };

/**
 * Maps Java source files to the source root they live under, using the
 * file's `package` declaration.
 */
export class PackageResolver {
    private rootPath: string;

    constructor(rootPath: string) {
        this.rootPath = rootPath;
    }

    /**
     * First `package a.b.c;` statement outside comments, or null.
     * Comments are scanned in one pass, so a `/*` inside a line comment
     * opens nothing. Block comments are blanked to spaces so a statement on
     * the line a comment closes still starts a line after stripping.
     */
    static parsePackageName(content: string): string | null {
        const stripped = content.replace(
            COMMENT,
            (c) => (c.startsWith('//') ? '' : c.replace(/[^\n]/g, ' ')),
        );
        const match = PACKAGE_STATEMENT.exec(stripped);
        if (!match) {
            return null;
        }
        return match[1].replace(/\s+/g, '');
    }

    /**
     * Source root for `filePath` given its package. The package's dots may
     * match either "/" or a literal "." in a directory name, and the match
     * must end at the file's own directory, so the occurrence nearest the
     * file wins. Without a match the file's directory is returned.
     */
    static inferSourceRoot(filePath: string, packageName: string): string {
        const dir = path.posix.dirname(normalizePath(filePath));
        const pattern = packageName
            .split('.')
            .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
            .join('[./]');
        const match = new RegExp(`(?:^|/)${pattern}$`).exec(dir);
        if (!match) {
            return dir;
        }
        return dir.substring(0, match.index);
    }

    /** Read `absPath` and return its package name; unreadable files give null. */
    async getPackageName(absPath: string): Promise<string | null> {
        let content: string;
        try {
            content = await fs.promises.readFile(absPath, 'utf-8');
        } catch {
            Logger.debug(`Cannot read ${absPath}`);
            return null;
        }
        return PackageResolver.parsePackageName(content);
    }

    async locateSourceFolder(relPath: string): Promise<SourceFolderLookup> {
        const absPath = path.join(this.rootPath, relPath);
        if (!fs.existsSync(absPath)) {
            return { status: 'missing' };
        }
        const packageName = await this.getPackageName(absPath);
        if (!packageName) {
            return { status: 'no-package' };
        }
        return { status: 'found', dir: PackageResolver.inferSourceRoot(relPath, packageName) };
    }

    /**
     * Source folder of a repo-relative java file, or null when the file is
     * absent or declares no package.
     */
    async getSourceFolder(relPath: string): Promise<string | null> {
        const lookup = await this.locateSourceFolder(relPath);
        return lookup.status === 'found' ? lookup.dir : null;
    }
}
