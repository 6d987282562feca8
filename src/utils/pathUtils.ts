import * as path from 'path';
import { EXTENSIONS } from './constants';

export function normalizePath(p: string): string {
    return p.replace(/\\/g, '/');
}

/** Join repo-relative segments with forward slashes. */
export function joinRelative(...segments: string[]): string {
    return normalizePath(path.posix.join(...segments.map(normalizePath)));
}

export function isJavaFile(filePath: string): boolean {
    return filePath.toLowerCase().endsWith(EXTENSIONS.JAVA);
}

export function isJarFile(filePath: string): boolean {
    return filePath.toLowerCase().endsWith(EXTENSIONS.JAR);
}

export function isSrcjarFile(filePath: string): boolean {
    return filePath.endsWith(EXTENSIONS.SRCJAR);
}

/** True when one of `segments` appears as a whole path component. */
export function hasPathSegment(filePath: string, segments: readonly string[]): boolean {
    const parts = normalizePath(filePath).split('/');
    return segments.some((s) => parts.includes(s));
}
