import * as fs from 'node:fs';
import * as path from 'node:path';
import { log } from './utils.js';
import { errorMessage } from './errors.js';

// ─── Containment ─────────────────────────────────────────────────────────────

export type FileAction = 'write' | 'read' | 'list';

export interface ResolvedPath {
    ok: true;
    absolute: string;
}

export interface ContainmentViolation {
    ok: false;
    error: string;
}

/**
 * Resolve `relativePath` against `projectRoot` and confirm the result is the
 * root or one of its descendants. Uses path.relative rather than a string
 * prefix so `/projects/app_evil` is not mistaken for a child of `/projects/app`,
 * and a different drive on Windows yields an absolute relative path.
 */
export function resolveWithinRoot(
    projectRoot: string,
    relativePath: string,
    action: FileAction
): ResolvedPath | ContainmentViolation {
    const root = path.resolve(projectRoot);
    const absolute = path.resolve(root, relativePath);
    const rel = path.relative(root, absolute);

    const escapes = rel === '..' || rel.startsWith('..' + path.sep) || path.isAbsolute(rel);
    if (escapes) {
        log('error', `Security Alert: Path traversal on ${action}: ${relativePath}`);
        return { ok: false, error: `Error: Security violation. Cannot ${action} outside project root.` };
    }
    return { ok: true, absolute };
}

// ─── File Operations ─────────────────────────────────────────────────────────
// None of these throw: the text goes back into the model's conversation.

export function writeFile(projectRoot: string, relativePath: string, content: string): string {
    const resolved = resolveWithinRoot(projectRoot, relativePath, 'write');
    if (!resolved.ok) return resolved.error;

    try {
        fs.mkdirSync(path.dirname(resolved.absolute), { recursive: true });
        fs.writeFileSync(resolved.absolute, content, 'utf-8');
        log('info', `FileSystem: Wrote to ${resolved.absolute}`);
        return `Successfully wrote to ${relativePath}`;
    } catch (err) {
        log('error', `FileSystem: Error writing to ${relativePath} - ${errorMessage(err)}`);
        return `Error writing file: ${errorMessage(err)}`;
    }
}

export function readFile(projectRoot: string, relativePath: string): string {
    const resolved = resolveWithinRoot(projectRoot, relativePath, 'read');
    if (!resolved.ok) return resolved.error;

    try {
        if (!fs.existsSync(resolved.absolute)) {
            return `Error: File ${relativePath} does not exist.`;
        }
        const content = fs.readFileSync(resolved.absolute, 'utf-8');
        log('info', `FileSystem: Read from ${resolved.absolute}`);
        return content;
    } catch (err) {
        log('error', `FileSystem: Error reading ${relativePath} - ${errorMessage(err)}`);
        return `Error reading file: ${errorMessage(err)}`;
    }
}

export function listDir(projectRoot: string, relativePath: string): string {
    const resolved = resolveWithinRoot(projectRoot, relativePath, 'list');
    if (!resolved.ok) return resolved.error;

    try {
        if (!fs.existsSync(resolved.absolute)) {
            return `Error: Directory ${relativePath} does not exist.`;
        }
        return fs.readdirSync(resolved.absolute).sort().join('\n');
    } catch (err) {
        return `Error listing directory: ${errorMessage(err)}`;
    }
}
