import * as fs from 'node:fs';
import * as path from 'node:path';
import { log } from './utils.js';

// ─── Project Slug ────────────────────────────────────────────────────────────

const MAX_SLUG_LENGTH = 80;

/** "Build a Counter CLI!" → "build_a_counter_cli" */
export function slugify(requirement: string): string {
    const slug = requirement
        .toLowerCase()
        .replace(/[^\w\s-]/g, '')
        .replace(/[\s-]+/g, '_')
        .replace(/_+/g, '_')
        .replace(/^_+|_+$/g, '')
        .slice(0, MAX_SLUG_LENGTH)
        .replace(/_+$/, '');
    return slug || 'project';
}

function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

// ─── Workspace ───────────────────────────────────────────────────────────────

/**
 * `<projectsDir>/<slug>`, or `<slug>_YYYYMMDD_HHMMSS` when that directory is
 * already taken, then `_2`, `_3` … on that. Nothing is created here.
 */
export function resolveProjectDir(projectsDir: string, requirement: string, now: Date = new Date()): string {
    const base = path.resolve(projectsDir, slugify(requirement));
    if (!fs.existsSync(base)) {
        return base;
    }
    const stamped = `${base}_${formatTimestamp(now)}`;
    let candidate = stamped;
    for (let n = 2; fs.existsSync(candidate); n++) {
        candidate = `${stamped}_${n}`;
    }
    return candidate;
}

export interface Workspace {
    root: string;
    logsDir: string;
}

export function prepareWorkspace(
    projectsDir: string,
    requirement: string,
    subdirs: readonly string[],
    now: Date = new Date()
): Workspace {
    const root = resolveProjectDir(projectsDir, requirement, now);
    fs.mkdirSync(path.dirname(root), { recursive: true });
    // throws if it exists; runs never share a root
    fs.mkdirSync(root);
    for (const dir of subdirs) {
        fs.mkdirSync(path.join(root, dir), { recursive: true });
    }
    log('info', `Project directory: ${root}`);
    return { root, logsDir: path.join(root, 'logs') };
}
