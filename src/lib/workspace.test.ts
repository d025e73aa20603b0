import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { prepareWorkspace, resolveProjectDir, slugify } from './workspace.js';

describe('slugify', () => {
    it('lowercases and joins words with underscores', () => {
        expect(slugify('Build a Counter CLI!')).toBe('build_a_counter_cli');
        expect(slugify('  to-do   list -- app ')).toBe('to_do_list_app');
    });

    it('caps the length', () => {
        expect(slugify('word '.repeat(40))).toHaveLength(79);
    });

    it('falls back when nothing usable is left', () => {
        expect(slugify('!!!')).toBe('project');
    });
});

describe('workspace', () => {
    let projectsDir: string;

    beforeEach(() => {
        projectsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'projects-'));
    });

    afterEach(() => {
        fs.rmSync(projectsDir, { recursive: true, force: true });
    });

    it('creates the project root and its subdirectories', () => {
        const workspace = prepareWorkspace(projectsDir, 'Counter CLI', ['src', 'tests', 'frontend', 'logs']);

        expect(workspace.root).toBe(path.join(projectsDir, 'counter_cli'));
        expect(workspace.logsDir).toBe(path.join(projectsDir, 'counter_cli', 'logs'));
        expect(fs.readdirSync(workspace.root).sort()).toEqual(['frontend', 'logs', 'src', 'tests']);
    });

    it('appends a timestamp when the directory is taken', () => {
        fs.mkdirSync(path.join(projectsDir, 'counter_cli'));
        const now = new Date(2024, 0, 5, 9, 3, 7);

        expect(resolveProjectDir(projectsDir, 'Counter CLI', now)).toBe(
            path.join(projectsDir, 'counter_cli_20240105_090307')
        );
    });

    it('never reuses a directory when the timestamped name is taken too', () => {
        const now = new Date(2026, 0, 1, 12, 0, 0);
        const first = prepareWorkspace(projectsDir, 'build a counter CLI', ['src'], now);
        const second = prepareWorkspace(projectsDir, 'build a counter CLI', ['src'], now);
        fs.writeFileSync(path.join(second.root, 'PRD.md'), '# earlier run');
        const third = prepareWorkspace(projectsDir, 'build a counter CLI', ['src'], now);

        expect(first.root).toBe(path.join(projectsDir, 'build_a_counter_cli'));
        expect(second.root).toBe(path.join(projectsDir, 'build_a_counter_cli_20260101_120000'));
        expect(third.root).toBe(path.join(projectsDir, 'build_a_counter_cli_20260101_120000_2'));
        expect(fs.readdirSync(third.root)).toEqual(['src']);
    });
});
