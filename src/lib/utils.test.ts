import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError, RequirementError } from './errors.js';
import { getTaskDescription, loadConfig, parseArgs, parseConfig, validateRequirement } from './utils.js';

const RAW_CONFIG = {
    model: 'groq/llama-3.3-70b-versatile',
    baseUrl: 'https://api.groq.com/openai/v1',
    temperature: 0.3,
    credentials: { envPrefix: 'GROQ_API_KEY', maxKeys: 5 },
    limits: {
        maxToolCalls: 25,
        maxRateLimitHits: 30,
        maxMalformedRetries: 2,
        backoffBaseSeconds: 20,
        backoffJitterSeconds: 5,
    },
    workspace: { projectsDir: 'projects', subdirs: ['src', 'tests', 'frontend', 'logs'], maxRequirementLength: 2000 },
    deliverables: {
        prd: 'PRD.md',
        architecture: 'ARCHITECTURE.md',
        tasks: 'TASK_LIST.json',
        implementation: 'src',
        review: 'VALIDATION_REPORT.md',
        tests: 'tests/test_main.py',
    },
    monitor: { enabled: true, host: '127.0.0.1', port: 8000, pushIntervalMs: 100, snapshotTail: 50 },
    logFile: null,
};

describe('parseConfig', () => {
    it('strips the provider prefix from the model name', () => {
        expect(parseConfig(RAW_CONFIG, {}).model).toBe('llama-3.3-70b-versatile');
    });

    it('applies environment overrides', () => {
        const config = parseConfig(RAW_CONFIG, {
            OPENAI_MODEL_NAME: 'groq/test-model',
            OPENAI_API_BASE: 'http://127.0.0.1:9999/v1',
            FORGELINE_MONITOR_PORT: '8123',
        });

        expect(config.model).toBe('test-model');
        expect(config.baseUrl).toBe('http://127.0.0.1:9999/v1');
        expect(config.monitor.port).toBe(8123);
    });

    it('rejects a bad monitor port override', () => {
        expect(() => parseConfig(RAW_CONFIG, { FORGELINE_MONITOR_PORT: 'eighty' })).toThrow(ConfigurationError);
    });

    it('names the invalid fields', () => {
        const broken = { ...RAW_CONFIG, limits: { ...RAW_CONFIG.limits, maxToolCalls: 0 } };
        expect(() => parseConfig(broken, {})).toThrow(/limits\.maxToolCalls/);
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads and validates a config file', () => {
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(file, JSON.stringify(RAW_CONFIG));
        expect(loadConfig(file, {}).deliverables.implementation).toBe('src');
    });

    it('fails on a missing file or invalid JSON', () => {
        expect(() => loadConfig(path.join(dir, 'absent.json'), {})).toThrow(ConfigurationError);

        const file = path.join(dir, 'broken.json');
        fs.writeFileSync(file, '{ "model": ');
        expect(() => loadConfig(file, {})).toThrow(ConfigurationError);
    });

    it('ships a valid default config', () => {
        expect(loadConfig(undefined, {}).monitor.port).toBe(8000);
    });
});

describe('parseArgs', () => {
    it('joins positional words into the requirement', () => {
        expect(parseArgs(['node', 'forgeline', 'a', 'counter', 'CLI'])).toEqual({
            task: 'a counter CLI',
            taskFile: null,
            projectsDir: null,
            monitor: true,
            help: false,
        });
    });

    it('reads the flags', () => {
        expect(
            parseArgs(['node', 'forgeline', '--projects-dir', '/tmp/out', '--task-file', 'task.md', '--no-monitor', '-h'])
        ).toEqual({
            task: null,
            taskFile: 'task.md',
            projectsDir: '/tmp/out',
            monitor: false,
            help: true,
        });
    });
});

describe('requirements', () => {
    it('trims and accepts a requirement within the limit', () => {
        expect(validateRequirement('  a counter  ', 2000)).toBe('a counter');
    });

    it('rejects empty and oversized requirements', () => {
        expect(() => validateRequirement('   ', 2000)).toThrow('Requirement cannot be empty.');
        expect(() => validateRequirement('x'.repeat(2001), 2000)).toThrow(
            'Requirement too long (max 2000 chars, got 2001).'
        );
    });

    it('fails on a missing task file', () => {
        const args = parseArgs(['node', 'forgeline', '--task-file', '/nonexistent/task.md']);
        expect(() => getTaskDescription(args)).toThrow(RequirementError);
    });
});
