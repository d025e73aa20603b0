import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { LogLevel, PipelineConfig } from './types.js';
import { appendToLogFile, broadcastLog } from './logger.js';
import { ConfigurationError, RequirementError, errorMessage } from './errors.js';

// ─── Path Resolution ─────────────────────────────────────────────────────────

// PACKAGE_ROOT = where config.json lives. This file sits in src/lib/, so go up twice.
const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
const CONFIG_PATH = path.join(PACKAGE_ROOT, 'config.json');

export function getPackageRoot(): string {
    return PACKAGE_ROOT;
}

// ─── Colors ──────────────────────────────────────────────────────────────────

export const colors = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
};

const levelColors: Record<LogLevel, string> = {
    info: colors.blue,
    success: colors.green,
    warn: colors.yellow,
    error: colors.red,
    phase: colors.magenta,
    debug: colors.dim,
};

const levelLabels: Record<LogLevel, string> = {
    info: 'INFO',
    success: ' OK ',
    warn: 'WARN',
    error: 'ERR ',
    phase: '>>>>',
    debug: 'DBG ',
};

export function log(level: LogLevel, message: string): void {
    const timestamp = new Date().toISOString().slice(11, 19);
    const color = levelColors[level];
    const label = levelLabels[level];
    console.log(`${colors.dim}[${timestamp}]${colors.reset} ${color}${colors.bold}${label}${colors.reset} ${message}`);

    appendToLogFile(`[${new Date().toISOString()}] ${label} ${message}`);
    broadcastLog(level, message);
}

// ─── Config ──────────────────────────────────────────────────────────────────

const positiveInt = z.number().int().positive();

const configSchema = z.object({
    model: z.string().min(1),
    baseUrl: z.string().url(),
    temperature: z.number().min(0).max(2),
    credentials: z.object({
        envPrefix: z.string().min(1),
        maxKeys: positiveInt,
    }),
    limits: z.object({
        maxToolCalls: positiveInt,
        maxRateLimitHits: positiveInt,
        maxMalformedRetries: z.number().int().min(0),
        backoffBaseSeconds: z.number().positive(),
        backoffJitterSeconds: z.number().min(0),
    }),
    workspace: z.object({
        projectsDir: z.string().min(1),
        subdirs: z.array(z.string().min(1)),
        maxRequirementLength: positiveInt,
    }),
    deliverables: z.object({
        prd: z.string().min(1),
        architecture: z.string().min(1),
        tasks: z.string().min(1),
        implementation: z.string().min(1),
        review: z.string().min(1),
        tests: z.string().min(1),
    }),
    monitor: z.object({
        enabled: z.boolean(),
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
        pushIntervalMs: positiveInt,
        snapshotTail: positiveInt,
    }),
    logFile: z.string().min(1).nullable(),
});

export type Env = Record<string, string | undefined>;

/**
 * Validate a parsed config.json and apply the environment overrides:
 * OPENAI_MODEL_NAME, OPENAI_API_BASE and FORGELINE_MONITOR_PORT.
 */
export function parseConfig(raw: unknown, env: Env = process.env): PipelineConfig {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid pipeline config: ${issues}`);
    }
    const config: PipelineConfig = parsed.data;

    const modelOverride = env.OPENAI_MODEL_NAME?.trim();
    if (modelOverride) {
        config.model = modelOverride;
    }
    // litellm-style "groq/<model>" names are accepted; the endpoint wants the bare id
    config.model = config.model.replace(/^groq\//, '');

    const baseOverride = env.OPENAI_API_BASE?.trim();
    if (baseOverride) {
        config.baseUrl = baseOverride;
    }

    const portOverride = env.FORGELINE_MONITOR_PORT?.trim();
    if (portOverride) {
        const port = Number.parseInt(portOverride, 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new ConfigurationError(`FORGELINE_MONITOR_PORT must be a port number, got "${portOverride}"`);
        }
        config.monitor.port = port;
    }

    return config;
}

export function loadConfig(file: string = CONFIG_PATH, env: Env = process.env): PipelineConfig {
    if (!fs.existsSync(file)) {
        throw new ConfigurationError(`Pipeline config not found at ${file}`);
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (err) {
        throw new ConfigurationError(`Pipeline config at ${file} is not valid JSON: ${errorMessage(err)}`);
    }
    return parseConfig(raw, env);
}

// ─── CLI Argument Parsing ────────────────────────────────────────────────────

export interface CliArgs {
    task: string | null;
    taskFile: string | null;
    projectsDir: string | null;
    monitor: boolean;
    help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
    // argv[0] = node, argv[1] = script path, rest = user args
    const args = argv.slice(2);

    const result: CliArgs = {
        task: null,
        taskFile: null,
        projectsDir: null,
        monitor: true,
        help: false,
    };

    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--task-file') {
            result.taskFile = args[++i] ?? null;
        } else if (arg === '--projects-dir') {
            result.projectsDir = args[++i] ?? null;
        } else if (arg === '--no-monitor') {
            result.monitor = false;
        } else if (arg === '--help' || arg === '-h') {
            result.help = true;
        } else if (!arg.startsWith('--')) {
            positional.push(arg);
        }
    }

    if (positional.length > 0) {
        result.task = positional.join(' ');
    }

    return result;
}

// ─── Task Description ────────────────────────────────────────────────────────

/**
 * The requirement comes from --task-file when given, otherwise from the
 * positional arguments. Returns null when neither is present.
 */
export function getTaskDescription(args: CliArgs): string | null {
    if (args.taskFile) {
        if (!fs.existsSync(args.taskFile)) {
            throw new RequirementError(`Task file not found: ${args.taskFile}`);
        }
        return fs.readFileSync(args.taskFile, 'utf-8').trim();
    }
    return args.task?.trim() ?? null;
}

export function validateRequirement(requirement: string, maxLength: number): string {
    const trimmed = requirement.trim();
    if (!trimmed) {
        throw new RequirementError('Requirement cannot be empty.');
    }
    if (trimmed.length > maxLength) {
        throw new RequirementError(`Requirement too long (max ${maxLength} chars, got ${trimmed.length}).`);
    }
    return trimmed;
}
