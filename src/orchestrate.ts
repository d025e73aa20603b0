#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import { buildCredentialPool } from './lib/credentials.js';
import { errorMessage } from './lib/errors.js';
import { attachLogFile } from './lib/logger.js';
import { createModelClientFactory } from './lib/model.js';
import { runPipeline } from './lib/pipeline.js';
import { ProgressRecord } from './lib/progress.js';
import { prepareWorkspace } from './lib/workspace.js';
import { startStatusServer, type StatusServer } from './server.js';
import {
    colors,
    log,
    loadConfig,
    parseArgs,
    getTaskDescription,
    getPackageRoot,
    validateRequirement,
} from './lib/utils.js';

const USAGE = `Usage: forgeline [options] <requirement...>

Options:
  --task-file <file>     Read the requirement from a file
  --projects-dir <dir>   Where project workspaces are created (default: config)
  --no-monitor           Do not start the status monitor
  -h, --help             Show this help`;

// ═══════════════════════════════════════════════════════════════════════════════
// Main
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
    loadEnv();

    const cliArgs = parseArgs(process.argv);
    if (cliArgs.help) {
        console.log(USAGE);
        return;
    }

    console.log(`\n${colors.cyan}${colors.bold}╔══════════════════════════════════════════╗${colors.reset}`);
    console.log(`${colors.cyan}${colors.bold}║       Forgeline Phase Pipeline           ║${colors.reset}`);
    console.log(`${colors.cyan}${colors.bold}╚══════════════════════════════════════════╝${colors.reset}\n`);

    const config = loadConfig();
    attachLogFile(config.logFile);
    log('info', `Pipeline config loaded from ${getPackageRoot()}`);
    log('info', `Model: ${config.model} @ ${config.baseUrl}`);

    const task = getTaskDescription(cliArgs);
    if (task === null) {
        console.log(USAGE);
        process.exitCode = 1;
        return;
    }
    const requirement = validateRequirement(task, config.workspace.maxRequirementLength);
    log('info', `Task: ${requirement.slice(0, 100)}${requirement.length > 100 ? '...' : ''}`);

    // Credentials are checked before anything is written to disk
    const pool = buildCredentialPool(
        { env: process.env, prefix: config.credentials.envPrefix, maxKeys: config.credentials.maxKeys },
        createModelClientFactory(config.baseUrl)
    );

    const progress = new ProgressRecord();
    let monitor: StatusServer | null = null;
    if (config.monitor.enabled && cliArgs.monitor) {
        monitor = await startStatusServer(progress, config.monitor);
    }

    try {
        const workspace = prepareWorkspace(
            cliArgs.projectsDir ?? config.workspace.projectsDir,
            requirement,
            config.workspace.subdirs
        );

        const result = await runPipeline({
            requirement,
            projectRoot: workspace.root,
            logsDir: workspace.logsDir,
            config,
            pool,
            progress,
        });

        console.log();
        log('success', `Project ready at ${result.projectDir}`);
        for (const outcome of result.phases) {
            const { run } = outcome;
            log(
                'info',
                `  ${outcome.deliverable}: ${run.status} | calls: ${run.productiveCalls} | ` +
                    `rate hits: ${run.rateLimitHits} | malformed retries: ${run.malformedRetries}`
            );
        }
    } finally {
        await monitor?.close();
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((err) => {
    log('error', `Pipeline crashed: ${errorMessage(err)}`);
    if (err instanceof Error && err.stack) {
        console.error(err.stack);
    }
    process.exit(1);
});
