import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Phase, PhaseId, PhaseOutcome, PipelineConfig, PipelineResult, ProgressSink } from './types.js';
import type { CredentialPool } from './credentials.js';
import { PhaseArtifactMissingError } from './errors.js';
import { createAgentLogger, generateInvocationId } from './logger.js';
import { buildPhases, renderTemplate } from './phases.js';
import { runAgent, type RunAgentOptions } from './runner.js';
import { log } from './utils.js';

export const COMPLETE_AGENT = 'System';
export const COMPLETE_TASK = 'Orchestration Complete';

// ─── Deliverable Check ───────────────────────────────────────────────────────

/** A file, or a directory with at least one entry. Content is never inspected. */
export function deliverableExists(projectRoot: string, deliverable: string): boolean {
    const target = path.join(projectRoot, deliverable);
    let stat: fs.Stats;
    try {
        stat = fs.statSync(target);
    } catch {
        return false;
    }
    if (stat.isDirectory()) {
        return fs.readdirSync(target).length > 0;
    }
    return stat.isFile();
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

export interface PipelineOptions {
    requirement: string;
    projectRoot: string;
    config: Pick<PipelineConfig, 'model' | 'temperature' | 'limits' | 'deliverables'>;
    pool: CredentialPool;
    progress: ProgressSink;
    /** Where agent transcripts go; defaults to `<projectRoot>/logs`. */
    logsDir?: string;
    phases?: Phase[];
    engine?: Pick<RunAgentOptions, 'sleep' | 'random'>;
    runAgent?: typeof runAgent;
}

/**
 * Run every phase in order, one engine conversation each. A phase that
 * leaves no deliverable behind stops the run before the next one starts.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
    const { requirement, projectRoot, config, pool, progress } = options;
    const phases = options.phases ?? buildPhases(config.deliverables);
    const logsDir = options.logsDir ?? path.join(projectRoot, 'logs');
    const run = options.runAgent ?? runAgent;

    const delivered = new Map<PhaseId, string>();
    const outcomes: PhaseOutcome[] = [];

    for (const [i, phase] of phases.entries()) {
        const inputs: Partial<Record<PhaseId, string>> = {};
        for (const id of phase.consumes) {
            inputs[id] = delivered.get(id) ?? config.deliverables[id];
        }
        const ctx = { requirement, deliverable: phase.deliverable, inputs };

        log('phase', `Phase ${i + 1}/${phases.length}: ${phase.label} → ${phase.deliverable}`);
        progress.update(phase.label, 'Starting', `Phase ${i + 1}/${phases.length}: ${phase.label}`);

        const transcript = createAgentLogger(logsDir, phase.label, generateInvocationId());
        let outcome: PhaseOutcome;
        try {
            const result = await run({
                agent: phase.label,
                systemPrompt: renderTemplate(phase.systemPrompt, ctx),
                userMessage: renderTemplate(phase.instruction, ctx),
                model: config.model,
                pool: pool.snapshot(),
                projectRoot,
                temperature: config.temperature,
                tools: phase.tools,
                limits: config.limits,
                progress,
                transcript,
                ...options.engine,
            });
            outcome = { phase: phase.id, deliverable: phase.deliverable, run: result };
        } finally {
            await transcript.close();
        }

        if (outcome.run.status !== 'completed') {
            log('warn', `[${phase.label}] Run ended early: ${outcome.run.output}`);
        }

        if (!deliverableExists(projectRoot, phase.deliverable)) {
            log('error', `${phase.deliverable} not created by ${phase.label} agent.`);
            progress.update(phase.label, 'Failed', `[${phase.label}] Missing ${phase.deliverable}`);
            throw new PhaseArtifactMissingError(phase.id, phase.label, phase.deliverable);
        }

        log('success', `${phase.deliverable} created by ${phase.label}`);
        delivered.set(phase.id, phase.deliverable);
        outcomes.push(outcome);
    }

    progress.update(COMPLETE_AGENT, COMPLETE_TASK, 'All phases complete');
    log('success', '═══ Pipeline complete ═══');

    return { projectDir: projectRoot, phases: outcomes };
}
