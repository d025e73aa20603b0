import type { PhaseId } from './types.js';

// ─── Fatal Errors ────────────────────────────────────────────────────────────

/**
 * Startup configuration is unusable (no credentials, invalid config.json).
 * Raised before any phase runs.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class RequirementError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RequirementError';
    }
}

/**
 * A phase finished without producing its deliverable. Every later phase
 * reads it, so the whole run stops here.
 */
export class PhaseArtifactMissingError extends Error {
    public readonly phase: PhaseId;
    public readonly agent: string;
    public readonly deliverable: string;

    constructor(phase: PhaseId, agent: string, deliverable: string) {
        super(`${deliverable} not created by ${agent} agent.`);
        this.name = 'PhaseArtifactMissingError';
        this.phase = phase;
        this.agent = agent;
        this.deliverable = deliverable;
    }
}

// ─── Recoverable Endpoint Failures ───────────────────────────────────────────

export class RateLimitError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RateLimitError';
    }
}

/** The endpoint rejected the model's tool call encoding (e.g. XML-style calls). */
export class MalformedToolCallError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedToolCallError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
