// ─── Conversation ────────────────────────────────────────────────────────────

export interface ToolCall {
    id: string;
    type: 'function';
    function: {
        name: string;
        arguments: string;
    };
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
    | { role: 'tool'; tool_call_id: string; content: string };

export interface ToolDefinition {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: Record<string, unknown>;
    };
}

// ─── Model Endpoint ──────────────────────────────────────────────────────────

export interface ChatRequest {
    model: string;
    messages: ChatMessage[];
    tools: ToolDefinition[];
    toolChoice: 'auto';
    temperature: number;
}

export interface AssistantReply {
    content: string | null;
    toolCalls: ToolCall[];
}

/**
 * One credential's view of the chat endpoint. Implementations throw
 * RateLimitError / MalformedToolCallError for the recoverable failures and
 * anything else for fatal ones.
 */
export interface ModelClient {
    complete(request: ChatRequest): Promise<AssistantReply>;
}

// ─── Tools ───────────────────────────────────────────────────────────────────

export type ToolName = 'write_file' | 'read_file' | 'list_dir';

export type ToolInvocation =
    | { kind: 'write_file'; path: string; content: string }
    | { kind: 'read_file'; path: string }
    | { kind: 'list_dir'; path: string };

export type ToolResult =
    | { kind: 'ok'; text: string }
    | { kind: 'unsupported'; name: string; text: string }
    | { kind: 'invalid-arguments'; name: string; text: string };

// ─── Engine ──────────────────────────────────────────────────────────────────

export interface RunLimits {
    maxToolCalls: number;
    maxRateLimitHits: number;
    maxMalformedRetries: number;
    backoffBaseSeconds: number;
    backoffJitterSeconds: number;
}

export type AgentRunStatus = 'completed' | 'max-calls' | 'rate-limited';

export interface AgentRunResult {
    status: AgentRunStatus;
    output: string;
    productiveCalls: number;
    rateLimitHits: number;
    malformedRetries: number;
    exhaustionCycles: number;
}

// ─── Pipeline Configuration ──────────────────────────────────────────────────

export interface Deliverables {
    prd: string;
    architecture: string;
    tasks: string;
    implementation: string;
    review: string;
    tests: string;
}

export interface MonitorConfig {
    enabled: boolean;
    host: string;
    port: number;
    pushIntervalMs: number;
    snapshotTail: number;
}

export interface PipelineConfig {
    model: string;
    baseUrl: string;
    temperature: number;
    credentials: {
        envPrefix: string;
        maxKeys: number;
    };
    limits: RunLimits;
    workspace: {
        projectsDir: string;
        subdirs: string[];
        maxRequirementLength: number;
    };
    deliverables: Deliverables;
    monitor: MonitorConfig;
    logFile: string | null;
}

// ─── Phases ──────────────────────────────────────────────────────────────────

export type PhaseId = keyof Deliverables;

export interface Phase {
    id: PhaseId;
    /** Display label, also used as the agent name in logs and progress. */
    label: string;
    systemPrompt: string;
    instruction: string;
    deliverable: string;
    consumes: PhaseId[];
    tools: ToolName[];
}

export interface PhaseOutcome {
    phase: PhaseId;
    deliverable: string;
    run: AgentRunResult;
}

export interface PipelineResult {
    projectDir: string;
    phases: PhaseOutcome[];
}

// ─── Progress ────────────────────────────────────────────────────────────────

export interface ProgressSnapshot {
    agent: string;
    task: string;
    logs: string[];
}

export interface ProgressSink {
    update(agent: string, task: string, logLine?: string): void;
    snapshot(limit?: number): ProgressSnapshot;
}

// ─── Logging Types ───────────────────────────────────────────────────────────

export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'phase' | 'debug';

export type LogEvent =
    | {
          type: 'system';
          level: LogLevel;
          message: string;
          timestamp: string;
      }
    | {
          type: 'agent';
          agent: string;
          invocationId: string;
          message: string;
          timestamp: string;
      }
    | {
          type: 'progress';
          snapshot: ProgressSnapshot;
          timestamp: string;
      };
