import { setTimeout as delay } from 'node:timers/promises';
import type {
    AgentRunResult,
    AssistantReply,
    ChatMessage,
    ProgressSink,
    RunLimits,
    ToolCall,
    ToolName,
} from './types.js';
import type { CredentialPool } from './credentials.js';
import type { AgentLogger } from './logger.js';
import { MalformedToolCallError, RateLimitError } from './errors.js';
import { DEFAULT_TOOLS, UNPARSABLE_ARGUMENTS_RESULT, dispatchTool, getToolSchema, parseToolArguments } from './tools.js';
import { log } from './utils.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_LIMITS: RunLimits = {
    maxToolCalls: 25,
    maxRateLimitHits: 30,
    maxMalformedRetries: 2,
    backoffBaseSeconds: 20,
    backoffJitterSeconds: 5,
};

export const DEFAULT_TEMPERATURE = 0.3;

export const MAX_CALLS_OUTPUT = 'Agent reached max tool calls.';

export const MALFORMED_TOOL_CALL_CORRECTION =
    'Your previous tool call was malformed. ' +
    'You MUST call tools using the provided JSON function schema; ' +
    'do NOT use XML-style <function=...> syntax. Please retry.';

export function rateLimitedOutput(hits: number): string {
    return `Agent aborted: rate limit hit ${hits} times.`;
}

/**
 * Wait after the whole pool was throttled: base * 2^(cycle-1) seconds plus a
 * jitter in [0, jitterSeconds) so parallel processes don't retry in lockstep.
 */
export function computeBackoffMs(cycle: number, baseSeconds: number, jitterSeconds: number, random: () => number = Math.random): number {
    const exponent = Math.max(0, cycle - 1);
    const seconds = baseSeconds * 2 ** exponent + random() * jitterSeconds;
    return Math.round(seconds * 1000);
}

// ─── Run Agent ───────────────────────────────────────────────────────────────

export interface RunAgentOptions {
    agent: string;
    systemPrompt: string;
    userMessage: string;
    model: string;
    pool: CredentialPool;
    projectRoot: string;
    temperature?: number;
    tools?: readonly ToolName[];
    limits?: Partial<RunLimits>;
    progress?: ProgressSink;
    transcript?: AgentLogger;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

/**
 * Drive one conversation until the model answers without tool calls, or a
 * budget runs out. Throttled requests and malformed tool-call retries never
 * consume one of the productive-call slots.
 */
export async function runAgent(options: RunAgentOptions): Promise<AgentRunResult> {
    const { agent, model, pool, projectRoot, progress, transcript } = options;
    const limits: RunLimits = { ...DEFAULT_LIMITS, ...options.limits };
    const temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    const enabledTools = options.tools ?? DEFAULT_TOOLS;
    const toolSchema = getToolSchema(enabledTools);
    const sleep = options.sleep ?? ((ms: number) => delay(ms));
    const random = options.random ?? Math.random;

    const messages: ChatMessage[] = [
        { role: 'system', content: options.systemPrompt },
        { role: 'user', content: options.userMessage },
    ];

    const report = (task: string, line?: string): void => {
        progress?.update(agent, task, line);
    };

    log('info', `[${agent}] Starting | model=${model} | keys=${pool.size} | root=${projectRoot}`);
    transcript?.write(`[user] ${options.userMessage}`);
    report('Thinking...', `[${agent}] Starting`);

    let productiveCalls = 0;
    let rateLimitHits = 0;
    let malformedRetries = 0;

    let clientIndex = 0;
    // Where the current run of throttled keys started; reaching it again means
    // every key was tried once since the last good response.
    let sweepStart = 0;
    let exhaustionCycle = 0;
    let exhaustionCycles = 0;

    const result = (status: AgentRunResult['status'], output: string): AgentRunResult => ({
        status,
        output,
        productiveCalls,
        rateLimitHits,
        malformedRetries,
        exhaustionCycles,
    });

    const handleToolCall = (call: ToolCall): string => {
        const name = call.function.name;
        const args = parseToolArguments(call.function.arguments);
        if (args === null) {
            log('error', `[${agent}] Malformed tool args for ${name}: ${call.function.arguments.slice(0, 200)}`);
            transcript?.write(`[tool:${name}] ${UNPARSABLE_ARGUMENTS_RESULT}`);
            return UNPARSABLE_ARGUMENTS_RESULT;
        }

        log('info', `[${agent}] Tool: ${name}(${Object.keys(args).join(', ')})`);
        report(`Using tool: ${name}`, `[${agent}] ${name} ${typeof args.path === 'string' ? args.path : ''}`.trimEnd());

        const outcome = dispatchTool(name, args, projectRoot, enabledTools);
        if (outcome.kind !== 'ok') {
            log('warn', `[${agent}] Rejected tool call ${name}: ${outcome.text}`);
        }
        transcript?.write(`[tool:${name}] ${outcome.text.slice(0, 500)}`);
        return outcome.text;
    };

    while (productiveCalls < limits.maxToolCalls && rateLimitHits < limits.maxRateLimitHits) {
        let reply: AssistantReply;
        try {
            reply = await pool.clientAt(clientIndex).complete({
                model,
                messages,
                tools: toolSchema,
                toolChoice: 'auto',
                temperature,
            });
            productiveCalls++;
            exhaustionCycle = 0;
            sweepStart = clientIndex;
        } catch (err) {
            if (err instanceof RateLimitError) {
                rateLimitHits++;
                const nextIndex = pool.nextAfter(clientIndex);

                if (rateLimitHits >= limits.maxRateLimitHits) {
                    // budget spent: the loop ends without another request, so no wait
                    clientIndex = nextIndex;
                    continue;
                }

                if (nextIndex === sweepStart) {
                    exhaustionCycle++;
                    exhaustionCycles++;
                    const waitMs = computeBackoffMs(
                        exhaustionCycle,
                        limits.backoffBaseSeconds,
                        limits.backoffJitterSeconds,
                        random
                    );
                    const waitText = `${(waitMs / 1000).toFixed(1)}s`;
                    log('warn', `[${agent}] All ${pool.size} key(s) exhausted (cycle ${exhaustionCycle}). Waiting ${waitText}...`);
                    report(`All keys exhausted. Waiting ${waitText}...`, `[${agent}] Pool exhausted, backing off ${waitText}`);
                    await sleep(waitMs);
                } else {
                    log(
                        'warn',
                        `[${agent}] ${pool.describe(clientIndex)} rate-limited. ` +
                            `Rotating → key [${nextIndex + 1}/${pool.size}] ` +
                            `(rate hits: ${rateLimitHits}/${limits.maxRateLimitHits})`
                    );
                    report(`Rotating → key [${nextIndex + 1}/${pool.size}]...`);
                }

                clientIndex = nextIndex;
                continue;
            }

            if (err instanceof MalformedToolCallError && malformedRetries < limits.maxMalformedRetries) {
                malformedRetries++;
                log(
                    'warn',
                    `[${agent}] Malformed tool call (attempt ${malformedRetries}/${limits.maxMalformedRetries}). Injecting correction...`
                );
                messages.push({ role: 'user', content: MALFORMED_TOOL_CALL_CORRECTION });
                transcript?.write(`[user] ${MALFORMED_TOOL_CALL_CORRECTION}`);
                continue;
            }

            throw err;
        }

        // No tool calls: the agent is done
        if (reply.toolCalls.length === 0) {
            const output = reply.content ?? '';
            log(
                'success',
                `[${agent}] Completed. Output: ${output.length} chars | calls: ${productiveCalls} | rate hits: ${rateLimitHits}`
            );
            transcript?.write(`[assistant] ${output}`);
            report('Done', `[${agent}] Completed after ${productiveCalls} call(s)`);
            return result('completed', output);
        }

        messages.push({ role: 'assistant', content: reply.content, tool_calls: reply.toolCalls });
        for (const call of reply.toolCalls) {
            messages.push({ role: 'tool', tool_call_id: call.id, content: handleToolCall(call) });
        }
    }

    if (rateLimitHits >= limits.maxRateLimitHits) {
        log('error', `[${agent}] Aborted: too many rate-limit hits (${rateLimitHits}).`);
        report('Aborted: rate limited', `[${agent}] Aborted after ${rateLimitHits} rate-limit hits`);
        return result('rate-limited', rateLimitedOutput(rateLimitHits));
    }

    log('warn', `[${agent}] Reached max tool calls (${limits.maxToolCalls}) without finishing.`);
    report('Stopped: max tool calls', `[${agent}] Reached max tool calls (${limits.maxToolCalls})`);
    return result('max-calls', MAX_CALLS_OUTPUT);
}
