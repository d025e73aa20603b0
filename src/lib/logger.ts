import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LogEvent, LogLevel } from './types.js';

// ─── Event Emitter for SSE Broadcasting ───────────────────────────────────────

export const emitter = new EventEmitter();

// One listener per connected monitor client
emitter.setMaxListeners(100);

export function broadcast(event: LogEvent): void {
    emitter.emit('log', event);
}

export function broadcastLog(level: LogLevel, message: string): void {
    broadcast({
        type: 'system',
        level,
        message,
        timestamp: new Date().toISOString(),
    });
}

// ─── Log File Mirror ──────────────────────────────────────────────────────────

let _logFile: string | null = null;

/** Mirror every system log line into `file`; null detaches. */
export function attachLogFile(file: string | null): void {
    if (file) {
        fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    }
    _logFile = file;
}

export function appendToLogFile(line: string): void {
    if (!_logFile) return;
    fs.appendFileSync(_logFile, line + '\n', 'utf-8');
}

// ─── Agent Logger ─────────────────────────────────────────────────────────────

export interface AgentLogger {
    logFile: string;
    write(text: string): void;
    close(): Promise<void>;
}

export function createAgentLogger(logsDir: string, agentName: string, invocationId: string): AgentLogger {
    fs.mkdirSync(logsDir, { recursive: true });

    // logs/2024-01-15T10-30-45-project-manager.log
    const logFile = path.join(logsDir, `${invocationId}-${toFileSlug(agentName)}.log`);
    const writeStream = fs.createWriteStream(logFile, { flags: 'a' });

    return {
        logFile,
        write(text: string): void {
            writeStream.write(text.endsWith('\n') ? text : text + '\n');

            broadcast({
                type: 'agent',
                agent: agentName,
                invocationId,
                message: text,
                timestamp: new Date().toISOString(),
            });
        },
        close(): Promise<void> {
            return new Promise((resolve, reject) => {
                writeStream.once('error', reject);
                writeStream.end(() => resolve());
            });
        },
    };
}

function toFileSlug(name: string): string {
    return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'agent';
}

// ─── Generate Invocation ID ──────────────────────────────────────────────────

export function generateInvocationId(): string {
    // Format: 2024-01-15T10-30-45
    return new Date().toISOString().slice(0, 19).replace(/:/g, '-');
}
