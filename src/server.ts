import express from 'express';
import * as http from 'node:http';
import { emitter } from './lib/logger.js';
import { log } from './lib/utils.js';
import type { LogEvent, MonitorConfig, ProgressSink } from './lib/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Status Monitor
// Read-only view of the Progress Sink for a browser or curl while a run is going.
// ═══════════════════════════════════════════════════════════════════════════════

export type MonitorOptions = Pick<MonitorConfig, 'pushIntervalMs' | 'snapshotTail'>;

export function createMonitorApp(progress: ProgressSink, options: MonitorOptions): express.Express {
    const app = express();

    // ─── Snapshot ────────────────────────────────────────────────────────────

    app.get('/api/status', (_req, res) => {
        res.json(progress.snapshot(options.snapshotTail));
    });

    // ─── SSE Endpoint ────────────────────────────────────────────────────────

    app.get('/api/stream', (req, res) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
        res.flushHeaders();

        const send = (event: LogEvent) => {
            res.write(`data: ${JSON.stringify(event)}\n\n`);
        };

        const pushSnapshot = () => {
            send({
                type: 'progress',
                snapshot: progress.snapshot(options.snapshotTail),
                timestamp: new Date().toISOString(),
            });
        };

        pushSnapshot();
        const timer = setInterval(pushSnapshot, options.pushIntervalMs);
        emitter.on('log', send);

        // Clean up on client disconnect
        req.on('close', () => {
            clearInterval(timer);
            emitter.off('log', send);
        });
    });

    return app;
}

// ─── Start Server ────────────────────────────────────────────────────────────

export interface StatusServer {
    url: string;
    port: number;
    close(): Promise<void>;
}

/**
 * Bind the monitor. Resolves null when the port is already in use: the run
 * goes on without a monitor.
 */
export function startStatusServer(progress: ProgressSink, config: MonitorConfig): Promise<StatusServer | null> {
    const server = http.createServer(createMonitorApp(progress, config));

    return new Promise((resolve, reject) => {
        server.once('error', (err: NodeJS.ErrnoException) => {
            if (err.code === 'EADDRINUSE') {
                log('warn', `Status monitor port ${config.port} is in use; continuing without monitor.`);
                resolve(null);
                return;
            }
            reject(err);
        });

        server.listen(config.port, config.host, () => {
            const address = server.address();
            const port = typeof address === 'object' && address !== null ? address.port : config.port;
            const url = `http://${config.host}:${port}`;
            log('info', `Status monitor at ${url}/api/status (SSE: ${url}/api/stream)`);

            resolve({
                url,
                port,
                close: () =>
                    new Promise<void>((done, fail) => {
                        server.close((closeErr) => (closeErr ? fail(closeErr) : done()));
                        // SSE clients hold their connections open
                        server.closeAllConnections();
                    }),
            });
        });
    });
}
