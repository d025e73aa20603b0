import { afterEach, describe, expect, it } from 'vitest';
import { ProgressRecord } from './lib/progress.js';
import { startStatusServer, type StatusServer } from './server.js';

const MONITOR = { enabled: true, host: '127.0.0.1', port: 0, pushIntervalMs: 100, snapshotTail: 2 };

describe('status monitor', () => {
    const servers: StatusServer[] = [];

    async function start(progress: ProgressRecord, port = 0): Promise<StatusServer | null> {
        const server = await startStatusServer(progress, { ...MONITOR, port });
        if (server) servers.push(server);
        return server;
    }

    afterEach(async () => {
        await Promise.all(servers.splice(0).map((s) => s.close()));
    });

    it('serves the snapshot tail on /api/status', async () => {
        const progress = new ProgressRecord();
        progress.update('Architect', 'Thinking...', 'one');
        progress.update('Architect', 'Using tool: read_file', 'two');
        progress.update('Architect', 'Using tool: write_file', 'three');

        const server = await start(progress);
        if (!server) throw new Error('monitor did not start');

        const res = await fetch(`${server.url}/api/status`);
        expect(await res.json()).toEqual({
            agent: 'Architect',
            task: 'Using tool: write_file',
            logs: ['two', 'three'],
        });
    });

    it('pushes progress events on /api/stream', async () => {
        const progress = new ProgressRecord();
        progress.update('QA Tester', 'Thinking...', 'started');

        const server = await start(progress);
        if (!server) throw new Error('monitor did not start');

        const res = await fetch(`${server.url}/api/stream`);
        expect(res.headers.get('content-type')).toBe('text/event-stream');
        if (!res.body) throw new Error('no stream body');

        const reader = res.body.getReader();
        const { value } = await reader.read();
        await reader.cancel();

        const chunk = new TextDecoder().decode(value);
        const first = chunk.split('\n\n')[0] ?? '';
        expect(first.startsWith('data: ')).toBe(true);

        const event: unknown = JSON.parse(first.slice('data: '.length));
        expect(event).toMatchObject({
            type: 'progress',
            snapshot: { agent: 'QA Tester', task: 'Thinking...', logs: ['started'] },
        });
    });

    it('yields null when the port is taken', async () => {
        const progress = new ProgressRecord();
        const first = await start(progress);
        if (!first) throw new Error('monitor did not start');

        expect(await start(progress, first.port)).toBeNull();
    });
});
