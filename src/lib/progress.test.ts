import { describe, expect, it } from 'vitest';
import { DEFAULT_LOG_CAPACITY, ProgressRecord } from './progress.js';

describe('ProgressRecord', () => {
    it('starts idle', () => {
        expect(new ProgressRecord().snapshot()).toEqual({ agent: 'Idle', task: 'Waiting...', logs: [] });
    });

    it('updates status and appends log lines', () => {
        const progress = new ProgressRecord();
        progress.update('Architect', 'Thinking...', 'started');
        progress.update('Architect', 'Using tool: read_file');

        expect(progress.snapshot()).toEqual({
            agent: 'Architect',
            task: 'Using tool: read_file',
            logs: ['started'],
        });
    });

    it('drops the oldest lines past capacity', () => {
        const progress = new ProgressRecord();
        for (let i = 1; i <= 60; i++) {
            progress.update('Developer', 'Working', `line ${i}`);
        }
        const { logs } = progress.snapshot();

        expect(logs).toHaveLength(DEFAULT_LOG_CAPACITY);
        expect(logs[0]).toBe('line 11');
        expect(logs[49]).toBe('line 60');
    });

    it('returns the requested tail as a copy', () => {
        const progress = new ProgressRecord(5);
        for (const line of ['a', 'b', 'c', 'd']) progress.update('QA Tester', 'Working', line);

        const snap = progress.snapshot(2);
        expect(snap.logs).toEqual(['c', 'd']);

        snap.logs.push('mutated');
        expect(progress.snapshot().logs).toEqual(['a', 'b', 'c', 'd']);
        expect(progress.snapshot(0).logs).toEqual([]);
    });

    it('rejects a non-positive capacity', () => {
        expect(() => new ProgressRecord(0)).toThrow(RangeError);
    });
});
