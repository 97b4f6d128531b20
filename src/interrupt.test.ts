import { EventEmitter } from 'events';
import { describe, expect, it, vi } from 'vitest';
import { InterruptedError } from './errors.js';
import { interruptOnSigint, untilAborted } from './interrupt.js';
import { nextTick, quietContext } from './testing/fakes.js';

describe('untilAborted', () => {
    it('passes the result through when nothing interrupts', async () => {
        const controller = new AbortController();
        await expect(untilAborted(controller.signal, async () => 42, vi.fn())).resolves.toBe(42);
        await expect(untilAborted(undefined, async () => 'no signal', vi.fn())).resolves.toBe('no signal');
    });

    it('does not start the step once interrupted', async () => {
        const controller = new AbortController();
        controller.abort();
        const step = vi.fn(async () => 1);

        await expect(untilAborted(controller.signal, step, vi.fn())).rejects.toBeInstanceOf(InterruptedError);
        expect(step).not.toHaveBeenCalled();
    });

    it('rejects as soon as the signal fires and reports a late failure', async () => {
        const controller = new AbortController();
        let fail: (err: Error) => void = () => { };
        const onLate = vi.fn();

        const pending = untilAborted(
            controller.signal,
            () => new Promise<void>((_resolve, reject) => {
                fail = reject;
            }),
            onLate,
        );
        controller.abort();
        await expect(pending).rejects.toThrow('Interrupted by operator');

        fail(new Error('link lost'));
        await nextTick(0);
        expect(onLate).toHaveBeenCalledWith(new Error('link lost'));
    });

    it('keeps a step failure that happened first', async () => {
        const controller = new AbortController();

        await expect(untilAborted(controller.signal, async () => {
            throw new Error('motor fault');
        }, vi.fn())).rejects.toThrow('motor fault');
    });
});

describe('interruptOnSigint', () => {
    it('aborts once and only logs later presses', () => {
        const lines: string[] = [];
        const source = new EventEmitter();
        const onInterrupt = vi.fn();
        const interrupt = interruptOnSigint(quietContext(lines).logger, onInterrupt, source);

        source.emit('SIGINT');
        source.emit('SIGINT');

        expect(interrupt.signal.aborted).toBe(true);
        expect(onInterrupt).toHaveBeenCalledTimes(1);
        expect(lines.map((l) => l.slice(l.indexOf('[')))).toEqual([
            '[WARN] Interrupted by operator, landing and disconnecting',
            '[WARN] Still shutting down, waiting for the drone to land',
        ]);
    });

    it('accepts a forwarded interrupt and stops listening once disposed', () => {
        const source = new EventEmitter();
        const interrupt = interruptOnSigint(quietContext().logger, undefined, source);

        interrupt.trigger();
        interrupt.dispose();

        expect(interrupt.signal.aborted).toBe(true);
        expect(source.listenerCount('SIGINT')).toBe(0);
    });
});
