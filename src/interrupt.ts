// ========================================
// Smart Inspection - Operator Interruption
// ========================================

import { InterruptedError } from './errors.js';
import type { Logger } from './logger.js';

type SignalSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export interface OperatorInterrupt {
    readonly signal: AbortSignal;
    /** Same as a Ctrl-C, for sources that swallow the process signal (readline). */
    trigger(): void;
    dispose(): void;
}

/**
 * Ctrl-C aborts the returned signal once: the pending model request or flight
 * is cancelled and cleaned up. Later presses only log, so the landing is never
 * cut short by Node's default handler.
 */
export function interruptOnSigint(
    logger: Logger,
    onInterrupt: () => void = () => { },
    source: SignalSource = process,
): OperatorInterrupt {
    const controller = new AbortController();
    const trigger = () => {
        if (controller.signal.aborted) {
            logger.warn('Still shutting down, waiting for the drone to land');
            return;
        }
        logger.warn('Interrupted by operator, landing and disconnecting');
        controller.abort();
        onInterrupt();
    };
    source.on('SIGINT', trigger);
    return {
        signal: controller.signal,
        trigger,
        dispose: () => {
            source.off('SIGINT', trigger);
        },
    };
}

/**
 * Starts `step` unless `signal` has already fired, and rejects with
 * InterruptedError as soon as it fires. A step that settles after the
 * interruption is reported through `onLate` instead of being dropped.
 */
export function untilAborted<T>(
    signal: AbortSignal | undefined,
    step: () => Promise<T>,
    onLate: (err: unknown) => void,
): Promise<T> {
    if (!signal) return step();
    if (signal.aborted) return Promise.reject(new InterruptedError());

    const running = step();
    return new Promise<T>((resolve, reject) => {
        let settled = false;
        const onAbort = () => {
            if (settled) return;
            settled = true;
            reject(new InterruptedError());
        };
        signal.addEventListener('abort', onAbort, { once: true });

        running.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                if (settled) return;
                settled = true;
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                if (settled) {
                    onLate(err);
                    return;
                }
                settled = true;
                reject(err);
            },
        );
    });
}
