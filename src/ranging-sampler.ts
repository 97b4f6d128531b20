// ========================================
// Smart Inspection - Ranging Sampler
// ========================================

import { toSample } from './inspection-log.js';
import type { Logger, RunContext } from './logger.js';
import { Mutex } from './mutex.js';
import { sleep as realSleep, type Sleep } from './sleep.js';
import type { DistanceSample, InspectionLog, RangingDevice } from './types.js';

/**
 * State shared between the orchestrator and the sampler task for one run:
 * the stop flag and the sample log, both behind a single mutex.
 */
export class SharedRunState {
    private readonly mutex = new Mutex();
    private readonly samples: InspectionLog = [];
    private stopRequested = false;

    requestStop(): Promise<void> {
        return this.mutex.runExclusive(() => {
            this.stopRequested = true;
        });
    }

    clearStop(): Promise<void> {
        return this.mutex.runExclusive(() => {
            this.stopRequested = false;
        });
    }

    isStopRequested(): Promise<boolean> {
        return this.mutex.runExclusive(() => this.stopRequested);
    }

    /**
     * Runs `section` only if no stop has been requested; the flag check and the
     * section share one critical section. Resolves false once stopped.
     */
    unlessStopped(section: (log: InspectionLog) => void): Promise<boolean> {
        return this.mutex.runExclusive(() => {
            if (this.stopRequested) return false;
            section(this.samples);
            return true;
        });
    }

    /** Copy of the log; taken after the sampler is joined it is the final log. */
    snapshot(): Promise<DistanceSample[]> {
        return this.mutex.runExclusive(() => [...this.samples]);
    }
}

export interface SamplerStats {
    ticks: number;
    appended: number;
    discarded: number;
    /** Value of `now()` when the loop saw the stop flag. */
    stoppedAt: number;
}

export interface RangingSamplerOptions {
    intervalMs?: number;
    sleep?: Sleep;
    now?: () => number;
}

export class RangingSampler {
    private task: Promise<SamplerStats> | null = null;
    private readonly logger: Logger;
    private readonly intervalMs: number;
    private readonly sleep: Sleep;
    private readonly now: () => number;

    constructor(
        private readonly device: RangingDevice,
        context: RunContext,
        options: RangingSamplerOptions = {},
    ) {
        this.logger = context.logger.child('sampler');
        this.intervalMs = options.intervalMs ?? 300;
        this.sleep = options.sleep ?? realSleep;
        this.now = options.now ?? Date.now;
    }

    get isStarted(): boolean {
        return this.task !== null;
    }

    start(shared: SharedRunState): void {
        if (this.task) throw new Error('Ranging sampler already started');
        this.logger.info('Starting capture data from multiranger deck');
        this.task = this.loop(shared);
    }

    /** Resolves once the loop has observed the stop flag and exited. */
    async join(): Promise<SamplerStats | null> {
        if (!this.task) return null;
        return this.task;
    }

    private async loop(shared: SharedRunState): Promise<SamplerStats> {
        const stats = { ticks: 0, appended: 0, discarded: 0 };

        while (await shared.unlessStopped((log) => {
            stats.ticks += 1;
            const sample = this.readOnce();
            if (sample) {
                log.push(sample);
                stats.appended += 1;
            } else {
                stats.discarded += 1;
            }
        })) {
            await this.sleep(this.intervalMs);
        }

        const stoppedAt = this.now();
        await shared.clearStop();
        this.logger.info(`Finish get data (${stats.appended} samples, ${stats.discarded} discarded)`);
        return { ...stats, stoppedAt };
    }

    private readOnce(): DistanceSample | null {
        try {
            return toSample(this.device.read());
        } catch (err) {
            // Next tick is the retry
            this.logger.debug(`Ranging read skipped: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }
    }
}
