// ========================================
// Smart Inspection - Inspection Orchestrator
// ========================================

import { errorMessage, InterruptedError } from './errors.js';
import { persistLog, summarize } from './inspection-log.js';
import { untilAborted } from './interrupt.js';
import type { Logger, RunContext } from './logger.js';
import { RangingSampler, SharedRunState, type SamplerStats } from './ranging-sampler.js';
import { sleep as realSleep, type Sleep } from './sleep.js';
import type {
    FlightController,
    InspectionOutcome,
    InspectionState,
    PersistMode,
    RangingDevice,
} from './types.js';

export const REVOLUTION_DEG = 360;

type AbortedOutcome = Extract<InspectionOutcome, { status: 'aborted' }>;

export interface OrchestratorOptions {
    csvPath: string;
    persistMode?: PersistMode;
    /** Stabilization hold after take-off, between turns and before landing. */
    holdMs?: number;
    samplingIntervalMs?: number;
    sleep?: Sleep;
    now?: () => number;
}

/** Per-run resources that cleanup has to release, each at most once. */
interface RunResources {
    signal: AbortSignal | undefined;
    shared: SharedRunState;
    deck: RangingDevice | null;
    deckClosed: boolean;
    sampler: RangingSampler | null;
    airborne: boolean;
}

/**
 * Flies the fixed inspection maneuver (take off, one revolution left, one
 * revolution right, land) while a RangingSampler records the deck, then
 * reports pass/fail. run() never throws; failures come back as `aborted`.
 * Aborting the signal passed to run() takes the same cleanup path.
 */
export class InspectionOrchestrator {
    private state: InspectionState = 'idle';
    private inFlight = false;
    private readonly logger: Logger;
    private readonly sleep: Sleep;
    private readonly holdMs: number;

    constructor(
        private readonly flight: FlightController,
        private readonly context: RunContext,
        private readonly options: OrchestratorOptions,
    ) {
        this.logger = context.logger.child('inspection');
        this.sleep = options.sleep ?? realSleep;
        this.holdMs = options.holdMs ?? 1000;
    }

    get currentState(): InspectionState {
        return this.state;
    }

    get isRunning(): boolean {
        return this.inFlight;
    }

    async run(signal?: AbortSignal): Promise<InspectionOutcome> {
        if (this.inFlight) {
            this.logger.warn('Inspection requested while another one is in flight');
            return { status: 'aborted', error: 'Inspection already in progress', samples: 0, csvPath: null };
        }
        this.inFlight = true;

        const res: RunResources = {
            signal,
            shared: new SharedRunState(),
            deck: null,
            deckClosed: false,
            sampler: null,
            airborne: false,
        };

        try {
            return await this.fly(res);
        } catch (err) {
            return await this.abort(res, err);
        } finally {
            this.inFlight = false;
        }
    }

    private async fly(res: RunResources): Promise<InspectionOutcome> {
        this.transition('connecting');
        this.logger.info('Connecting with drone');
        try {
            await this.step(res, () => this.flight.connect());
        } catch (err) {
            if (err instanceof InterruptedError) this.logger.warn('Inspection interrupted before take off');
            else this.logger.error('Drone connection failed', err);
            await res.shared.requestStop();
            await this.disconnectQuietly();
            this.transition('aborted');
            return this.aborted(err, 0, null);
        }

        this.transition('taking_off');
        res.deck = this.flight.openRanging();
        // Counted as airborne from the command on, so an interrupted take-off still lands
        res.airborne = true;
        await this.step(res, () => this.flight.takeOff());
        this.logger.info('Take off');
        await this.step(res, () => this.sleep(this.holdMs));

        res.sampler = new RangingSampler(res.deck, this.context, {
            intervalMs: this.options.samplingIntervalMs,
            sleep: this.sleep,
            now: this.options.now,
        });
        res.sampler.start(res.shared);

        this.transition('sampling');
        this.logger.info('Rotating 360° counterclockwise!');
        await this.step(res, () => this.flight.turn('left', REVOLUTION_DEG));
        await this.step(res, () => this.sleep(this.holdMs));
        this.logger.info('Rotating 360° clockwise!');
        await this.step(res, () => this.flight.turn('right', REVOLUTION_DEG));

        this.transition('landing');
        await this.stopSampling(res);
        await this.step(res, () => this.sleep(this.holdMs));
        this.logger.info('Landing the drone');
        await this.flight.land();
        res.airborne = false;

        this.transition('disconnected');
        await this.flight.disconnect();

        const log = await res.shared.snapshot();
        const result = summarize(log);
        const csvPath = await persistLog(log, this.options.csvPath, this.options.persistMode);
        if (csvPath) this.logger.info(`Wrote ${log.length} samples to ${csvPath}`);
        else this.logger.warn(`Only ${log.length} samples collected, log not written`);

        this.transition('reported');
        this.logger.info(`Inspection ${result.passed ? 'passed' : 'failed'} (${result.anomalyCount} anomalies)`);
        return { status: 'reported', result, samples: log.length, csvPath };
    }

    /**
     * Stop flag, then deck, then join. The join has to finish before anything
     * lands or reads the log.
     */
    private async stopSampling(res: RunResources): Promise<SamplerStats | null> {
        await res.shared.requestStop();
        if (res.deck && !res.deckClosed) {
            res.deckClosed = true;
            res.deck.close();
        }
        const stats = res.sampler ? await res.sampler.join() : null;
        if (stats) {
            this.logger.debug(`Sampler joined after ${stats.ticks} ticks (stop seen at ${stats.stoppedAt})`);
        }
        return stats;
    }

    /** Runs one maneuver step, cut short when the run's signal fires. */
    private step<T>(res: RunResources, action: () => Promise<T>): Promise<T> {
        return untilAborted(res.signal, action, (late) => {
            this.logger.debug(`Step failed after interruption: ${errorMessage(late)}`);
        });
    }

    private aborted(err: unknown, samples: number, csvPath: string | null): AbortedOutcome {
        const outcome: AbortedOutcome = { status: 'aborted', error: errorMessage(err), samples, csvPath };
        if (err instanceof InterruptedError) outcome.interrupted = true;
        return outcome;
    }

    private async abort(res: RunResources, err: unknown): Promise<InspectionOutcome> {
        if (err instanceof InterruptedError) this.logger.warn(`Inspection interrupted while ${this.state}`);
        else this.logger.error(`Inspection failed while ${this.state}`, err);

        try {
            await this.stopSampling(res);
        } catch (stopErr) {
            this.logger.error('Could not stop ranging sampler', stopErr);
        }

        if (res.airborne) {
            try {
                await this.flight.land();
                res.airborne = false;
            } catch (landErr) {
                this.logger.error('Emergency landing failed', landErr);
            }
        }

        await this.disconnectQuietly();

        let csvPath: string | null = null;
        const log = await res.shared.snapshot();
        try {
            csvPath = await persistLog(log, this.options.csvPath, this.options.persistMode);
        } catch (writeErr) {
            this.logger.error('Could not write partial inspection log', writeErr);
        }

        this.transition('aborted');
        return this.aborted(err, log.length, csvPath);
    }

    private async disconnectQuietly(): Promise<void> {
        try {
            await this.flight.disconnect();
        } catch (err) {
            this.logger.error('Drone disconnect failed', err);
        }
    }

    private transition(next: InspectionState): void {
        this.logger.debug(`${this.state} -> ${next}`);
        this.state = next;
    }
}
