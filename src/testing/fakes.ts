// ========================================
// Smart Inspection - Test Doubles
// ========================================

import { createLogger, type Logger, type RunContext } from '../logger.js';
import type { OperatorConsole } from '../operator-console.js';
import type { Sleep } from '../sleep.js';
import type {
    ChatBackend,
    ChatReply,
    ChatRequest,
    DistanceReading,
    FlightController,
    LedDriver,
    LedState,
    RangingDevice,
    TurnDirection,
} from '../types.js';

/** Yields to the event loop once, so concurrent loops interleave without real delays. */
export const nextTick: Sleep = () => new Promise((resolve) => setImmediate(resolve));

export function quietContext(lines: string[] = []): RunContext {
    const logger: Logger = createLogger({
        level: 'debug',
        sink: {
            log: (line) => lines.push(line),
            error: (line) => lines.push(line),
        },
    });
    return { logger };
}

export const EMPTY_READING: DistanceReading = { front: null, back: null, right: null, left: null, up: null };

export function reading(front: number, rest = 1.0): DistanceReading {
    return { front, back: rest, right: rest, left: rest, up: rest };
}

/**
 * Replays a fixed list of readings, then reports empty readings. `drained`
 * resolves once the last scripted reading has been handed out.
 */
export class ScriptedRangingDeck implements RangingDevice {
    readonly drained: Promise<void>;
    closed = false;
    reads = 0;
    private markDrained: () => void = () => { };
    private index = 0;

    constructor(
        private readonly script: Array<DistanceReading | Error>,
        private readonly events: string[] = [],
    ) {
        this.drained = new Promise((resolve) => {
            this.markDrained = resolve;
        });
        if (script.length === 0) this.markDrained();
    }

    read(): DistanceReading {
        this.reads += 1;
        this.events.push('read');
        if (this.index >= this.script.length) return EMPTY_READING;

        const next = this.script[this.index];
        this.index += 1;
        if (this.index === this.script.length) this.markDrained();
        if (next instanceof Error) throw next;
        return next;
    }

    close(): void {
        this.closed = true;
        this.events.push('close');
    }
}

export type FlightStep = 'connect' | 'takeoff' | 'turn:left' | 'turn:right' | 'land' | 'disconnect';

/**
 * Flight controller that records every command. The right-hand turn waits for
 * the deck to drain so a run always sees the whole script.
 */
export class FakeFlight implements FlightController {
    connected = false;
    private failures = new Map<FlightStep, Error>();
    private pauses = new Map<FlightStep, () => void>();

    constructor(
        readonly deck: ScriptedRangingDeck,
        readonly events: string[] = [],
    ) { }

    failOn(step: FlightStep, error = new Error(`${step} failed`)): this {
        this.failures.set(step, error);
        return this;
    }

    /** The step never completes; the returned promise resolves once it is reached. */
    pauseOn(step: FlightStep): Promise<void> {
        return new Promise((resolve) => this.pauses.set(step, resolve));
    }

    async connect(): Promise<void> {
        await this.step('connect');
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        if (!this.connected) return;
        this.connected = false;
        await this.step('disconnect');
    }

    async takeOff(): Promise<void> {
        await this.step('takeoff');
    }

    async turn(direction: TurnDirection, degrees: number): Promise<void> {
        await this.step(`turn:${direction}`);
        if (degrees !== 360) throw new Error(`unexpected turn of ${degrees}`);
        if (direction === 'right') await this.deck.drained;
    }

    async land(): Promise<void> {
        await this.step('land');
    }

    openRanging(): RangingDevice {
        return this.deck;
    }

    private async step(step: FlightStep): Promise<void> {
        this.events.push(step);
        const failure = this.failures.get(step);
        if (failure) throw failure;
        const reached = this.pauses.get(step);
        if (reached) {
            reached();
            await new Promise<void>(() => { });
        }
    }
}

export class RecordingLedDriver implements LedDriver {
    readonly history: LedState[] = [];
    private state: LedState;

    constructor(initial: LedState = { red: false, yellow: false, green: false }) {
        this.state = { ...initial };
    }

    set(state: LedState): void {
        this.state = { ...state };
        this.history.push({ ...state });
    }

    read(): LedState {
        return { ...this.state };
    }
}

/** Chat backend answering from a queue of replies (or errors). */
export class FakeChat implements ChatBackend {
    readonly name = 'fake-model';
    readonly requests: ChatRequest[] = [];

    constructor(private readonly replies: Array<ChatReply | Error> = []) { }

    push(reply: ChatReply | Error): this {
        this.replies.push(reply);
        return this;
    }

    async chat(request: ChatRequest): Promise<ChatReply> {
        this.requests.push({
            messages: request.messages.map((m) => ({ ...m })),
            tools: request.tools,
        });
        const next = this.replies.shift();
        if (next === undefined) throw new Error('no scripted reply');
        if (next instanceof Error) throw next;
        return next;
    }
}

export class FakeConsole implements OperatorConsole {
    readonly printed: string[] = [];
    readonly asked: string[] = [];
    closed = false;

    constructor(private readonly answers: string[] = []) { }

    async ask(question: string): Promise<string | null> {
        this.asked.push(question);
        return this.answers.shift() ?? null;
    }

    print(line: string): void {
        this.printed.push(line);
    }

    close(): void {
        this.closed = true;
    }
}

export function textReply(payload: unknown): ChatReply {
    return { kind: 'text', content: JSON.stringify(payload) };
}

export function ledReply(message: string, leds: LedState, motion = false): ChatReply {
    return textReply({
        message,
        leds: { red_led: leds.red, yellow_led: leds.yellow, green_led: leds.green },
        motion_detected: motion,
    });
}
