// ========================================
// Smart Inspection - Dialogue Engine
// ========================================

import type { LedBank } from './devices/leds.js';
import type { SensorGateway } from './devices/sensors.js';
import { errorMessage, InterruptedError } from './errors.js';
import { DialogueHistory } from './history.js';
import { untilAborted } from './interrupt.js';
import type { Logger, RunContext } from './logger.js';
import type { InspectionOrchestrator } from './orchestrator.js';
import type { OperatorConsole } from './operator-console.js';
import { parseModelReply } from './parser.js';
import {
    INSPECTION_TOOL,
    INSPECTION_TOOL_NAME,
    SYSTEM_MESSAGE,
    buildStatusPrompt,
    renderStatusReport,
    usageBanner,
    wantsInspectionTool,
} from './prompt-builder.js';
import { sleep as realSleep, type Sleep } from './sleep.js';
import type { ChatBackend, ChatReply, LedState } from './types.js';

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['exit', 'quit', 'q']);
export const STATUS_COMMAND = 'status';
export const CONFIRM_PROMPT = 'Motion detected: Start drone inspection? (Y/N): ';

const PASS_SIGNAL: LedState = { red: false, yellow: false, green: true };
const FAIL_SIGNAL: LedState = { red: true, yellow: false, green: false };

export type TurnResult = 'continue' | 'exit';

export interface DialogueEngineDeps {
    context: RunContext;
    chat: ChatBackend;
    sensors: Pick<SensorGateway, 'snapshot'>;
    leds: LedBank;
    orchestrator: Pick<InspectionOrchestrator, 'run'>;
    console: OperatorConsole;
    modelName?: string;
    /** How long the pass/fail LED stays lit after an inspection. */
    signalMs?: number;
    sleep?: Sleep;
    /** Operator interruption: cancels the pending model request or flight and ends the loop. */
    signal?: AbortSignal;
}

/**
 * Turn-based loop between the operator and the model. Each turn is handled to
 * completion (including any drone flight) before the next line is read.
 */
export class DialogueEngine {
    readonly history = new DialogueHistory(SYSTEM_MESSAGE);
    private readonly logger: Logger;
    private readonly signalMs: number;
    private readonly sleep: Sleep;

    constructor(private readonly deps: DialogueEngineDeps) {
        this.logger = deps.context.logger.child('dialogue');
        this.signalMs = deps.signalMs ?? 5000;
        this.sleep = deps.sleep ?? realSleep;
    }

    async run(): Promise<void> {
        for (const line of usageBanner(this.deps.modelName ?? this.deps.chat.name)) {
            this.deps.console.print(line);
        }
        await this.preload();

        while (!this.interrupted) {
            const line = await this.deps.console.ask('You: ');
            if (line === null) break;
            if (await this.handleInput(line) === 'exit') break;
        }

        this.deps.console.print('\nExiting interactive mode. Goodbye!');
    }

    /** Throwaway request so the first real turn does not pay the model load time. */
    async preload(): Promise<boolean> {
        const model = this.deps.modelName ?? this.deps.chat.name;
        this.deps.console.print(`Pre-loading model ${model}...`);
        try {
            await this.deps.chat.chat({ messages: [{ role: 'user', content: 'hi' }] });
            this.deps.console.print(`Model ${model} loaded successfully!\n`);
            return true;
        } catch (err) {
            this.logger.warn(`Could not pre-load model: ${errorMessage(err)}`);
            this.deps.console.print('Model will load on first use.\n');
            return false;
        }
    }

    private get interrupted(): boolean {
        return this.deps.signal?.aborted ?? false;
    }

    async handleInput(raw: string): Promise<TurnResult> {
        const input = raw.trim();
        if (!input) return 'continue';

        const command = input.toLowerCase();
        if (EXIT_COMMANDS.has(command)) return 'exit';
        if (command === STATUS_COMMAND) {
            await this.showStatus();
            return 'continue';
        }

        try {
            await this.converse(input);
        } catch (err) {
            this.logger.error('Turn failed', err);
        } finally {
            this.history.compact();
        }
        return 'continue';
    }

    private async converse(input: string): Promise<void> {
        const tools = wantsInspectionTool(input) ? [INSPECTION_TOOL] : undefined;
        this.history.append('user', await this.withStatus(input));

        this.deps.console.print('Assistant: [Thinking...]');
        let reply: ChatReply;
        try {
            reply = await untilAborted(
                this.deps.signal,
                () => this.deps.chat.chat({ messages: this.history.toRequestMessages(), tools }),
                (late) => this.logger.debug(`Model request failed after interruption: ${errorMessage(late)}`),
            );
        } catch (err) {
            this.history.withdrawLastUser();
            if (err instanceof InterruptedError) {
                this.logger.warn('Model request interrupted');
                return;
            }
            this.logger.error('Model request failed', err);
            this.deps.console.print('Assistant: The model did not answer, please try again.');
            return;
        }

        if (reply.kind === 'tool_call') {
            if (reply.name === INSPECTION_TOOL_NAME && tools) {
                this.deps.console.print('Assistant: Initiating drone inspection...');
                await this.inspect();
            } else {
                this.logger.warn(`Model called ${reply.name}, which was not offered this turn`);
                this.deps.console.print(`Assistant: I cannot run "${reply.name}".`);
            }
            return;
        }

        const parsed = parseModelReply(reply.content);
        if (!parsed.ok) {
            this.logger.warn(`Could not parse model response (${parsed.error}): ${reply.content}`);
        }
        const { instruction } = parsed;

        // LEDs go out before any confirmation question
        if (instruction.leds) this.deps.leds.set(instruction.leds);
        this.history.append('assistant', reply.content);
        this.deps.console.print(`Assistant: ${instruction.message}`);

        if (instruction.motionDetected === true) {
            const answer = await this.deps.console.ask(CONFIRM_PROMPT);
            if (answer?.trim().toUpperCase() === 'Y') {
                await this.inspect();
            }
        }
    }

    /** Status preamble + user text; the raw text if the sensors cannot be read. */
    private async withStatus(input: string): Promise<string> {
        try {
            const snapshot = await this.deps.sensors.snapshot();
            return buildStatusPrompt(snapshot, input);
        } catch (err) {
            this.logger.error('Unable to read sensors, sending plain input', err);
            return input;
        }
    }

    private async showStatus(): Promise<void> {
        try {
            const snapshot = await this.deps.sensors.snapshot();
            for (const line of renderStatusReport(snapshot)) this.deps.console.print(line);
        } catch (err) {
            this.logger.error('Unable to read system status', err);
        }
    }

    private async inspect(): Promise<void> {
        const outcome = await this.deps.orchestrator.run(this.deps.signal);
        if (outcome.status === 'aborted' && outcome.interrupted) {
            this.logger.warn('Drone inspection interrupted, result signal skipped');
            this.deps.console.print('Assistant: Drone inspection interrupted.');
            return;
        }
        if (outcome.status === 'aborted') {
            this.logger.error(`Drone inspection error: ${outcome.error}`);
            this.deps.console.print(`Assistant: Drone inspection aborted (${outcome.error}).`);
            return;
        }

        const { passed, anomalyCount } = outcome.result;
        this.deps.console.print(
            `Assistant: Inspection ${passed ? 'passed' : 'failed'} with ${anomalyCount} ${anomalyCount === 1 ? 'anomaly' : 'anomalies'}.`,
        );
        if (this.interrupted) {
            this.logger.warn('Interrupted after landing, result signal skipped');
            return;
        }
        await this.deps.leds.hold(passed ? PASS_SIGNAL : FAIL_SIGNAL, this.signalMs, this.sleep);
    }
}
