#!/usr/bin/env node
import 'dotenv/config';

import type { Server } from 'http';
import { startStatusServer } from './api.js';
import { OllamaBackend } from './backends/ollama.js';
import { loadConfig, type AppConfig } from './config.js';
import { recordDataset } from './dataset.js';
import { DialogueEngine } from './dialogue-engine.js';
import { errorMessage } from './errors.js';
import { DroneLink } from './devices/drone.js';
import { LedBank } from './devices/leds.js';
import {
    BarometerSensor,
    ButtonSensor,
    ClimateSensor,
    MotionSensor,
    SensorGateway,
} from './devices/sensors.js';
import {
    SimulatedBarometerDriver,
    SimulatedButtonDriver,
    SimulatedClimateDriver,
    SimulatedDroneDriver,
    SimulatedLedDriver,
    SimulatedMotionDriver,
} from './devices/simulated.js';
import { interruptOnSigint } from './interrupt.js';
import { createLogger, type RunContext } from './logger.js';
import { TerminalConsole } from './operator-console.js';
import { InspectionOrchestrator } from './orchestrator.js';

const USAGE = 'Usage: smart-inspection [chat|dataset]';

interface Rig {
    leds: LedBank;
    sensors: SensorGateway;
    drone: DroneLink;
}

// Hardware shims plug in here; the simulated drivers stand in for GPIO and the radio link.
function buildRig(config: AppConfig, context: RunContext): Rig {
    const leds = new LedBank(new SimulatedLedDriver());
    const motion = new MotionSensor(context.logger, () => new SimulatedMotionDriver(), config.motion.timeoutSeconds);
    const sensors = new SensorGateway(motion, leds, [
        new ClimateSensor(context.logger, () => new SimulatedClimateDriver()),
        new BarometerSensor(context.logger, () => new SimulatedBarometerDriver()),
        new ButtonSensor(context.logger, () => new SimulatedButtonDriver()),
    ]);
    sensors.configure();
    const drone = new DroneLink(new SimulatedDroneDriver(), {
        uri: config.drone.uri,
        flyingHeightM: config.drone.flyingHeightM,
    });
    return { leds, sensors, drone };
}

async function runChat(config: AppConfig, context: RunContext): Promise<void> {
    const rig = buildRig(config, context);
    const backend = new OllamaBackend({
        host: config.llm.host,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutMs,
    });
    await backend.ensureModelAvailable();

    const orchestrator = new InspectionOrchestrator(rig.drone, context, {
        csvPath: config.inspection.csvPath,
        holdMs: config.inspection.holdMs,
        samplingIntervalMs: config.inspection.samplingIntervalMs,
    });

    let server: Server | null = null;
    if (config.statusApi.port !== null) {
        server = await startStatusServer(
            { sensors: rig.sensors, orchestrator, logger: context.logger },
            config.statusApi.port,
        );
    }

    const interrupt = interruptOnSigint(context.logger, () => operator.close());
    const operator = new TerminalConsole(process.stdin, process.stdout, interrupt.trigger);

    const engine = new DialogueEngine({
        context,
        chat: backend,
        sensors: rig.sensors,
        leds: rig.leds,
        orchestrator,
        console: operator,
        modelName: config.llm.model,
        signalMs: config.signal.durationMs,
        signal: interrupt.signal,
    });

    try {
        await engine.run();
    } finally {
        operator.close();
        try {
            await rig.drone.disconnect();
        } catch (err) {
            context.logger.error('Drone disconnect on exit failed', err);
        }
        server?.close();
        interrupt.dispose();
    }
}

async function runDataset(config: AppConfig, context: RunContext): Promise<void> {
    const rig = buildRig(config, context);
    const interrupt = interruptOnSigint(context.logger);
    try {
        const outcome = await recordDataset(rig.drone, context, {
            csvPath: config.inspection.datasetCsvPath,
            holdMs: config.inspection.holdMs,
            samplingIntervalMs: config.inspection.samplingIntervalMs,
        }, interrupt.signal);
        if (outcome.status === 'aborted' && !outcome.interrupted) process.exitCode = 1;
    } finally {
        interrupt.dispose();
    }
}

async function main(): Promise<void> {
    const config = loadConfig();
    const context: RunContext = { logger: createLogger({ level: config.logLevel }) };
    const mode = process.argv[2] ?? 'chat';

    if (mode === 'chat') await runChat(config, context);
    else if (mode === 'dataset') await runDataset(config, context);
    else {
        console.error(USAGE);
        process.exitCode = 2;
    }
}

main().catch((err) => {
    console.error(`[FAIL] Smart inspection stopped: ${errorMessage(err)}`);
    process.exit(1);
});
