// ========================================
// Smart Inspection - Dataset Recorder
// ========================================
// Flies the inspection maneuver without the assistant and appends the
// classified deck samples to a growing training CSV.

import type { RunContext } from './logger.js';
import { InspectionOrchestrator, type OrchestratorOptions } from './orchestrator.js';
import type { FlightController, InspectionOutcome } from './types.js';

export type DatasetOptions = Omit<OrchestratorOptions, 'persistMode'>;

export async function recordDataset(
    flight: FlightController,
    context: RunContext,
    options: DatasetOptions,
    signal?: AbortSignal,
): Promise<InspectionOutcome> {
    const logger = context.logger.child('dataset');
    const orchestrator = new InspectionOrchestrator(flight, context, { ...options, persistMode: 'append' });

    logger.info(`Recording dataset run into ${options.csvPath}`);
    const outcome = await orchestrator.run(signal);

    if (outcome.csvPath) {
        logger.info(`Appended ${outcome.samples} samples`);
    } else {
        logger.warn(`Run produced ${outcome.samples} samples, nothing appended`);
    }
    return outcome;
}
