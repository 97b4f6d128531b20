// ========================================
// Smart Inspection - Inspection Log
// ========================================

import path from 'path';
import fs from 'fs-extra';
import type {
    Classification,
    DistanceReading,
    DistanceSample,
    InspectionLog,
    InspectionResult,
    PersistMode,
} from './types.js';

export const ANOMALY_DISTANCE_M = 0.3;
export const FAIL_ANOMALY_COUNT = 4;
export const MIN_PERSISTED_SAMPLES = 5;

export const CSV_HEADER = ['Front', 'Back', 'Right', 'Left', 'Up', 'Status'] as const;

const STATUS_LABEL: Record<Classification, string> = {
    clear: 'Nothing detected',
    anomaly: 'Anomaly Detected',
};

/**
 * Turns a raw deck reading into a sample, or null when any channel is missing.
 */
export function toSample(reading: DistanceReading): DistanceSample | null {
    const { front, back, right, left, up } = reading;
    if (front === null || back === null || right === null || left === null || up === null) {
        return null;
    }

    const anomaly = [front, back, right, left, up].some((d) => d <= ANOMALY_DISTANCE_M);
    return { front, back, right, left, up, classification: anomaly ? 'anomaly' : 'clear' };
}

export function summarize(log: readonly DistanceSample[]): InspectionResult {
    const anomalyCount = log.filter((s) => s.classification === 'anomaly').length;
    return { anomalyCount, passed: anomalyCount < FAIL_ANOMALY_COUNT };
}

export function toCsvRow(sample: DistanceSample): string {
    return [
        sample.front,
        sample.back,
        sample.right,
        sample.left,
        sample.up,
        STATUS_LABEL[sample.classification],
    ].join(',');
}

/**
 * Writes the log as CSV when it holds more than MIN_PERSISTED_SAMPLES rows.
 * `truncate` replaces the file each run; `append` adds rows and writes the
 * header only for a new file. Returns the path written, or null when skipped.
 */
export async function persistLog(
    log: InspectionLog,
    csvPath: string,
    mode: PersistMode = 'truncate',
): Promise<string | null> {
    if (log.length <= MIN_PERSISTED_SAMPLES) return null;

    await fs.ensureDir(path.dirname(csvPath));
    const rows = log.map(toCsvRow);

    if (mode === 'append' && await fs.pathExists(csvPath)) {
        await fs.appendFile(csvPath, rows.join('\n') + '\n');
    } else {
        await fs.writeFile(csvPath, [CSV_HEADER.join(','), ...rows].join('\n') + '\n');
    }
    return csvPath;
}
