// ========================================
// Smart Inspection - Errors
// ========================================

export class FlightLinkError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FlightLinkError';
    }
}

export class SensorNotConfiguredError extends Error {
    constructor(sensorName: string) {
        super(`${sensorName} sensor is not configured yet`);
        this.name = 'SensorNotConfiguredError';
    }
}

export class ModelUnavailableError extends Error {
    constructor(model: string, available: string[]) {
        super(`${model} model not available (installed: ${available.join(', ') || 'none'})`);
        this.name = 'ModelUnavailableError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class InterruptedError extends Error {
    constructor(message = 'Interrupted by operator') {
        super(message);
        this.name = 'InterruptedError';
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
