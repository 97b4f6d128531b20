// ========================================
// Smart Inspection - LED Bank
// ========================================

import type { Sleep } from '../sleep.js';
import type { LedDriver, LedState } from '../types.js';

export const ALL_OFF: LedState = { red: false, yellow: false, green: false };

/**
 * Actuator gateway over the red/yellow/green LEDs. set() is absolute, never a
 * delta, so repeating it is harmless.
 */
export class LedBank {
    constructor(private readonly driver: LedDriver) { }

    set(state: LedState): void {
        this.driver.set({ red: state.red, yellow: state.yellow, green: state.green });
    }

    read(): LedState {
        return this.driver.read();
    }

    off(): void {
        this.set(ALL_OFF);
    }

    /** Shows `state` for `durationMs`, then switches everything off. */
    async hold(state: LedState, durationMs: number, sleep: Sleep): Promise<void> {
        this.set(state);
        try {
            await sleep(durationMs);
        } finally {
            this.off();
        }
    }
}
