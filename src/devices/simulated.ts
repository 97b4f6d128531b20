// ========================================
// Smart Inspection - Simulated Drivers
// ========================================
// In-process stand-ins used when no hardware is attached.

import { sleep as realSleep, type Sleep } from '../sleep.js';
import type { DistanceReading, LedDriver, LedState, RangingDevice } from '../types.js';
import type { DroneDriver } from './drone.js';
import type { BarometerDriver, ButtonDriver, ClimateDriver, MotionDriver } from './sensors.js';

type Random = () => number;

export class SimulatedLedDriver implements LedDriver {
    private state: LedState = { red: false, yellow: false, green: false };

    set(state: LedState): void {
        this.state = { ...state };
    }

    read(): LedState {
        return { ...this.state };
    }
}

export class SimulatedMotionDriver implements MotionDriver {
    constructor(
        private readonly probability = 0.2,
        private readonly random: Random = Math.random,
    ) { }

    async waitForMotion(_timeoutSeconds: number): Promise<boolean> {
        return this.random() < this.probability;
    }
}

export class SimulatedClimateDriver implements ClimateDriver {
    constructor(private readonly random: Random = Math.random) { }

    read() {
        return {
            temperatureC: 21 + this.random() * 3,
            humidityPct: 40 + this.random() * 15,
        };
    }
}

export class SimulatedBarometerDriver implements BarometerDriver {
    constructor(private readonly random: Random = Math.random) { }

    read() {
        return {
            temperatureC: 21 + this.random() * 3,
            pressureHpa: 1013.25 + (this.random() - 0.5) * 4,
        };
    }
}

export class SimulatedButtonDriver implements ButtonDriver {
    isPressed(): boolean {
        return false;
    }
}

/**
 * Ranging deck that reports nothing for its first `warmupReads` reads, then
 * random distances between 0.1 m and 3 m.
 */
export class SimulatedRangingDeck implements RangingDevice {
    private reads = 0;
    private closed = false;

    constructor(
        private readonly random: Random = Math.random,
        private readonly warmupReads = 2,
    ) { }

    read(): DistanceReading {
        this.reads += 1;
        if (this.closed || this.reads <= this.warmupReads) {
            return { front: null, back: null, right: null, left: null, up: null };
        }
        const next = () => Number((0.1 + this.random() * 2.9).toFixed(3));
        return { front: next(), back: next(), right: next(), left: next(), up: next() };
    }

    close(): void {
        this.closed = true;
    }
}

/** Drone whose moves take a fixed wall-clock time per 360°. */
export class SimulatedDroneDriver implements DroneDriver {
    constructor(
        private readonly msPerRevolution = 4000,
        private readonly sleep: Sleep = realSleep,
        private readonly random: Random = Math.random,
    ) { }

    async openLink(_uri: string): Promise<void> {
        await this.sleep(200);
    }

    async closeLink(): Promise<void> { }

    async takeOff(_heightM: number): Promise<void> {
        await this.sleep(500);
    }

    async turnLeft(degrees: number): Promise<void> {
        await this.sleep((degrees / 360) * this.msPerRevolution);
    }

    async turnRight(degrees: number): Promise<void> {
        await this.sleep((degrees / 360) * this.msPerRevolution);
    }

    async land(): Promise<void> {
        await this.sleep(500);
    }

    startRanging(): RangingDevice {
        return new SimulatedRangingDeck(this.random);
    }
}
