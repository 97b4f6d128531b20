// ========================================
// Smart Inspection - Sensor Gateway
// ========================================

import { SensorNotConfiguredError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { LedDriver, SensorKind, SensorReading, SensorSnapshot } from '../types.js';

type ReadingOf<K extends SensorKind> = Extract<SensorReading, { kind: K }>;

// Driver contracts: what the hardware shims must provide
export interface MotionDriver {
    waitForMotion(timeoutSeconds: number): Promise<boolean>;
}

export interface ClimateDriver {
    read(): { temperatureC: number; humidityPct: number };
}

export interface BarometerDriver {
    read(): { temperatureC: number; pressureHpa: number };
}

export interface ButtonDriver {
    isPressed(): boolean;
}

/**
 * Common read contract for every physical sensor. configure() runs the
 * hardware setup exactly once; reading before a successful configure throws.
 */
export abstract class Sensor<K extends SensorKind = SensorKind> {
    private configured = false;

    constructor(
        readonly name: string,
        protected readonly logger: Logger,
    ) { }

    get isConfigured(): boolean {
        return this.configured;
    }

    configure(): boolean {
        if (this.configured) {
            this.logger.warn(`${this.name} already configured`);
            return true;
        }

        try {
            this.setup();
            this.configured = true;
        } catch (err) {
            this.logger.error(`Error while setting up ${this.name}`, err);
        }
        return this.configured;
    }

    async read(): Promise<ReadingOf<K>> {
        if (!this.configured) throw new SensorNotConfiguredError(this.name);
        return this.sample();
    }

    protected abstract setup(): void;
    protected abstract sample(): Promise<ReadingOf<K>>;
}

export class MotionSensor extends Sensor<'motion'> {
    private driver: MotionDriver | null = null;

    constructor(
        logger: Logger,
        private readonly openDriver: () => MotionDriver,
        private readonly timeoutSeconds: number = 5,
        name = 'PIR HC-SR501',
    ) {
        super(name, logger);
    }

    protected setup(): void {
        this.driver = this.openDriver();
    }

    protected async sample(): Promise<ReadingOf<'motion'>> {
        if (!this.driver) throw new SensorNotConfiguredError(this.name);
        const detected = await this.driver.waitForMotion(this.timeoutSeconds);
        return { kind: 'motion', detected };
    }
}

export class ClimateSensor extends Sensor<'climate'> {
    private driver: ClimateDriver | null = null;

    constructor(logger: Logger, private readonly openDriver: () => ClimateDriver, name = 'DHT22') {
        super(name, logger);
    }

    protected setup(): void {
        this.driver = this.openDriver();
    }

    protected async sample(): Promise<ReadingOf<'climate'>> {
        if (!this.driver) throw new SensorNotConfiguredError(this.name);
        return { kind: 'climate', ...this.driver.read() };
    }
}

export class BarometerSensor extends Sensor<'barometer'> {
    private driver: BarometerDriver | null = null;

    constructor(logger: Logger, private readonly openDriver: () => BarometerDriver, name = 'BMP280') {
        super(name, logger);
    }

    protected setup(): void {
        this.driver = this.openDriver();
    }

    protected async sample(): Promise<ReadingOf<'barometer'>> {
        if (!this.driver) throw new SensorNotConfiguredError(this.name);
        return { kind: 'barometer', ...this.driver.read() };
    }
}

export class ButtonSensor extends Sensor<'button'> {
    private driver: ButtonDriver | null = null;

    constructor(logger: Logger, private readonly openDriver: () => ButtonDriver, name = 'Button') {
        super(name, logger);
    }

    protected setup(): void {
        this.driver = this.openDriver();
    }

    protected async sample(): Promise<ReadingOf<'button'>> {
        if (!this.driver) throw new SensorNotConfiguredError(this.name);
        return { kind: 'button', pressed: this.driver.isPressed() };
    }
}

export type EnvironmentSensor = ClimateSensor | BarometerSensor | ButtonSensor;

/**
 * Snapshot provider for the dialogue loop: motion, any configured environment
 * sensors, and the LED bank state.
 */
export class SensorGateway {
    constructor(
        private readonly motion: MotionSensor,
        private readonly leds: Pick<LedDriver, 'read'>,
        private readonly environment: EnvironmentSensor[] = [],
    ) { }

    configure(): void {
        this.motion.configure();
        for (const sensor of this.environment) sensor.configure();
    }

    async snapshot(): Promise<SensorSnapshot> {
        const motion = await this.motion.read();
        const environment: SensorReading[] = [];
        for (const sensor of this.environment) {
            if (sensor.isConfigured) environment.push(await sensor.read());
        }
        return { motion: motion.detected, environment, leds: this.leds.read() };
    }
}
