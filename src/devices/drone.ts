// ========================================
// Smart Inspection - Drone Link
// ========================================

import { FlightLinkError } from '../errors.js';
import type { FlightController, RangingDevice, TurnDirection } from '../types.js';

/** Raw flight SDK surface the link wraps. */
export interface DroneDriver {
    openLink(uri: string): Promise<void>;
    closeLink(): Promise<void>;
    takeOff(heightM: number): Promise<void>;
    turnLeft(degrees: number): Promise<void>;
    turnRight(degrees: number): Promise<void>;
    land(): Promise<void>;
    startRanging(): RangingDevice;
}

export interface DroneLinkOptions {
    uri: string;
    flyingHeightM: number;
}

/**
 * Connection lifecycle around a drone driver. connect() and disconnect() are
 * no-ops when already in the requested state.
 */
export class DroneLink implements FlightController {
    private connected = false;

    constructor(
        private readonly driver: DroneDriver,
        private readonly options: DroneLinkOptions,
    ) { }

    get isConnected(): boolean {
        return this.connected;
    }

    async connect(): Promise<void> {
        if (this.connected) return;
        try {
            await this.driver.openLink(this.options.uri);
        } catch (err) {
            throw new FlightLinkError(`Could not open link to ${this.options.uri}`, { cause: err });
        }
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        if (!this.connected) return;
        // Flag first: a failing close still leaves the link unusable
        this.connected = false;
        await this.driver.closeLink();
    }

    async takeOff(): Promise<void> {
        this.requireLink('take off');
        await this.driver.takeOff(this.options.flyingHeightM);
    }

    async turn(direction: TurnDirection, degrees: number): Promise<void> {
        this.requireLink('turn');
        if (direction === 'left') await this.driver.turnLeft(degrees);
        else await this.driver.turnRight(degrees);
    }

    async land(): Promise<void> {
        this.requireLink('land');
        await this.driver.land();
    }

    openRanging(): RangingDevice {
        this.requireLink('start ranging deck');
        return this.driver.startRanging();
    }

    private requireLink(action: string): void {
        if (!this.connected) {
            throw new FlightLinkError(`Cannot ${action}: drone link is not open`);
        }
    }
}
