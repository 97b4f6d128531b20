import { describe, expect, it } from 'vitest';
import { FlightLinkError } from '../errors.js';
import { ScriptedRangingDeck } from '../testing/fakes.js';
import { DroneLink, type DroneDriver } from './drone.js';

class RecordingDriver implements DroneDriver {
    readonly calls: string[] = [];
    failOpen: Error | null = null;

    async openLink(uri: string): Promise<void> {
        this.calls.push(`open ${uri}`);
        if (this.failOpen) throw this.failOpen;
    }

    async closeLink(): Promise<void> {
        this.calls.push('close');
    }

    async takeOff(heightM: number): Promise<void> {
        this.calls.push(`takeoff ${heightM}`);
    }

    async turnLeft(degrees: number): Promise<void> {
        this.calls.push(`left ${degrees}`);
    }

    async turnRight(degrees: number): Promise<void> {
        this.calls.push(`right ${degrees}`);
    }

    async land(): Promise<void> {
        this.calls.push('land');
    }

    startRanging() {
        this.calls.push('ranging');
        return new ScriptedRangingDeck([]);
    }
}

const OPTIONS = { uri: 'radio://0/80/2M/E7E7E7E7E7', flyingHeightM: 0.5 };

describe('DroneLink', () => {
    it('drives the maneuver through the driver', async () => {
        const driver = new RecordingDriver();
        const link = new DroneLink(driver, OPTIONS);

        await link.connect();
        link.openRanging();
        await link.takeOff();
        await link.turn('left', 360);
        await link.turn('right', 360);
        await link.land();
        await link.disconnect();

        expect(driver.calls).toEqual([
            'open radio://0/80/2M/E7E7E7E7E7',
            'ranging',
            'takeoff 0.5',
            'left 360',
            'right 360',
            'land',
            'close',
        ]);
    });

    it('treats connect and disconnect as idempotent', async () => {
        const driver = new RecordingDriver();
        const link = new DroneLink(driver, OPTIONS);

        await link.disconnect();
        await link.connect();
        await link.connect();
        await link.disconnect();
        await link.disconnect();

        expect(driver.calls).toEqual(['open radio://0/80/2M/E7E7E7E7E7', 'close']);
        expect(link.isConnected).toBe(false);
    });

    it('wraps a failed connect', async () => {
        const driver = new RecordingDriver();
        driver.failOpen = new Error('Crazyradio not found');
        const link = new DroneLink(driver, OPTIONS);

        const attempt = link.connect();
        await expect(attempt).rejects.toBeInstanceOf(FlightLinkError);
        await expect(attempt).rejects.toThrow('Could not open link to radio://0/80/2M/E7E7E7E7E7');
        expect(link.isConnected).toBe(false);
    });

    it('refuses to fly without a link', async () => {
        const link = new DroneLink(new RecordingDriver(), OPTIONS);

        await expect(link.takeOff()).rejects.toThrow('Cannot take off: drone link is not open');
        expect(() => link.openRanging()).toThrow(FlightLinkError);
    });
});
