import { describe, expect, it } from 'vitest';
import { RecordingLedDriver } from '../testing/fakes.js';
import { ALL_OFF, LedBank } from './leds.js';

describe('LedBank', () => {
    it('holds a state for the given time and then clears', async () => {
        const driver = new RecordingLedDriver({ red: false, yellow: true, green: false });
        const bank = new LedBank(driver);
        const waits: number[] = [];

        await bank.hold({ red: false, yellow: false, green: true }, 5000, async (ms) => {
            waits.push(ms);
        });

        expect(waits).toEqual([5000]);
        expect(driver.history).toEqual([
            { red: false, yellow: false, green: true },
            ALL_OFF,
        ]);
    });

    it('writes absolute states', () => {
        const driver = new RecordingLedDriver({ red: true, yellow: false, green: true });
        const bank = new LedBank(driver);

        bank.set({ red: false, yellow: true, green: false });
        bank.set({ red: false, yellow: true, green: false });

        expect(bank.read()).toEqual({ red: false, yellow: true, green: false });
        expect(driver.history).toHaveLength(2);
    });

    it('clears even when the wait is interrupted', async () => {
        const driver = new RecordingLedDriver();
        const bank = new LedBank(driver);

        await expect(bank.hold({ red: true, yellow: false, green: false }, 5000, async () => {
            throw new Error('interrupted');
        })).rejects.toThrow('interrupted');
        expect(bank.read()).toEqual({ red: false, yellow: false, green: false });
    });
});
