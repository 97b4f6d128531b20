// ========================================
// Smart Inspection - Promise-chain Mutex
// ========================================

/**
 * Serializes async critical sections. Each caller chains onto the tail of the
 * previous one, so sections run strictly in arrival order.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
        const result = this.tail.then(section);

        // A failed section must not wedge the queue
        this.tail = result.then(() => { }, () => { });

        return result;
    }
}
