// ========================================
// Smart Inspection - Dialogue History
// ========================================

import type { DialogueMessage } from './types.js';

export const MAX_HISTORY = 9;
export const KEPT_RECENT = 8;

/**
 * Conversation buffer that always starts with one system message. compact()
 * drops everything but the system message and the last KEPT_RECENT entries
 * once the buffer grows past MAX_HISTORY; dropped messages are gone for good.
 */
export class DialogueHistory {
    private entries: DialogueMessage[];

    constructor(systemPrompt: string) {
        this.entries = [{ role: 'system', content: systemPrompt }];
    }

    get length(): number {
        return this.entries.length;
    }

    get messages(): readonly DialogueMessage[] {
        return this.entries;
    }

    append(role: 'user' | 'assistant', content: string): void {
        this.entries.push({ role, content });
    }

    /** Removes the newest entry if it is a user message (a turn that never got a reply). */
    withdrawLastUser(): boolean {
        const last = this.entries[this.entries.length - 1];
        if (this.entries.length > 1 && last.role === 'user') {
            this.entries.pop();
            return true;
        }
        return false;
    }

    compact(): void {
        if (this.entries.length > MAX_HISTORY) {
            this.entries = [this.entries[0], ...this.entries.slice(-KEPT_RECENT)];
        }
    }

    toRequestMessages(): DialogueMessage[] {
        return this.entries.map((m) => ({ ...m }));
    }
}
