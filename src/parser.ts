// ========================================
// Smart Inspection - Model Reply Parser
// ========================================

import { z } from 'zod';
import type { ModelInstruction } from './types.js';

export const PARSE_FAILURE_MESSAGE = 'Error: Could not parse model response.';
export const MISSING_MESSAGE = 'No response provided.';

const LedsSchema = z.object({
    red_led: z.boolean().default(false),
    yellow_led: z.boolean().default(false),
    green_led: z.boolean().default(false),
}).default({});

const InstructionSchema = z.object({
    message: z.string().default(MISSING_MESSAGE),
    leds: LedsSchema,
    motion_detected: z.boolean().nullable().optional(),
});

/**
 * Unwrap a reply fenced as ```json ... ``` (or a bare ``` fence). Anything
 * outside the first fence is dropped; unfenced text comes back trimmed.
 */
export function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    const fenced = trimmed.match(/^```[\w-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?```/);
    if (fenced) {
        return fenced[1].trim();
    }
    return trimmed;
}

export type ParseOutcome =
    | { ok: true; instruction: ModelInstruction }
    | { ok: false; instruction: ModelInstruction; error: string };

export const FALLBACK_INSTRUCTION: ModelInstruction = {
    message: PARSE_FAILURE_MESSAGE,
    leds: null,
    motionDetected: undefined,
};

/**
 * Parse the model's JSON reply into a ModelInstruction. Never throws: a reply
 * that is not JSON, or has wrongly typed fields, yields FALLBACK_INSTRUCTION.
 */
export function parseModelReply(raw: string): ParseOutcome {
    const body = stripCodeFence(raw);

    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (e) {
        return { ok: false, instruction: { ...FALLBACK_INSTRUCTION }, error: e instanceof Error ? e.message : String(e) };
    }

    const parsed = InstructionSchema.safeParse(json);
    if (!parsed.success) {
        const error = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        return { ok: false, instruction: { ...FALLBACK_INSTRUCTION }, error };
    }

    const { message, leds, motion_detected } = parsed.data;
    return {
        ok: true,
        instruction: {
            message,
            leds: { red: leds.red_led, yellow: leds.yellow_led, green: leds.green_led },
            motionDetected: motion_detected ?? undefined,
        },
    };
}
