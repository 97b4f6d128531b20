// ========================================
// Smart Inspection - Prompt Builder
// ========================================

import type { LedState, SensorReading, SensorSnapshot, ToolDeclaration } from './types.js';

export const INSPECTION_TOOL_NAME = 'start_inspection';

// ========================================
// System Prompt
// ========================================
export const SYSTEM_MESSAGE = `You are an IoT assistant monitoring a room with a motion sensor and three LEDs (red, yellow, green).

Respond with JSON only:
{"message": "your helpful response", "leds": {"red_led": bool, "yellow_led": bool, "green_led": bool}, "motion_detected": bool}

RULES:
- Information queries: keep current LED states unchanged
- LED commands: update LEDs as requested
- Only ONE LED should be on at a time UNLESS the user explicitly says "all"
- Be concise and conversational
- Questions about motion sensor data: answer ONLY with MOTION DETECTED or MOTION NOT DETECTED and set motion_detected to true when motion is detected
- If the user EXPLICITLY requests a drone inspection (examples: "start drone inspection", "fly the drone", "run crazyflie inspection"), you MUST call the function ${INSPECTION_TOOL_NAME} instead of replying with JSON. Without an explicit request, DO NOT call the function.

For LED and sensor operations ALWAYS respond with valid JSON containing both "message" and "leds" fields.`;

export const INSPECTION_TOOL: ToolDeclaration = {
    type: 'function',
    function: {
        name: INSPECTION_TOOL_NAME,
        description: 'Starts a drone room inspection when the user explicitly asks for one',
        parameters: {
            type: 'object',
            properties: {},
            required: [],
        },
    },
};

/** Substrings that make the inspection tool visible for a turn. */
export const INSPECTION_TRIGGER_WORDS = ['crazyflie', 'drone', 'fly', 'inspect'] as const;

export function wantsInspectionTool(userInput: string): boolean {
    const text = userInput.toLowerCase();
    return INSPECTION_TRIGGER_WORDS.some((word) => text.includes(word));
}

const onOff = (v: boolean) => (v ? 'ON' : 'OFF');

function renderLeds(leds: LedState): string {
    return `R=${onOff(leds.red)}/Y=${onOff(leds.yellow)}/G=${onOff(leds.green)}`;
}

function renderReading(reading: SensorReading): string {
    switch (reading.kind) {
        case 'motion':
            return `Motion=${reading.detected ? 'DETECTED' : 'NOT DETECTED'}`;
        case 'climate':
            return `DHT22=${reading.temperatureC.toFixed(1)}°C/${reading.humidityPct.toFixed(1)}%`;
        case 'barometer':
            return `BMP280=${reading.temperatureC.toFixed(1)}°C/${reading.pressureHpa.toFixed(2)}hPa`;
        case 'button':
            return `Button=${reading.pressed ? 'PRESSED' : 'OFF'}`;
    }
}

/**
 * Wraps the operator's text with the current sensor and LED state so the
 * model answers against live values.
 */
export function buildStatusPrompt(snapshot: SensorSnapshot, userInput: string): string {
    const lines = [
        'STATUS:',
        renderReading({ kind: 'motion', detected: snapshot.motion }),
        ...snapshot.environment.map(renderReading),
        `LEDs: ${renderLeds(snapshot.leds)}`,
        `USER: ${userInput}`,
    ];
    return lines.join('\n');
}

const RULE = '='.repeat(60);

/** Console rendering for the `status` command. */
export function renderStatusReport(snapshot: SensorSnapshot): string[] {
    const led = (label: string, on: boolean) => `  ${label.padEnd(11)} ${on ? '●' : '○'} ${onOff(on)}`;
    return [
        '',
        RULE,
        'SYSTEM STATUS',
        RULE,
        `Motion:        ${snapshot.motion ? 'DETECTED' : 'NOT DETECTED'}`,
        ...snapshot.environment.map((r) => renderReading(r)),
        '',
        'LED Status:',
        led('Red LED:', snapshot.leds.red),
        led('Yellow LED:', snapshot.leds.yellow),
        led('Green LED:', snapshot.leds.green),
        RULE,
    ];
}

export function usageBanner(model: string): string[] {
    return [
        '',
        RULE,
        'Smart Inspection System - Interactive Mode',
        `Using Model: ${model}`,
        RULE,
        '',
        'Commands you can try:',
        '  - Turn on the yellow LED',
        '  - Turn on all LEDs',
        '  - Turn off all LEDs',
        "  - Type 'status' to see system status",
        "  - For a drone inspection without sensor check, mention 'drone', 'crazyflie' or 'fly'",
        "  - Type 'exit' or 'quit' to stop",
        RULE,
        '',
    ];
}
