// ========================================
// Smart Inspection - Shared Types
// ========================================

// ========================================
// Ranging / Inspection
// ========================================

/** Raw five-channel reading in metres; null while a lidar is warming up or dropped a frame. */
export interface DistanceReading {
    front: number | null;
    back: number | null;
    right: number | null;
    left: number | null;
    up: number | null;
}

export type Classification = 'clear' | 'anomaly';

export interface DistanceSample {
    front: number;
    back: number;
    right: number;
    left: number;
    up: number;
    classification: Classification;
}

export type InspectionLog = DistanceSample[];

export interface InspectionResult {
    anomalyCount: number;
    passed: boolean;
}

export type InspectionState =
    | 'idle'
    | 'connecting'
    | 'taking_off'
    | 'sampling'
    | 'landing'
    | 'disconnected'
    | 'reported'
    | 'aborted';

export type InspectionOutcome =
    | {
        status: 'reported';
        result: InspectionResult;
        samples: number;
        csvPath: string | null;
    }
    | {
        status: 'aborted';
        error: string;
        samples: number;
        csvPath: string | null;
        /** Set when the operator cancelled the run. */
        interrupted?: true;
    };

export type PersistMode = 'truncate' | 'append';

// ========================================
// Devices (external collaborators)
// ========================================

export interface LedState {
    red: boolean;
    yellow: boolean;
    green: boolean;
}

export interface LedDriver {
    set(state: LedState): void;
    read(): LedState;
}

export type TurnDirection = 'left' | 'right';

export interface RangingDevice {
    read(): DistanceReading;
    close(): void;
}

export interface FlightController {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    takeOff(): Promise<void>;
    turn(direction: TurnDirection, degrees: number): Promise<void>;
    land(): Promise<void>;
    /** Ranging deck on the connected airframe; only valid after connect(). */
    openRanging(): RangingDevice;
}

export type SensorReading =
    | { kind: 'motion'; detected: boolean }
    | { kind: 'climate'; temperatureC: number; humidityPct: number }
    | { kind: 'barometer'; temperatureC: number; pressureHpa: number }
    | { kind: 'button'; pressed: boolean };

export type SensorKind = SensorReading['kind'];

export interface SensorSnapshot {
    motion: boolean;
    environment: SensorReading[];
    leds: LedState;
}

// ========================================
// Dialogue / Model
// ========================================

export type DialogueRole = 'system' | 'user' | 'assistant';

export interface DialogueMessage {
    role: DialogueRole;
    content: string;
}

export interface ToolDeclaration {
    type: 'function';
    function: {
        name: string;
        description: string;
        parameters: {
            type: 'object';
            properties: Record<string, never>;
            required: string[];
        };
    };
}

export interface ChatRequest {
    messages: DialogueMessage[];
    tools?: ToolDeclaration[];
}

export type ChatReply =
    | { kind: 'tool_call'; name: string }
    | { kind: 'text'; content: string };

export interface ChatBackend {
    name: string;
    chat(request: ChatRequest): Promise<ChatReply>;
}

export interface ModelInstruction {
    message: string;
    /** null leaves the LEDs as they are. */
    leds: LedState | null;
    motionDetected?: boolean;
}
