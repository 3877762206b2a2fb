// Control Contracts
// Request/response shapes for the local control surface
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

import type { DeviceState } from '../events/index.js';

export interface SessionStatus {
    readonly sessionId: string;
    readonly state: DeviceState;
    readonly connected: boolean;
    readonly visionEnabled: boolean;
    readonly activeEpisode: number | null;
    readonly cameraOpen: boolean;
    readonly startedAt: number;
    readonly recentAlerts: readonly AlertRecord[];
}

export interface AlertRecord {
    readonly title: string;
    readonly message: string;
    readonly timestamp: number;
}

export interface VisionTriggerRequest {
    readonly prompt?: string;
}

export interface TextInputRequest {
    readonly text: string;
}

export interface ControlAck {
    readonly ok: boolean;
    readonly error?: string;
}
