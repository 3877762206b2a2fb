// Protocol Contracts
// JSON messages exchanged with the remote dialogue service over the WebSocket.
// Binary frames carry audio and have no schema here.
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

export interface AudioParams {
    readonly format: 'pcm' | 'opus';
    readonly sample_rate: number;
    readonly channels: number;
    readonly frame_duration: number;
}

// ============================================
// CLIENT -> SERVER
// ============================================

export interface ClientHelloMessage {
    readonly type: 'hello';
    readonly version: number;
    readonly transport: 'websocket';
    readonly audio_params: AudioParams;
}

export interface ListenMessage {
    readonly session_id?: string;
    readonly type: 'listen';
    readonly state: 'start' | 'stop' | 'detect';
    readonly mode?: 'auto' | 'manual';
    readonly text?: string;
}

export interface AbortMessage {
    readonly session_id?: string;
    readonly type: 'abort';
    readonly reason?: 'wake_word_detected';
}

export type ClientMessage = ClientHelloMessage | ListenMessage | AbortMessage;

// ============================================
// SERVER -> CLIENT
// ============================================

export interface ServerHelloMessage {
    readonly type: 'hello';
    readonly transport?: string;
    readonly session_id?: string;
    readonly audio_params?: Partial<AudioParams>;
}

export interface SttMessage {
    readonly type: 'stt';
    readonly text: string;
    readonly session_id?: string;
}

export interface TtsMessage {
    readonly type: 'tts';
    readonly state: 'start' | 'stop' | 'sentence_start' | 'sentence_end';
    readonly text?: string;
    readonly session_id?: string;
}

export interface LlmMessage {
    readonly type: 'llm';
    readonly emotion?: string;
    readonly text?: string;
    readonly session_id?: string;
}

export type ServerMessage = ServerHelloMessage | SttMessage | TtsMessage | LlmMessage;
