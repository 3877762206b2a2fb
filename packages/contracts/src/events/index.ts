// Event Contracts
// Session state, utterances and the events the session loop consumes
//
// RULES:
// - No logic
// - No helpers
// - No data access
// - Only interfaces, types, and enums

// ============================================
// DEVICE STATE
// ============================================

export type DeviceState = 'idle' | 'connecting' | 'listening' | 'speaking' | 'vision_busy';

// ============================================
// UTTERANCES
// ============================================

/**
 * `vision_answer` is the loop guard: an utterance with this origin is never
 * classified for keywords.
 */
export type UtteranceOrigin = 'user_speech' | 'vision_answer';

export interface Utterance {
    readonly text: string;
    readonly origin: UtteranceOrigin;
    readonly timestampOrdinal: number;
}

// ============================================
// VISION
// ============================================

export type VisionErrorKind = 'network' | 'timeout' | 'malformedResponse' | 'cancelled';

export interface VisionRequest {
    readonly frameBytes: Uint8Array;
    readonly promptText: string;
}

export type VisionResult =
    | { readonly success: true; readonly analysisText: string }
    | {
          readonly success: false;
          readonly analysisText: '';
          readonly errorKind: VisionErrorKind;
          readonly detail?: string;
      };

export type CameraFailureKind = 'DeviceUnavailable' | 'CaptureFailed';

/** Outcome of one episode: the analyzer's result, or a camera failure before it ran. */
export type EpisodeResult =
    | VisionResult
    | {
          readonly success: false;
          readonly analysisText: '';
          readonly errorKind: CameraFailureKind;
          readonly detail?: string;
      };

/** Failures of one episode, as the session reports them to the user. */
export type EpisodeFailure = CameraFailureKind | VisionErrorKind;

// ============================================
// SESSION EVENTS
// ============================================

export interface ConnectAttemptEvent {
    readonly type: 'connect_attempt';
    readonly attempt: number;
}

export interface ConnectedEvent {
    readonly type: 'connected';
    readonly remoteSessionId?: string;
}

export interface DisconnectedEvent {
    readonly type: 'disconnected';
    readonly reason: string;
    readonly willReconnect: boolean;
}

export interface SpeechRecognizedEvent {
    readonly type: 'speech_recognized';
    readonly utterance: Utterance;
    /** The remote service recognized this text itself and already has it. */
    readonly fromRemote?: boolean;
}

export interface UserInterruptEvent {
    readonly type: 'user_interrupt';
}

export interface VisionRequestedEvent {
    readonly type: 'vision_requested';
    readonly prompt?: string;
}

export interface VisionPipelineDoneEvent {
    readonly type: 'vision_pipeline_done';
    readonly episode: number;
    readonly result: EpisodeResult;
}

export interface SpeechPlaybackDoneEvent {
    readonly type: 'speech_playback_done';
    readonly playbackId: number;
    readonly error?: string;
}

export interface RemoteSpeechStartedEvent {
    readonly type: 'remote_speech_started';
}

export interface RemoteSpeechStoppedEvent {
    readonly type: 'remote_speech_stopped';
}

export type SessionEvent =
    | ConnectAttemptEvent
    | ConnectedEvent
    | DisconnectedEvent
    | SpeechRecognizedEvent
    | UserInterruptEvent
    | VisionRequestedEvent
    | VisionPipelineDoneEvent
    | SpeechPlaybackDoneEvent
    | RemoteSpeechStartedEvent
    | RemoteSpeechStoppedEvent;

export type SessionEventType = SessionEvent['type'];

// ============================================
// SIDE EFFECTS
// ============================================

export type ControlSignal =
    | { readonly kind: 'listen_start'; readonly mode: 'auto' }
    | { readonly kind: 'listen_stop' }
    | { readonly kind: 'abort'; readonly reason: 'user_interrupt' | 'none' };

export type NoticeCategory =
    | EpisodeFailure
    | 'SynthesisFailed'
    | 'ConnectionLost'
    | 'VisionDisabled';

export type SideEffect =
    | { readonly type: 'microphone_start' }
    | { readonly type: 'microphone_stop' }
    | { readonly type: 'send_control'; readonly signal: ControlSignal }
    | { readonly type: 'send_text'; readonly text: string }
    | { readonly type: 'camera_open' }
    | { readonly type: 'camera_close' }
    | { readonly type: 'vision_start'; readonly episode: number; readonly prompt: string }
    | { readonly type: 'vision_cancel'; readonly episode: number }
    | { readonly type: 'playback_start'; readonly playbackId: number; readonly text: string }
    | { readonly type: 'playback_stop' }
    | { readonly type: 'notice'; readonly category: NoticeCategory };
