// Session State Machine
// Owns DeviceState. Every transition goes through handle(), which looks up the
// (state, event) pair in a transition table and returns the side effects to run.
// No I/O happens here.

import type {
    ControlSignal,
    DeviceState,
    DisconnectedEvent,
    NoticeCategory,
    SessionEvent,
    SessionEventType,
    SideEffect,
    SpeechPlaybackDoneEvent,
    SpeechRecognizedEvent,
    VisionPipelineDoneEvent,
    VisionRequestedEvent,
} from '@glimpse/contracts';
import { IntentKind } from '../intent/IntentTypes.js';
import { KeywordMatcher, selectPrompt } from '../intent/KeywordMatcher.js';

type EventOf<T extends SessionEventType> = Extract<SessionEvent, { type: T }>;

interface Outcome {
    next: DeviceState;
    effects: SideEffect[];
}

/** `null` means the event was recognized but is stale or redundant; it is discarded. */
type Handler<T extends SessionEventType> = (event: EventOf<T>) => Outcome | null;

type StateRow = { [T in SessionEventType]?: Handler<T> };

type TransitionTable = Record<DeviceState, StateRow>;

/** Who is producing sound while in `speaking`. */
export type Speaker = 'local' | 'remote';

export interface SessionStateMachineOptions {
    matcher: KeywordMatcher;
    loopGuardMarker: string;
    defaultPrompt: string;
    visionEnabled: boolean;
    sessionId?: string;
}

export interface MachineSnapshot {
    state: DeviceState;
    activeEpisode: number | null;
    activePlayback: number | null;
    speaker: Speaker | null;
    lastForwardedVisionAnswer: string | null;
}

const LISTEN_START: SideEffect = { type: 'send_control', signal: { kind: 'listen_start', mode: 'auto' } };

function control(signal: ControlSignal): SideEffect {
    return { type: 'send_control', signal };
}

function notice(category: NoticeCategory): SideEffect {
    return { type: 'notice', category };
}

export class SessionStateMachine {
    private state: DeviceState = 'idle';
    private episodeCounter = 0;
    private activeEpisode: number | null = null;
    private playbackCounter = 0;
    private activePlayback: number | null = null;
    private speaker: Speaker | null = null;
    private lastForwardedVisionAnswer: string | null = null;
    private readonly tag: string;

    private readonly table: TransitionTable = {
        idle: {
            connect_attempt: () => this.to('connecting'),
            connected: () => this.onConnected(),
            disconnected: event => this.onDisconnected(event),
            speech_recognized: event => this.onIdleSpeech(event),
        },
        connecting: {
            connect_attempt: () => null,
            connected: () => this.onConnected(),
            disconnected: event => this.onDisconnected(event),
        },
        listening: {
            disconnected: event => this.onDisconnected(event),
            speech_recognized: event => this.onListeningSpeech(event),
            vision_requested: event => this.onVisionRequested(event),
            user_interrupt: () => this.interrupt(),
            remote_speech_started: () => {
                this.speaker = 'remote';
                return this.to('speaking');
            },
        },
        speaking: {
            disconnected: event => this.onDisconnected(event),
            speech_playback_done: event => this.onPlaybackDone(event),
            user_interrupt: () => this.interrupt(),
            remote_speech_started: () => null,
            remote_speech_stopped: () => {
                // A local vision answer keeps the floor until it finishes
                if (this.speaker !== 'remote') {
                    return null;
                }
                this.speaker = null;
                return this.to('listening', [LISTEN_START]);
            },
        },
        vision_busy: {
            disconnected: event => this.onDisconnected(event),
            vision_pipeline_done: event => this.onPipelineDone(event),
            user_interrupt: () => this.interrupt(),
        },
    };

    constructor(private readonly options: SessionStateMachineOptions) {
        this.tag = options.sessionId ? `session:${options.sessionId}` : 'session';
    }

    /**
     * Apply one event. Returns the side effects to run, in order. Combinations
     * with no table entry are logged and ignored.
     */
    handle(event: SessionEvent): SideEffect[] {
        return this.dispatch(event.type, event);
    }

    getState(): DeviceState {
        return this.state;
    }

    getSnapshot(): MachineSnapshot {
        return {
            state: this.state,
            activeEpisode: this.activeEpisode,
            activePlayback: this.activePlayback,
            speaker: this.speaker,
            lastForwardedVisionAnswer: this.lastForwardedVisionAnswer,
        };
    }

    private dispatch<T extends SessionEventType>(type: T, event: EventOf<T>): SideEffect[] {
        const row: StateRow = this.table[this.state];
        const handler: Handler<T> | undefined = row[type];
        const from = this.state;

        if (!handler) {
            console.warn(`[${this.tag}] Ignored ${type} in ${from}`);
            return [];
        }

        const outcome = handler(event);
        if (!outcome) {
            console.log(`[${this.tag}] Discarded ${type} in ${from}`);
            return [];
        }

        this.state = outcome.next;
        if (from !== outcome.next) {
            console.log(`[${this.tag}] ${from} -> ${outcome.next} (${type})`);
        }
        return outcome.effects;
    }

    private to(next: DeviceState, effects: SideEffect[] = []): Outcome {
        return { next, effects };
    }

    private onConnected(): Outcome {
        return this.to('listening', [{ type: 'microphone_start' }, LISTEN_START]);
    }

    private onDisconnected(event: DisconnectedEvent): Outcome {
        const effects: SideEffect[] = [];

        if (this.activeEpisode !== null) {
            effects.push({ type: 'vision_cancel', episode: this.activeEpisode });
            this.activeEpisode = null;
        }
        if (this.state === 'speaking' || this.activePlayback !== null) {
            effects.push({ type: 'playback_stop' });
        }
        this.activePlayback = null;
        this.speaker = null;

        if (this.state !== 'idle' && this.state !== 'connecting') {
            effects.push({ type: 'microphone_stop' }, { type: 'camera_close' });
        }
        if (!event.willReconnect) {
            effects.push(notice('ConnectionLost'));
        }
        return this.to('idle', effects);
    }

    /**
     * Only camera commands act while disconnected. A vision trigger is dropped:
     * its answer could not be forwarded to the remote side.
     */
    private onIdleSpeech(event: SpeechRecognizedEvent): Outcome | null {
        const match = this.options.matcher.match(event.utterance);
        switch (match.kind) {
            case IntentKind.CAMERA_OPEN:
                return this.to('idle', [{ type: 'camera_open' }]);
            case IntentKind.CAMERA_CLOSE:
                return this.to('idle', [{ type: 'camera_close' }]);
            default:
                return null;
        }
    }

    private onListeningSpeech(event: SpeechRecognizedEvent): Outcome | null {
        const { utterance } = event;

        // Vision answers bypass classification and go straight to the remote side
        if (utterance.origin === 'vision_answer') {
            const marked = this.markAnswer(utterance.text);
            if (marked === this.lastForwardedVisionAnswer) {
                return null;
            }
            return event.fromRemote ? null : this.to('listening', [{ type: 'send_text', text: marked }]);
        }

        const match = this.options.matcher.match(utterance);
        switch (match.kind) {
            case IntentKind.CAMERA_OPEN:
                return this.to('listening', [{ type: 'camera_open' }]);
            case IntentKind.CAMERA_CLOSE:
                return this.to('listening', [{ type: 'camera_close' }]);
            case IntentKind.VISION_TRIGGER: {
                const prompt = selectPrompt(utterance.text, match.keyword, this.options.defaultPrompt);
                // The remote service heard the request too; keep it from answering on its own
                const preamble: SideEffect[] = event.fromRemote ? [control({ kind: 'abort', reason: 'none' })] : [];
                return this.startEpisode(prompt, preamble);
            }
            case IntentKind.ORDINARY:
                return event.fromRemote ? null : this.to('listening', [{ type: 'send_text', text: utterance.text }]);
        }
    }

    private onVisionRequested(event: VisionRequestedEvent): Outcome {
        if (!this.options.visionEnabled) {
            return this.to('listening', [notice('VisionDisabled')]);
        }
        const prompt = event.prompt?.trim() || this.options.defaultPrompt;
        return this.startEpisode(prompt, []);
    }

    private startEpisode(prompt: string, preamble: SideEffect[]): Outcome {
        const episode = ++this.episodeCounter;
        this.activeEpisode = episode;
        return this.to('vision_busy', [
            ...preamble,
            control({ kind: 'listen_stop' }),
            { type: 'vision_start', episode, prompt },
        ]);
    }

    private onPipelineDone(event: VisionPipelineDoneEvent): Outcome | null {
        if (event.episode !== this.activeEpisode) {
            return null;
        }
        this.activeEpisode = null;

        const { result } = event;
        if (!result.success) {
            return this.to('listening', [notice(result.errorKind), LISTEN_START]);
        }

        const marked = this.markAnswer(result.analysisText);
        const playbackId = ++this.playbackCounter;
        this.lastForwardedVisionAnswer = marked;
        this.activePlayback = playbackId;
        this.speaker = 'local';

        return this.to('speaking', [
            { type: 'send_text', text: marked },
            { type: 'playback_start', playbackId, text: result.analysisText },
        ]);
    }

    private onPlaybackDone(event: SpeechPlaybackDoneEvent): Outcome | null {
        if (this.speaker !== 'local' || event.playbackId !== this.activePlayback) {
            return null;
        }
        this.activePlayback = null;
        this.speaker = null;

        const effects: SideEffect[] = event.error ? [notice('SynthesisFailed'), LISTEN_START] : [LISTEN_START];
        return this.to('listening', effects);
    }

    private interrupt(): Outcome {
        const effects: SideEffect[] = [{ type: 'playback_stop' }];

        if (this.activeEpisode !== null) {
            effects.push({ type: 'vision_cancel', episode: this.activeEpisode });
            this.activeEpisode = null;
        }
        if (this.speaker === 'remote') {
            effects.push(control({ kind: 'abort', reason: 'user_interrupt' }));
        }
        if (this.state !== 'listening') {
            effects.push(LISTEN_START);
        }
        this.activePlayback = null;
        this.speaker = null;
        return this.to('listening', effects);
    }

    private markAnswer(text: string): string {
        const marker = this.options.loopGuardMarker;
        return text.startsWith(marker) ? text : `${marker}${text}`;
    }
}
