// Voice Session
// The one session per process. Binds the protocol feed and local sensors to the
// event scheduler and runs the side effects the state machine returns.

import { randomUUID } from 'node:crypto';
import type {
    AlertRecord,
    CameraFailureKind,
    DeviceState,
    LlmMessage,
    NoticeCategory,
    SessionEvent,
    SessionStatus,
    SideEffect,
    TtsMessage,
    Utterance,
} from '@glimpse/contracts';
import { PROTOCOL_PCM_FORMAT, type AudioFrame } from '../audio/pcm.js';
import type { Microphone } from '../audio/AudioCapture.js';
import type { AudioOutput, AudioSink } from '../audio/AudioOutput.js';
import type { CameraController } from '../camera/CameraController.js';
import type { VisionSettings } from '../config/index.js';
import { KeywordMatcher } from '../intent/KeywordMatcher.js';
import type { ProtocolClient } from '../protocol/ProtocolClient.js';
import type { SpeechPlayer } from '../speech/SpeechPlayer.js';
import type { ImageAnalyzer } from '../vision/VisionAnalyzer.js';
import { DeviceUnavailableError, errorMessage, logError } from '../utils/errors.js';
import { EventScheduler } from './EventScheduler.js';
import { SessionStateMachine } from './SessionStateMachine.js';
import { NOTICE_TEXT } from './notices.js';

const MAX_ALERTS = 10;
const ACTIVATION_CODE = /验证码[:：]\s*(\d+)/;

export type SessionVisionSettings = Pick<
    VisionSettings,
    'enabled' | 'keywords' | 'cameraKeywords' | 'defaultPrompt' | 'timeoutMs'
>;

export interface VoiceSessionDeps {
    protocol: ProtocolClient;
    camera: CameraController;
    analyzer: ImageAnalyzer;
    player: SpeechPlayer;
    microphone?: Microphone;
    /** Plays the service's spoken replies. Without one, remote audio is dropped. */
    remoteOutput?: AudioOutput;
    vision: SessionVisionSettings;
    loopGuardMarker: string;
    sessionId?: string;
}

interface RemoteAudioStream {
    sink: AudioSink;
    writes: Promise<void>;
    sequence: number;
    closed: boolean;
}

/**
 * Device activation code in a spoken prompt such as "请登录控制面板添加设备，输入验证码：123456"
 */
export function extractActivationCode(text: string): string | null {
    return ACTIVATION_CODE.exec(text)?.[1] ?? null;
}

export class VoiceSession {
    private static active: VoiceSession | null = null;

    readonly sessionId: string;
    private readonly startedAt = Date.now();
    private readonly tag: string;
    private readonly machine: SessionStateMachine;
    private readonly scheduler: EventScheduler;
    private readonly episodes = new Map<number, AbortController>();
    private readonly workers = new Set<Promise<void>>();
    private readonly alerts: AlertRecord[] = [];
    private remoteAudio: RemoteAudioStream | null = null;
    /** Audio that arrived before the scheduler handled the matching tts start. */
    private heldRemoteAudio: Buffer[] | null = null;
    private utteranceOrdinal = 0;
    private isShutdown = false;

    /**
     * Create the process-wide session. Throws while another one is active.
     */
    static create(deps: VoiceSessionDeps): VoiceSession {
        if (VoiceSession.active) {
            throw new Error(`Voice session ${VoiceSession.active.sessionId} is already active`);
        }
        const session = new VoiceSession(deps);
        VoiceSession.active = session;
        return session;
    }

    private constructor(private readonly deps: VoiceSessionDeps) {
        this.sessionId = deps.sessionId ?? randomUUID().slice(0, 8);
        this.tag = `session:${this.sessionId}`;

        const matcher = new KeywordMatcher({
            vision: deps.vision.keywords,
            camera: deps.vision.cameraKeywords,
            visionEnabled: deps.vision.enabled,
        });
        this.machine = new SessionStateMachine({
            matcher,
            loopGuardMarker: deps.loopGuardMarker,
            defaultPrompt: deps.vision.defaultPrompt,
            visionEnabled: deps.vision.enabled,
            sessionId: this.sessionId,
        });
        this.scheduler = new EventScheduler(event => this.dispatch(event));

        this.bindProtocol();
    }

    /** Connect to the dialogue service. Failure leaves the session idle. */
    async start(): Promise<void> {
        console.log(`[${this.tag}] Starting (vision ${this.deps.vision.enabled ? 'enabled' : 'disabled'})`);
        try {
            await this.deps.protocol.connect();
        } catch (error) {
            logError(error, this.tag);
        }
    }

    enqueue(event: SessionEvent): void {
        this.scheduler.enqueue(event);
    }

    /** Typed input; handled like recognized speech. */
    submitText(text: string): void {
        this.enqueue({ type: 'speech_recognized', utterance: this.makeUtterance(text) });
    }

    requestVision(prompt?: string): void {
        this.enqueue({ type: 'vision_requested', prompt });
    }

    interrupt(): void {
        this.enqueue({ type: 'user_interrupt' });
    }

    getState(): DeviceState {
        return this.machine.getState();
    }

    getStatus(): SessionStatus {
        return {
            sessionId: this.sessionId,
            state: this.machine.getState(),
            connected: this.deps.protocol.isConnected(),
            visionEnabled: this.deps.vision.enabled,
            activeEpisode: this.machine.getSnapshot().activeEpisode,
            cameraOpen: this.deps.camera.isOpen(),
            startedAt: this.startedAt,
            recentAlerts: [...this.alerts],
        };
    }

    /** Resolves when the scheduler has drained. */
    idle(): Promise<void> {
        return this.scheduler.idle();
    }

    /** Resolves when the scheduler has drained and no worker is running. */
    async settled(): Promise<void> {
        await this.scheduler.idle();
        while (this.workers.size > 0) {
            await Promise.allSettled([...this.workers]);
            await this.scheduler.idle();
        }
    }

    async shutdown(): Promise<void> {
        if (this.isShutdown) {
            return;
        }
        this.isShutdown = true;
        console.log(`[${this.tag}] Shutting down...`);

        this.scheduler.close();
        for (const controller of this.episodes.values()) {
            controller.abort();
        }
        this.deps.player.stop();
        this.finishRemoteAudio(false);
        this.deps.microphone?.stop();
        await this.deps.camera.close();

        try {
            await this.deps.protocol.disconnect();
        } catch (error) {
            logError(error, this.tag);
        }

        await Promise.allSettled([...this.workers]);
        if (VoiceSession.active === this) {
            VoiceSession.active = null;
        }
        console.log(`[${this.tag}] Shut down`);
    }

    private bindProtocol(): void {
        const { protocol } = this.deps;

        protocol.on('connecting', attempt => {
            this.enqueue({ type: 'connect_attempt', attempt });
        });
        protocol.on('connected', remoteSessionId => {
            this.enqueue({ type: 'connected', remoteSessionId });
        });
        protocol.on('disconnected', info => {
            this.enqueue({ type: 'disconnected', reason: info.reason, willReconnect: info.willReconnect });
        });
        protocol.on('stt', text => {
            console.log(`[${this.tag}] >> ${text}`);
            this.enqueue({ type: 'speech_recognized', utterance: this.makeUtterance(text), fromRemote: true });
        });
        protocol.on('tts', message => this.onTts(message));
        protocol.on('llm', message => this.onLlm(message));
        protocol.on('audio', chunk => this.onRemoteAudio(chunk));
    }

    private onTts(message: TtsMessage): void {
        switch (message.state) {
            case 'start':
                this.heldRemoteAudio ??= [];
                this.enqueue({ type: 'remote_speech_started' });
                break;
            case 'stop':
                this.enqueue({ type: 'remote_speech_stopped' });
                break;
            case 'sentence_start':
                if (message.text) {
                    console.log(`[${this.tag}] << ${message.text}`);
                    this.checkActivationCode(message.text);
                }
                break;
            case 'sentence_end':
                break;
        }
    }

    private onLlm(message: LlmMessage): void {
        if (message.emotion) {
            console.log(`[${this.tag}] Emotion: ${message.emotion}`);
        }
    }

    private checkActivationCode(text: string): void {
        const code = extractActivationCode(text);
        if (code) {
            console.warn(`[${this.tag}] Activation required, code ${code}`);
            this.addAlert('Activation', `Enter code ${code} in the control panel to activate this device`);
        }
    }

    /** Text carrying the loop-guard marker is a vision answer, whoever sent it. */
    private makeUtterance(text: string): Utterance {
        return {
            text,
            origin: text.startsWith(this.deps.loopGuardMarker) ? 'vision_answer' : 'user_speech',
            timestampOrdinal: ++this.utteranceOrdinal,
        };
    }

    private dispatch(event: SessionEvent): void {
        for (const effect of this.machine.handle(event)) {
            this.run(effect);
        }

        const remoteSpeaking = this.machine.getSnapshot().speaker === 'remote';
        if (event.type === 'remote_speech_started') {
            const held = this.heldRemoteAudio ?? [];
            this.heldRemoteAudio = null;
            if (remoteSpeaking) {
                held.forEach(chunk => this.writeRemoteAudio(chunk));
            }
        }
        if (!remoteSpeaking) {
            this.finishRemoteAudio(event.type === 'remote_speech_stopped');
        }
    }

    private run(effect: SideEffect): void {
        const { protocol, camera, player, microphone } = this.deps;

        switch (effect.type) {
            case 'microphone_start':
                microphone?.start(frame => this.onMicrophoneFrame(frame));
                break;
            case 'microphone_stop':
                microphone?.stop();
                break;
            case 'send_control':
                protocol.sendControl(effect.signal).catch(error => logError(error, `${this.tag}:send`));
                break;
            case 'send_text':
                console.log(`[${this.tag}] Sending text: ${effect.text.slice(0, 60)}`);
                protocol.sendText(effect.text).catch(error => logError(error, `${this.tag}:send`));
                break;
            case 'camera_open':
                camera.open().catch((error: unknown) => {
                    logError(error, `${this.tag}:camera`);
                    this.speakNotice(error instanceof DeviceUnavailableError ? 'DeviceUnavailable' : 'CaptureFailed');
                });
                break;
            case 'camera_close':
                camera.close().catch(error => logError(error, `${this.tag}:camera`));
                break;
            case 'vision_start':
                this.track(this.runEpisode(effect.episode, effect.prompt));
                break;
            case 'vision_cancel':
                this.episodes.get(effect.episode)?.abort();
                break;
            case 'playback_start':
                this.startPlayback(effect.playbackId, effect.text);
                break;
            case 'playback_stop':
                player.stop();
                this.finishRemoteAudio(false);
                break;
            case 'notice':
                this.speakNotice(effect.category);
                break;
        }
    }

    private onMicrophoneFrame(frame: AudioFrame): void {
        const { protocol } = this.deps;
        if (this.machine.getState() !== 'listening' || !protocol.isConnected()) {
            return;
        }
        protocol.sendAudioChunk(frame.data).catch(error => logError(error, `${this.tag}:mic`));
    }

    /** Remote audio plays only while the machine has the remote side speaking. */
    private onRemoteAudio(chunk: Buffer): void {
        if (!this.deps.remoteOutput) {
            return;
        }
        if (this.machine.getSnapshot().speaker === 'remote') {
            this.writeRemoteAudio(chunk);
            return;
        }
        this.heldRemoteAudio?.push(chunk);
    }

    private writeRemoteAudio(chunk: Buffer): void {
        const output = this.deps.remoteOutput;
        if (!output) {
            return;
        }
        if (!this.remoteAudio) {
            console.log(`[${this.tag}] Playing remote speech`);
            this.remoteAudio = {
                sink: output.open(PROTOCOL_PCM_FORMAT),
                writes: Promise.resolve(),
                sequence: 0,
                closed: false,
            };
        }

        const stream = this.remoteAudio;
        const frame: AudioFrame = { sequence: stream.sequence++, format: PROTOCOL_PCM_FORMAT, data: chunk };
        stream.writes = stream.writes.then(async () => {
            if (stream.closed) {
                return;
            }
            try {
                await stream.sink.write(frame);
            } catch (error) {
                logError(error, `${this.tag}:remote-audio`);
                stream.closed = true;
                stream.sink.abort();
            }
        });
        this.track(stream.writes);
    }

    /** End lets queued audio drain; otherwise playback is cut at once. */
    private finishRemoteAudio(drain: boolean): void {
        const stream = this.remoteAudio;
        if (!stream) {
            return;
        }
        this.remoteAudio = null;

        if (!drain) {
            stream.closed = true;
            stream.sink.abort();
            return;
        }
        this.track(stream.writes.then(() => (stream.closed ? undefined : stream.sink.end())));
    }

    /** Capture, analyze, report. The result is reported even if it turns out stale. */
    private async runEpisode(episode: number, prompt: string): Promise<void> {
        const controller = new AbortController();
        this.episodes.set(episode, controller);
        console.log(`[${this.tag}] Vision episode ${episode}: ${prompt.slice(0, 40)}`);

        try {
            let frame: Buffer;
            try {
                frame = await this.deps.camera.captureFrame();
            } catch (error) {
                logError(error, `${this.tag}:camera`);
                const errorKind: CameraFailureKind =
                    error instanceof DeviceUnavailableError ? 'DeviceUnavailable' : 'CaptureFailed';
                this.enqueue({
                    type: 'vision_pipeline_done',
                    episode,
                    result: { success: false, analysisText: '', errorKind, detail: errorMessage(error) },
                });
                return;
            }

            if (controller.signal.aborted) {
                console.log(`[${this.tag}] Vision episode ${episode} cancelled after capture`);
                return;
            }

            const result = await this.deps.analyzer.analyze(
                frame,
                prompt,
                this.deps.vision.timeoutMs,
                controller.signal
            );
            this.enqueue({ type: 'vision_pipeline_done', episode, result });
        } finally {
            this.episodes.delete(episode);
        }
    }

    private startPlayback(playbackId: number, text: string): void {
        this.track(
            this.deps.player.play(text).then(
                outcome => {
                    // A stopped playback was ended by the machine itself
                    if (outcome === 'completed') {
                        this.enqueue({ type: 'speech_playback_done', playbackId });
                    }
                },
                (error: unknown) => {
                    logError(error, `${this.tag}:speech`);
                    this.enqueue({ type: 'speech_playback_done', playbackId, error: errorMessage(error) });
                }
            )
        );
    }

    /** Notices never preempt a playback the machine is waiting on. */
    private speakNotice(category: NoticeCategory): void {
        const text = NOTICE_TEXT[category];
        console.warn(`[${this.tag}] Notice: ${category}`);
        if (category === 'ConnectionLost') {
            this.addAlert('Connection lost', 'The dialogue service cannot be reached');
        }

        const { player } = this.deps;
        if (player.isPlaying()) {
            console.log(`[${this.tag}] Notice not spoken, playback in progress`);
            return;
        }
        this.track(
            player.play(text).then(
                () => undefined,
                (error: unknown) => logError(error, `${this.tag}:notice`)
            )
        );
    }

    private addAlert(title: string, message: string): void {
        this.alerts.push({ title, message, timestamp: Date.now() });
        if (this.alerts.length > MAX_ALERTS) {
            this.alerts.shift();
        }
    }

    private track(work: Promise<void>): void {
        const tracked = work.catch((error: unknown) => logError(error, this.tag));
        this.workers.add(tracked);
        void tracked.finally(() => this.workers.delete(tracked));
    }
}
