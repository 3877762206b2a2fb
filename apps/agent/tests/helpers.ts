// Test helpers
// In-process fakes behind the agent's component interfaces

import { EventEmitter } from 'node:events';
import { vi } from 'vitest';
import type { ControlSignal } from '@glimpse/contracts';
import type { AudioOutput, AudioSink } from '../src/audio/AudioOutput.js';
import type { Microphone } from '../src/audio/AudioCapture.js';
import type { AudioFrame, PcmFormat } from '../src/audio/pcm.js';
import type { CameraDriver } from '../src/camera/CameraController.js';
import type { ProtocolClient } from '../src/protocol/ProtocolClient.js';
import type { SpeechSynthesizer } from '../src/speech/SpeechSynthesizer.js';

export const TEST_FORMAT: PcmFormat = { sampleRate: 16000, channels: 1 };

export const VISION_KEYWORDS = ['看看', '这是什么', '屏幕', '画面', '图片', '看到', '看见', '照片', '摄像头'];

export const CAMERA_KEYWORDS: Array<{ action: 'open' | 'close'; keywords: string[] }> = [
    { action: 'open', keywords: ['打开摄像头', '开启摄像头', '打开相机'] },
    { action: 'close', keywords: ['关闭摄像头', '关掉摄像头', '关闭相机'] },
];

export const DEFAULT_PROMPT = '图中描绘的是什么景象';

export function frame(sequence: number, bytes = 4): AudioFrame {
    return { sequence, format: TEST_FORMAT, data: Buffer.alloc(bytes, sequence) };
}

export function tick(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

export interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

export function fakeCameraDriver(frameBytes: Buffer = Buffer.from([1, 2, 3])) {
    return {
        open: vi.fn<CameraDriver['open']>().mockResolvedValue(undefined),
        grab: vi.fn<CameraDriver['grab']>().mockResolvedValue(frameBytes),
        release: vi.fn<CameraDriver['release']>().mockResolvedValue(undefined),
    } satisfies CameraDriver;
}

/** Yields `frameCount` frames per call; records every text it was asked to speak. */
export class FakeSynthesizer implements SpeechSynthesizer {
    readonly texts: string[] = [];
    failWith: Error | null = null;

    constructor(private readonly frameCount = 3) {}

    async *synthesize(text: string): AsyncGenerator<AudioFrame> {
        this.texts.push(text);
        for (let i = 0; i < this.frameCount; i++) {
            await Promise.resolve();
            if (this.failWith) {
                throw this.failWith;
            }
            yield frame(i);
        }
    }
}

export class MemoryAudioOutput implements AudioOutput {
    readonly written: AudioFrame[] = [];
    opened = 0;
    ended = 0;
    aborted = 0;
    onWrite: ((frame: AudioFrame) => void) | null = null;

    open(_format: PcmFormat): AudioSink {
        this.opened++;
        return {
            write: async (audio: AudioFrame) => {
                this.written.push(audio);
                this.onWrite?.(audio);
            },
            end: async () => {
                this.ended++;
            },
            abort: () => {
                this.aborted++;
            },
        };
    }
}

export class FakeMicrophone implements Microphone {
    private onFrame: ((frame: AudioFrame) => void) | null = null;
    starts = 0;
    stops = 0;

    start(onFrame: (frame: AudioFrame) => void): void {
        this.starts++;
        this.onFrame = onFrame;
    }

    stop(): void {
        this.stops++;
        this.onFrame = null;
    }

    isActive(): boolean {
        return this.onFrame !== null;
    }

    emit(audio: AudioFrame): void {
        this.onFrame?.(audio);
    }
}

/** Protocol client that connects instantly and records every send. */
export class FakeProtocol extends EventEmitter implements ProtocolClient {
    connected = false;
    readonly texts: string[] = [];
    readonly controls: ControlSignal[] = [];
    readonly audio: Buffer[] = [];
    failConnect = false;

    connect = vi.fn(async () => {
        this.emit('connecting', 1);
        if (this.failConnect) {
            this.emit('disconnected', { reason: 'refused', willReconnect: false });
            throw new Error('refused');
        }
        this.connected = true;
        this.emit('connected', 'remote-1');
    });

    disconnect = vi.fn(async () => {
        this.connected = false;
    });

    sendText = vi.fn(async (text: string) => {
        this.texts.push(text);
    });

    sendAudioChunk = vi.fn(async (chunk: Buffer | Uint8Array) => {
        this.audio.push(Buffer.from(chunk));
    });

    sendControl = vi.fn(async (signal: ControlSignal) => {
        this.controls.push(signal);
    });

    isConnected(): boolean {
        return this.connected;
    }
}

interface WavOptions {
    sampleRate?: number;
    channels?: number;
    bitsPerSample?: number;
    /** Extra chunk written between fmt and data. */
    extraChunk?: { id: string; body: Buffer };
}

/** RIFF/WAVE header with a placeholder data size, as streaming encoders write it. */
export function wavHeader(options: WavOptions = {}): Buffer {
    const { sampleRate = 16000, channels = 1, bitsPerSample = 16, extraChunk } = options;

    const riff = Buffer.alloc(12);
    riff.write('RIFF', 0, 'ascii');
    riff.writeUInt32LE(0xffffffff, 4);
    riff.write('WAVE', 8, 'ascii');

    const fmt = Buffer.alloc(24);
    fmt.write('fmt ', 0, 'ascii');
    fmt.writeUInt32LE(16, 4);
    fmt.writeUInt16LE(1, 8);
    fmt.writeUInt16LE(channels, 10);
    fmt.writeUInt32LE(sampleRate, 12);
    fmt.writeUInt32LE((sampleRate * channels * bitsPerSample) / 8, 16);
    fmt.writeUInt16LE((channels * bitsPerSample) / 8, 20);
    fmt.writeUInt16LE(bitsPerSample, 22);

    const parts: Buffer[] = [riff, fmt];
    if (extraChunk) {
        const head = Buffer.alloc(8);
        head.write(extraChunk.id, 0, 'ascii');
        head.writeUInt32LE(extraChunk.body.length, 4);
        const padding = Buffer.alloc(extraChunk.body.length % 2);
        parts.push(head, extraChunk.body, padding);
    }

    const data = Buffer.alloc(8);
    data.write('data', 0, 'ascii');
    data.writeUInt32LE(0xffffffff, 4);
    parts.push(data);

    return Buffer.concat(parts);
}

/** Polls `condition` until it holds or `timeoutMs` passes. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`Condition not met within ${timeoutMs}ms`);
        }
        await new Promise(resolve => setTimeout(resolve, 5));
    }
}
