// WebSocket Protocol Client
// Manages the WebSocket connection to the dialogue service: hello handshake,
// JSON control messages, binary audio frames and reconnection

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { z } from 'zod';
import type {
    ClientHelloMessage,
    ClientMessage,
    ControlSignal,
    ServerHelloMessage,
    ServerMessage,
} from '@glimpse/contracts';
import type { ProtocolSettings } from '../config/index.js';
import type { ProtocolClient } from './ProtocolClient.js';
import { ConnectionLostError, errorMessage, withRetry } from '../utils/errors.js';
import { FRAME_DURATION_MS, PROTOCOL_PCM_FORMAT } from '../audio/pcm.js';

export const PROTOCOL_VERSION = 1;

const ServerMessageSchema = z.discriminatedUnion('type', [
    z
        .object({
            type: z.literal('hello'),
            transport: z.string().optional(),
            session_id: z.string().optional(),
            audio_params: z
                .object({
                    format: z.enum(['pcm', 'opus']).optional(),
                    sample_rate: z.number().optional(),
                    channels: z.number().optional(),
                    frame_duration: z.number().optional(),
                })
                .optional(),
        })
        .passthrough(),
    z
        .object({ type: z.literal('stt'), text: z.string(), session_id: z.string().optional() })
        .passthrough(),
    z
        .object({
            type: z.literal('tts'),
            state: z.enum(['start', 'stop', 'sentence_start', 'sentence_end']),
            text: z.string().optional(),
            session_id: z.string().optional(),
        })
        .passthrough(),
    z
        .object({
            type: z.literal('llm'),
            emotion: z.string().optional(),
            text: z.string().optional(),
            session_id: z.string().optional(),
        })
        .passthrough(),
]);

const KNOWN_TYPES = new Set(['hello', 'stt', 'tts', 'llm']);

export function buildClientHello(): ClientHelloMessage {
    return {
        type: 'hello',
        version: PROTOCOL_VERSION,
        transport: 'websocket',
        audio_params: {
            format: 'pcm',
            sample_rate: PROTOCOL_PCM_FORMAT.sampleRate,
            channels: PROTOCOL_PCM_FORMAT.channels,
            frame_duration: FRAME_DURATION_MS,
        },
    };
}

/**
 * Wire message for a control signal. The session id is attached when known.
 */
export function controlMessage(signal: ControlSignal, sessionId?: string): ClientMessage {
    switch (signal.kind) {
        case 'listen_start':
            return { session_id: sessionId, type: 'listen', state: 'start', mode: signal.mode };
        case 'listen_stop':
            return { session_id: sessionId, type: 'listen', state: 'stop' };
        case 'abort':
            return { session_id: sessionId, type: 'abort' };
    }
}

export function parseServerMessage(raw: string): ServerMessage | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }
    const parsed = ServerMessageSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
}

interface PendingHello {
    resolve: (message: ServerHelloMessage) => void;
    reject: (error: Error) => void;
}

export class WebsocketProtocol extends EventEmitter implements ProtocolClient {
    private ws: WebSocket | null = null;
    private remoteSessionId: string | undefined;
    private isClosed = true;
    private isConnecting = false;
    private pendingHello: PendingHello | null = null;
    private outbound: Promise<void> = Promise.resolve();
    private bytesSent = 0;

    constructor(private readonly settings: ProtocolSettings) {
        super();
    }

    /**
     * Connect, retrying with backoff. Rejects with ConnectionLostError once the
     * attempts are exhausted.
     */
    async connect(): Promise<void> {
        if (this.isConnecting || this.isConnected()) {
            return;
        }

        this.isConnecting = true;
        this.isClosed = false;
        const maxAttempts = Math.max(1, this.settings.reconnectMaxAttempts);

        try {
            await withRetry(attempt => this.open(attempt), {
                maxAttempts,
                initialDelayMs: this.settings.reconnectDelayMs,
                maxDelayMs: this.settings.reconnectDelayMs * 8,
                shouldAbort: () => this.isClosed,
                onRetry: (error, attempt, delayMs) => {
                    console.warn(
                        `[protocol] Attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`
                    );
                    this.emit('disconnected', { reason: errorMessage(error), willReconnect: true });
                },
            });
        } catch (error) {
            console.error(`[protocol] Connection failed: ${errorMessage(error)}`);
            this.emit('disconnected', { reason: errorMessage(error), willReconnect: false });
            throw new ConnectionLostError(`Cannot reach ${this.settings.url}: ${errorMessage(error)}`, {
                cause: error,
            });
        } finally {
            this.isConnecting = false;
        }
    }

    async disconnect(): Promise<void> {
        console.log('[protocol] Disconnecting...');
        this.isClosed = true;
        this.rejectHello(new ConnectionLostError('Client disconnected'));

        const ws = this.ws;
        this.ws = null;
        if (ws) {
            if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
                const closed = new Promise<void>(resolve => {
                    ws.once('close', () => resolve());
                    setTimeout(resolve, 1000);
                });
                ws.close(1000, 'Client disconnect');
                await closed;
            }
            ws.removeAllListeners();
        }

        console.log(`[protocol] Disconnected. Bytes sent: ${this.bytesSent}`);
    }

    sendText(text: string): Promise<void> {
        const message: ClientMessage = {
            session_id: this.remoteSessionId,
            type: 'listen',
            state: 'detect',
            text,
        };
        return this.enqueue(JSON.stringify(message));
    }

    sendAudioChunk(chunk: Buffer | Uint8Array): Promise<void> {
        return this.enqueue(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    }

    sendControl(signal: ControlSignal): Promise<void> {
        return this.enqueue(JSON.stringify(controlMessage(signal, this.remoteSessionId)));
    }

    isConnected(): boolean {
        return this.ws?.readyState === WebSocket.OPEN && this.pendingHello === null;
    }

    getRemoteSessionId(): string | undefined {
        return this.remoteSessionId;
    }

    private async open(attempt: number): Promise<void> {
        this.emit('connecting', attempt);
        console.log(`[protocol] Connecting to ${this.settings.url} (attempt ${attempt})...`);

        const ws = new WebSocket(this.settings.url, {
            headers: {
                'Authorization': `Bearer ${this.settings.token}`,
                'Protocol-Version': String(PROTOCOL_VERSION),
                'Device-Id': this.settings.deviceId,
                'Client-Id': this.settings.clientId,
            },
        });
        this.ws = ws;

        const hello = new Promise<ServerHelloMessage>((resolve, reject) => {
            this.pendingHello = { resolve, reject };
        });
        // Observed by withHelloTimeout; a rejection before then must not go unhandled
        hello.catch(() => undefined);

        try {
            await new Promise<void>((resolve, reject) => {
                ws.once('open', () => resolve());
                ws.once('error', reject);
                ws.once('close', (code: number) => reject(new Error(`Closed during connect (${code})`)));
            });
            ws.removeAllListeners();
            this.setupEventHandlers(ws);

            await this.sendNow(ws, JSON.stringify(buildClientHello()));
            const serverHello = await this.withHelloTimeout(hello);

            this.remoteSessionId = serverHello.session_id;
            console.log(`[protocol] Connected. Session: ${this.remoteSessionId ?? '(none)'}`);
            this.emit('connected', this.remoteSessionId);
        } catch (error) {
            this.pendingHello = null;
            ws.removeAllListeners();
            // Swallow late socket errors from the abandoned attempt
            ws.on('error', () => undefined);
            ws.terminate();
            if (this.ws === ws) {
                this.ws = null;
            }
            throw error;
        }
    }

    private withHelloTimeout(hello: Promise<ServerHelloMessage>): Promise<ServerHelloMessage> {
        return new Promise<ServerHelloMessage>((resolve, reject) => {
            const timer = setTimeout(() => {
                reject(new Error(`No server hello within ${this.settings.helloTimeoutMs}ms`));
            }, this.settings.helloTimeoutMs);

            hello.then(
                message => {
                    clearTimeout(timer);
                    resolve(message);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }

    private setupEventHandlers(ws: WebSocket): void {
        ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            this.handleMessage(data, isBinary);
        });

        ws.on('error', (error: Error) => {
            console.error('[protocol] WebSocket error:', error.message);
        });

        ws.on('close', (code: number, reason: Buffer) => {
            console.log(`[protocol] WebSocket closed: ${code} - ${reason.toString()}`);
            if (this.ws !== ws) {
                return;
            }
            this.ws = null;
            this.rejectHello(new Error(`Closed before hello (${code})`));

            if (this.isClosed || this.isConnecting) {
                return;
            }

            const willReconnect = this.settings.reconnectMaxAttempts > 0;
            this.emit('disconnected', { reason: `closed (${code})`, willReconnect });
            if (willReconnect) {
                this.connect().catch(error => {
                    console.error(`[protocol] Reconnection failed: ${errorMessage(error)}`);
                });
            }
        });
    }

    private handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
        const buffer = Array.isArray(data)
            ? Buffer.concat(data)
            : Buffer.isBuffer(data)
              ? data
              : Buffer.from(data);

        if (isBinary) {
            this.emit('audio', buffer);
            return;
        }

        const text = buffer.toString('utf-8');
        const message = parseServerMessage(text);
        if (!message) {
            const type = /"type"\s*:\s*"([^"]+)"/.exec(text)?.[1];
            if (type && !KNOWN_TYPES.has(type)) {
                console.log(`[protocol] Ignoring message type: ${type}`);
            } else {
                console.warn(`[protocol] Failed to parse message: ${text.slice(0, 120)}`);
            }
            return;
        }

        switch (message.type) {
            case 'hello':
                if (this.pendingHello) {
                    this.pendingHello.resolve(message);
                    this.pendingHello = null;
                }
                break;

            case 'stt':
                this.emit('stt', message.text);
                break;

            case 'tts':
                this.emit('tts', message);
                break;

            case 'llm':
                this.emit('llm', message);
                break;
        }
    }

    private rejectHello(error: Error): void {
        if (this.pendingHello) {
            this.pendingHello.reject(error);
            this.pendingHello = null;
        }
    }

    /** Serialize sends so chunks reach the wire in call order. */
    private enqueue(data: string | Buffer): Promise<void> {
        const run = this.outbound.then(() => {
            const ws = this.ws;
            if (!ws || !this.isConnected()) {
                throw new ConnectionLostError('Not connected');
            }
            return this.sendNow(ws, data);
        });
        this.outbound = run.catch(() => undefined);
        return run;
    }

    private sendNow(ws: WebSocket, data: string | Buffer): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            ws.send(data, { binary: typeof data !== 'string' }, (error?: Error) => {
                if (error) {
                    reject(new ConnectionLostError(`Send failed: ${error.message}`, { cause: error }));
                    return;
                }
                this.bytesSent += typeof data === 'string' ? Buffer.byteLength(data) : data.length;
                resolve();
            });
        });
    }
}
