// Protocol Client
// Transport to the remote dialogue service, as the session sees it

import type { ControlSignal, LlmMessage, TtsMessage } from '@glimpse/contracts';

export interface DisconnectInfo {
    reason: string;
    willReconnect: boolean;
}

/** Inbound feed. Listeners are pushed to; nothing ever waits on the feed. */
export interface ProtocolEvents {
    connecting: [attempt: number];
    connected: [remoteSessionId: string | undefined];
    disconnected: [info: DisconnectInfo];
    stt: [text: string];
    tts: [message: TtsMessage];
    llm: [message: LlmMessage];
    audio: [chunk: Buffer];
}

export type ProtocolEventName = keyof ProtocolEvents;

/**
 * Sends are queued per connection and reach the wire in call order. A send on a
 * closed connection rejects with ConnectionLostError.
 */
export interface ProtocolClient {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    sendText(text: string): Promise<void>;
    sendAudioChunk(chunk: Buffer | Uint8Array): Promise<void>;
    sendControl(signal: ControlSignal): Promise<void>;
    isConnected(): boolean;
    on<K extends ProtocolEventName>(event: K, listener: (...args: ProtocolEvents[K]) => void): this;
}
