// PCM Framing
// Splits byte streams from child processes into fixed-duration 16-bit PCM frames

import { SynthesisFailedError } from '../utils/errors.js';

export interface PcmFormat {
    sampleRate: number;
    channels: number;
}

export interface AudioFrame {
    sequence: number;
    format: PcmFormat;
    data: Buffer;
}

export const FRAME_DURATION_MS = 60;

export const PROTOCOL_PCM_FORMAT: PcmFormat = { sampleRate: 16000, channels: 1 };

export function frameBytes(format: PcmFormat, durationMs = FRAME_DURATION_MS): number {
    return Math.round((format.sampleRate * durationMs) / 1000) * format.channels * 2;
}

/**
 * PCM Framer
 * Buffers raw PCM and cuts it into frames of one fixed size
 */
export class PcmFramer {
    private buffer: Buffer = Buffer.alloc(0);
    private sequence = 0;
    private readonly size: number;

    constructor(readonly format: PcmFormat, durationMs = FRAME_DURATION_MS) {
        this.size = frameBytes(format, durationMs);
    }

    push(chunk: Buffer): AudioFrame[] {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

        const frames: AudioFrame[] = [];
        while (this.buffer.length >= this.size) {
            frames.push(this.frame(this.buffer.subarray(0, this.size)));
            this.buffer = this.buffer.subarray(this.size);
        }
        return frames;
    }

    /** Trailing partial frame, if any; a final partial sample is dropped. */
    flush(): AudioFrame[] {
        const sampleBytes = this.format.channels * 2;
        const usable = this.buffer.length - (this.buffer.length % sampleBytes);
        const rest = this.buffer.subarray(0, usable);
        this.buffer = Buffer.alloc(0);
        return rest.length > 0 ? [this.frame(rest)] : [];
    }

    getFrameCount(): number {
        return this.sequence;
    }

    private frame(data: Buffer): AudioFrame {
        // Copy so the frame does not pin the whole accumulated buffer
        return { sequence: this.sequence++, format: this.format, data: Buffer.from(data) };
    }
}

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;

/**
 * WAV Frame Reader
 * Parses a streamed RIFF/WAVE header, then frames the data chunk. Streaming
 * encoders write a placeholder data size, so the size field is not trusted.
 */
export class WavFrameReader {
    private header: Buffer = Buffer.alloc(0);
    private format: PcmFormat | null = null;
    private framer: PcmFramer | null = null;

    push(chunk: Buffer): AudioFrame[] {
        if (this.framer) {
            return this.framer.push(chunk);
        }

        this.header = Buffer.concat([this.header, chunk]);
        const dataOffset = this.parseHeader();
        if (dataOffset === null) {
            return [];
        }

        const format = this.format;
        if (!format) {
            throw new SynthesisFailedError('WAV stream has no fmt chunk before its data');
        }
        this.framer = new PcmFramer(format);
        const rest = this.header.subarray(dataOffset);
        this.header = Buffer.alloc(0);
        return this.framer.push(rest);
    }

    flush(): AudioFrame[] {
        return this.framer ? this.framer.flush() : [];
    }

    getFormat(): PcmFormat | null {
        return this.format;
    }

    getFrameCount(): number {
        return this.framer ? this.framer.getFrameCount() : 0;
    }

    /** Offset of the PCM data, or null while the header is incomplete. */
    private parseHeader(): number | null {
        if (this.header.length < RIFF_HEADER_SIZE) {
            return null;
        }
        if (this.header.toString('ascii', 0, 4) !== 'RIFF' || this.header.toString('ascii', 8, 12) !== 'WAVE') {
            throw new SynthesisFailedError('Synthesizer output is not a WAV stream');
        }

        let offset = RIFF_HEADER_SIZE;
        while (offset + CHUNK_HEADER_SIZE <= this.header.length) {
            const id = this.header.toString('ascii', offset, offset + 4);
            const size = this.header.readUInt32LE(offset + 4);
            const body = offset + CHUNK_HEADER_SIZE;

            if (id === 'data') {
                return body;
            }
            if (body + size > this.header.length) {
                return null;
            }
            if (id === 'fmt ') {
                const bitsPerSample = this.header.readUInt16LE(body + 14);
                if (bitsPerSample !== 16) {
                    throw new SynthesisFailedError(`Unsupported WAV sample width: ${bitsPerSample} bits`);
                }
                this.format = {
                    channels: this.header.readUInt16LE(body + 2),
                    sampleRate: this.header.readUInt32LE(body + 4),
                };
            }
            // Chunks are padded to even sizes
            offset = body + size + (size % 2);
        }
        return null;
    }
}
