import { describe, it, expect } from 'vitest';
import { PcmFramer, WavFrameReader, frameBytes } from '../src/audio/pcm.js';
import { SynthesisFailedError } from '../src/utils/errors.js';
import { TEST_FORMAT, wavHeader } from './helpers.js';

describe('frameBytes', () => {
    it('sizes a 60ms frame of 16-bit PCM', () => {
        expect(frameBytes({ sampleRate: 16000, channels: 1 })).toBe(1920);
        expect(frameBytes({ sampleRate: 22050, channels: 1 })).toBe(2646);
        expect(frameBytes({ sampleRate: 48000, channels: 2 }, 20)).toBe(3840);
    });
});

describe('PcmFramer', () => {
    it('cuts fixed-size frames across chunk boundaries', () => {
        const framer = new PcmFramer(TEST_FORMAT);

        expect(framer.push(Buffer.alloc(1000, 1))).toEqual([]);
        const frames = framer.push(Buffer.alloc(3000, 2));

        expect(frames.map(f => f.data.length)).toEqual([1920, 1920]);
        expect(frames.map(f => f.sequence)).toEqual([0, 1]);
        expect(frames[0].data[999]).toBe(1);
        expect(frames[0].data[1000]).toBe(2);
        expect(framer.getFrameCount()).toBe(2);
    });

    it('flushes the remainder without an odd trailing byte', () => {
        const framer = new PcmFramer(TEST_FORMAT);
        framer.push(Buffer.alloc(1920 + 101));

        const rest = framer.flush();

        expect(rest).toHaveLength(1);
        expect(rest[0].data.length).toBe(100);
        expect(rest[0].sequence).toBe(1);
        expect(framer.flush()).toEqual([]);
    });

    it('keeps whole stereo samples in the flushed remainder', () => {
        const framer = new PcmFramer({ sampleRate: 16000, channels: 2 });
        framer.push(Buffer.alloc(3840 + 10));

        const rest = framer.flush();

        expect(rest.map(f => f.data.length)).toEqual([8]);
    });

    it('copies frame data out of its buffer', () => {
        const framer = new PcmFramer(TEST_FORMAT);
        const chunk = Buffer.alloc(1920, 5);

        const [first] = framer.push(chunk);
        chunk.fill(0);

        expect(first.data[0]).toBe(5);
    });
});

describe('WavFrameReader', () => {
    it('reads the format and frames the data', () => {
        const reader = new WavFrameReader();

        const frames = reader.push(Buffer.concat([wavHeader({ sampleRate: 22050 }), Buffer.alloc(3000)]));

        expect(reader.getFormat()).toEqual({ sampleRate: 22050, channels: 1 });
        expect(frames.map(f => f.data.length)).toEqual([2646]);
        expect(reader.flush().map(f => f.data.length)).toEqual([354]);
        expect(reader.getFrameCount()).toBe(2);
    });

    it('waits for a header split across chunks', () => {
        const reader = new WavFrameReader();
        const stream = Buffer.concat([wavHeader(), Buffer.alloc(1920, 7)]);

        expect(reader.push(stream.subarray(0, 10))).toEqual([]);
        expect(reader.push(stream.subarray(10, 30))).toEqual([]);
        const frames = reader.push(stream.subarray(30));

        expect(frames).toHaveLength(1);
        expect(frames[0].data[0]).toBe(7);
    });

    it('skips chunks other than fmt and data', () => {
        const reader = new WavFrameReader();
        const header = wavHeader({ extraChunk: { id: 'LIST', body: Buffer.from('INFOabc', 'ascii') } });

        const frames = reader.push(Buffer.concat([header, Buffer.alloc(1920, 3)]));

        expect(frames).toHaveLength(1);
        expect(frames[0].data.every(byte => byte === 3)).toBe(true);
    });

    it('rejects a stream that is not WAV', () => {
        const reader = new WavFrameReader();

        expect(() => reader.push(Buffer.from('OggS0000000000000000', 'ascii'))).toThrow(
            new SynthesisFailedError('Synthesizer output is not a WAV stream')
        );
    });

    it('rejects 8-bit samples', () => {
        const reader = new WavFrameReader();

        expect(() => reader.push(wavHeader({ bitsPerSample: 8 }))).toThrow('Unsupported WAV sample width: 8 bits');
    });

    it('produces nothing before the data chunk arrives', () => {
        const reader = new WavFrameReader();

        expect(reader.flush()).toEqual([]);
        expect(reader.getFrameCount()).toBe(0);
    });
});
