// Audio Output
// Local playback of PCM frames through a player process reading stdin

import { spawn } from 'node:child_process';
import type { AudioFrame, PcmFormat } from './pcm.js';

/** One playback stream. `abort` stops sound at once and settles pending writes. */
export interface AudioSink {
    write(frame: AudioFrame): Promise<void>;
    end(): Promise<void>;
    abort(): void;
}

export interface AudioOutput {
    open(format: PcmFormat): AudioSink;
}

export class CommandAudioOutput implements AudioOutput {
    constructor(private readonly command = 'aplay') {}

    open(format: PcmFormat): AudioSink {
        const args = [
            '-q',
            '-t', 'raw',
            '-f', 'S16_LE',
            '-r', String(format.sampleRate),
            '-c', String(format.channels),
            '-',
        ];
        const child = spawn(this.command, args, { stdio: ['pipe', 'ignore', 'pipe'] });

        let exited = false;
        let failure: Error | null = null;
        const waiters: Array<() => void> = [];
        const exit = new Promise<void>(resolve => {
            child.once('close', () => resolve());
            child.once('error', () => resolve());
        });
        const release = () => {
            while (waiters.length > 0) {
                waiters.shift()?.();
            }
        };

        child.stderr.on('data', (data: Buffer) => {
            const msg = data.toString().trim();
            if (msg) {
                console.log(`[player] ${msg}`);
            }
        });
        child.on('error', (error) => {
            failure = error;
            exited = true;
            release();
        });
        child.on('close', () => {
            exited = true;
            release();
        });
        child.stdin.on('drain', release);
        // EPIPE after the player dies is reported through `failure` on the next write
        child.stdin.on('error', (error) => {
            failure = error;
            release();
        });

        const waitFor = () => new Promise<void>(resolve => waiters.push(resolve));

        return {
            write: async (frame: AudioFrame) => {
                if (failure) {
                    throw failure;
                }
                if (exited) {
                    return;
                }
                if (!child.stdin.write(frame.data)) {
                    await waitFor();
                }
            },
            end: async () => {
                if (exited) {
                    return;
                }
                child.stdin.end();
                await exit;
                if (failure) {
                    throw failure;
                }
            },
            abort: () => {
                if (!exited) {
                    child.kill('SIGKILL');
                }
                release();
            },
        };
    }
}
