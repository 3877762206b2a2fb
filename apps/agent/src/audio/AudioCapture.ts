// Audio Capture Module
// Microphone capture through a recorder process writing raw PCM to stdout

import { spawn, type ChildProcess } from 'node:child_process';
import { PcmFramer, PROTOCOL_PCM_FORMAT, type AudioFrame, type PcmFormat } from './pcm.js';

export interface Microphone {
    start(onFrame: (frame: AudioFrame) => void): void;
    stop(): void;
    isActive(): boolean;
}

export interface CommandMicrophoneOptions {
    command?: string;
    format?: PcmFormat;
}

export class CommandMicrophone implements Microphone {
    private child: ChildProcess | null = null;
    private readonly command: string;
    private readonly format: PcmFormat;

    constructor(options: CommandMicrophoneOptions = {}) {
        this.command = options.command ?? 'arecord';
        this.format = options.format ?? PROTOCOL_PCM_FORMAT;
    }

    start(onFrame: (frame: AudioFrame) => void): void {
        if (this.child) {
            return;
        }

        const args = [
            '-q',
            '-t', 'raw',
            '-f', 'S16_LE',
            '-r', String(this.format.sampleRate),
            '-c', String(this.format.channels),
        ];
        console.log(`[mic] Starting ${this.command} at ${this.format.sampleRate}Hz`);

        const child = spawn(this.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
        const framer = new PcmFramer(this.format);
        this.child = child;

        child.stdout.on('data', (data: Buffer) => {
            for (const frame of framer.push(data)) {
                onFrame(frame);
            }
        });

        child.stderr.on('data', (data: Buffer) => {
            const msg = data.toString().trim();
            if (msg) {
                console.log(`[mic] ${msg}`);
            }
        });

        child.on('error', (error) => {
            console.error(`[mic] Failed to start ${this.command}: ${error.message}`);
        });

        child.on('close', (code) => {
            console.log(`[mic] Recorder exited with code ${code}. Frames: ${framer.getFrameCount()}`);
            if (this.child === child) {
                this.child = null;
            }
        });
    }

    stop(): void {
        if (!this.child) {
            return;
        }
        this.child.kill('SIGTERM');
        this.child = null;
    }

    isActive(): boolean {
        return this.child !== null;
    }
}
