// Speech Synthesizer
// Text to a finite, restartable sequence of PCM frames

import { spawn } from 'node:child_process';
import { WavFrameReader, type AudioFrame } from '../audio/pcm.js';
import { GlimpseError, SynthesisFailedError, errorMessage } from '../utils/errors.js';

/**
 * Every call to `synthesize` starts a fresh sequence from the first frame;
 * no cursor is shared between calls.
 */
export interface SpeechSynthesizer {
    synthesize(text: string): AsyncIterable<AudioFrame>;
}

export interface CommandSynthesizerOptions {
    command?: string;
    voice?: string;
}

interface ExitStatus {
    code: number | null;
    error?: Error;
}

/**
 * Runs a TTS engine that writes WAV to stdout (espeak-ng --stdout by default)
 */
export class CommandSpeechSynthesizer implements SpeechSynthesizer {
    private readonly command: string;
    private readonly voice: string;

    constructor(options: CommandSynthesizerOptions = {}) {
        this.command = options.command ?? 'espeak-ng';
        this.voice = options.voice ?? 'cmn';
    }

    async *synthesize(text: string): AsyncGenerator<AudioFrame> {
        const child = spawn(this.command, ['--stdout', '-v', this.voice, text], {
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        const exit = new Promise<ExitStatus>(resolve => {
            child.once('error', error => resolve({ code: null, error }));
            child.once('close', code => resolve({ code }));
        });

        let stderr = '';
        child.stderr.on('data', (data: Buffer) => {
            stderr += data.toString();
        });

        const reader = new WavFrameReader();
        try {
            for await (const chunk of child.stdout) {
                yield* reader.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
            }
            yield* reader.flush();

            const status = await exit;
            if (status.error) {
                throw new SynthesisFailedError(`Cannot start ${this.command}: ${status.error.message}`, {
                    cause: status.error,
                });
            }
            if (status.code !== 0) {
                throw new SynthesisFailedError(`${this.command} exited with code ${status.code}: ${stderr.trim()}`);
            }
            if (reader.getFrameCount() === 0) {
                throw new SynthesisFailedError('Synthesizer produced no audio');
            }
        } catch (error) {
            if (error instanceof GlimpseError) {
                throw error;
            }
            throw new SynthesisFailedError(`Synthesis failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            // Consumer stopped early or synthesis failed
            if (child.exitCode === null && child.signalCode === null) {
                child.kill('SIGTERM');
            }
        }
    }
}
