// Speech Player
// Plays synthesized speech locally. One playback at a time; stop() halts frame
// emission immediately.

import type { AudioOutput, AudioSink } from '../audio/AudioOutput.js';
import type { SpeechSynthesizer } from './SpeechSynthesizer.js';
import { GlimpseError, SynthesisFailedError, errorMessage } from '../utils/errors.js';

export type PlaybackOutcome = 'completed' | 'stopped';

interface ActivePlayback {
    controller: AbortController;
    sink: AudioSink | null;
}

export class SpeechPlayer {
    private current: ActivePlayback | null = null;
    private framesPlayed = 0;

    constructor(
        private readonly synthesizer: SpeechSynthesizer,
        private readonly output: AudioOutput
    ) {}

    /**
     * Speak `text`. Resolves 'stopped' when stop() or a newer play() cut it short;
     * rejects with SynthesisFailedError when synthesis or output fails.
     */
    async play(text: string): Promise<PlaybackOutcome> {
        this.stop();

        const playback: ActivePlayback = { controller: new AbortController(), sink: null };
        const { signal } = playback.controller;
        this.current = playback;

        try {
            for await (const frame of this.synthesizer.synthesize(text)) {
                if (signal.aborted) {
                    return 'stopped';
                }
                playback.sink ??= this.output.open(frame.format);
                await playback.sink.write(frame);
                this.framesPlayed++;
            }
            if (signal.aborted) {
                return 'stopped';
            }
            await playback.sink?.end();
            return 'completed';
        } catch (error) {
            if (signal.aborted) {
                return 'stopped';
            }
            playback.sink?.abort();
            if (error instanceof GlimpseError) {
                throw error;
            }
            throw new SynthesisFailedError(`Playback failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            if (this.current === playback) {
                this.current = null;
            }
        }
    }

    stop(): void {
        const playback = this.current;
        if (!playback) {
            return;
        }
        this.current = null;
        playback.controller.abort();
        playback.sink?.abort();
        console.log('[speech] Playback stopped');
    }

    isPlaying(): boolean {
        return this.current !== null;
    }

    getFramesPlayed(): number {
        return this.framesPlayed;
    }
}
