import { describe, it, expect, vi } from 'vitest';
import type { SessionEvent } from '@glimpse/contracts';
import { EventScheduler } from '../src/session/EventScheduler.js';

const speech = (text: string): SessionEvent => ({
    type: 'speech_recognized',
    utterance: { text, origin: 'user_speech', timestampOrdinal: 0 },
});

describe('EventScheduler', () => {
    it('dispatches in enqueue order, never synchronously', async () => {
        const seen: string[] = [];
        const scheduler = new EventScheduler(event => {
            seen.push(event.type === 'speech_recognized' ? event.utterance.text : event.type);
        });

        scheduler.enqueue(speech('a'));
        scheduler.enqueue({ type: 'connected' });
        scheduler.enqueue(speech('b'));
        expect(seen).toEqual([]);

        await scheduler.idle();
        expect(seen).toEqual(['a', 'connected', 'b']);
        expect(scheduler.getDispatchedCount()).toBe(3);
    });

    it('moves a user interrupt ahead of queued events', async () => {
        const seen: string[] = [];
        const scheduler = new EventScheduler(event => seen.push(event.type));

        scheduler.enqueue(speech('a'));
        scheduler.enqueue({ type: 'remote_speech_started' });
        scheduler.enqueue({ type: 'user_interrupt' });

        await scheduler.idle();
        expect(seen).toEqual(['user_interrupt', 'speech_recognized', 'remote_speech_started']);
    });

    it('never re-enters the dispatcher', async () => {
        let depth = 0;
        let maxDepth = 0;
        const seen: string[] = [];
        const scheduler = new EventScheduler(event => {
            depth++;
            maxDepth = Math.max(maxDepth, depth);
            seen.push(event.type);
            if (event.type === 'connected') {
                scheduler.enqueue({ type: 'remote_speech_started' });
            }
            depth--;
        });

        scheduler.enqueue({ type: 'connected' });
        await scheduler.idle();

        expect(seen).toEqual(['connected', 'remote_speech_started']);
        expect(maxDepth).toBe(1);
    });

    it('keeps draining after a dispatcher error', async () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const seen: string[] = [];
        const scheduler = new EventScheduler(event => {
            if (event.type === 'connected') {
                throw new Error('boom');
            }
            seen.push(event.type);
        });

        scheduler.enqueue({ type: 'connected' });
        scheduler.enqueue({ type: 'user_interrupt' });
        scheduler.enqueue({ type: 'remote_speech_stopped' });
        await scheduler.idle();

        expect(seen).toEqual(['user_interrupt', 'remote_speech_stopped']);
        expect(error).toHaveBeenCalledWith('[scheduler:connected] Error: boom');
        error.mockRestore();
    });

    it('drops events once closed', async () => {
        const dispatcher = vi.fn();
        const scheduler = new EventScheduler(dispatcher);

        scheduler.enqueue({ type: 'connected' });
        scheduler.close();
        scheduler.enqueue({ type: 'user_interrupt' });
        await scheduler.idle();

        expect(dispatcher).not.toHaveBeenCalled();
        expect(scheduler.pending()).toBe(0);
    });
});
