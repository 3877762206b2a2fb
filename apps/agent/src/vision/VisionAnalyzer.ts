// Vision Analyzer
// Sends a captured frame and a prompt to an OpenAI-compatible chat completions
// endpoint. Never throws: every failure comes back as a VisionResult.
// NO secrets in logs

import { z } from 'zod';
import type { VisionErrorKind, VisionResult } from '@glimpse/contracts';
import { errorMessage } from '../utils/errors.js';

const ContentPartSchema = z.object({
    type: z.string(),
    text: z.string().optional(),
});

const ChatCompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.union([z.string(), z.array(ContentPartSchema)]),
                }),
            })
        )
        .min(1),
});

export interface VisionAnalyzerOptions {
    apiKey: string;
    apiUrl: string;
    model: string;
    fetchImpl?: typeof fetch;
}

/** What the session needs from an analyzer. */
export interface ImageAnalyzer {
    analyze(frame: Uint8Array, promptText: string, timeoutMs: number, signal?: AbortSignal): Promise<VisionResult>;
}

export function visionFailure(errorKind: VisionErrorKind, detail?: string): VisionResult {
    return { success: false, analysisText: '', errorKind, detail };
}

function contentText(content: string | Array<z.infer<typeof ContentPartSchema>>): string {
    if (typeof content === 'string') {
        return content;
    }
    return content
        .filter(part => part.type === 'text' && part.text)
        .map(part => part.text)
        .join('');
}

export class VisionAnalyzer implements ImageAnalyzer {
    private readonly fetchImpl: typeof fetch;

    constructor(private readonly options: VisionAnalyzerOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    /**
     * Analyze one frame. `signal` cancels the call; `timeoutMs` bounds it.
     */
    async analyze(
        frame: Uint8Array,
        promptText: string,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<VisionResult> {
        if (signal?.aborted) {
            return visionFailure('cancelled');
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeoutMs);
        const onCancel = () => controller.abort();
        signal?.addEventListener('abort', onCancel, { once: true });

        const startedAt = Date.now();
        console.log(`[vision] Analyzing ${frame.length} byte frame with ${this.options.model}`);

        try {
            const response = await this.fetchImpl(this.options.apiUrl, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${this.options.apiKey}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(this.buildPayload(frame, promptText)),
                signal: controller.signal,
            });

            if (!response.ok) {
                const errorText = await response.text().catch(() => '');
                console.error('[vision] Request failed:', response.status, errorText.slice(0, 200));
                return visionFailure('network', `HTTP ${response.status}`);
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (error) {
                if (controller.signal.aborted) {
                    throw error;
                }
                return visionFailure('malformedResponse', 'Response body is not JSON');
            }

            const parsed = ChatCompletionSchema.safeParse(body);
            if (!parsed.success) {
                return visionFailure('malformedResponse', parsed.error.issues[0]?.message);
            }

            const text = contentText(parsed.data.choices[0].message.content).trim();
            if (!text) {
                return visionFailure('malformedResponse', 'Empty analysis text');
            }

            console.log(`[vision] Analysis received in ${Date.now() - startedAt}ms: ${text.slice(0, 50)}`);
            return { success: true, analysisText: text };
        } catch (error) {
            if (timedOut) {
                console.warn(`[vision] Timed out after ${timeoutMs}ms`);
                return visionFailure('timeout', `No response within ${timeoutMs}ms`);
            }
            if (signal?.aborted) {
                console.log('[vision] Cancelled');
                return visionFailure('cancelled');
            }
            console.error('[vision] Network error:', errorMessage(error));
            return visionFailure('network', errorMessage(error));
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onCancel);
        }
    }

    private buildPayload(frame: Uint8Array, promptText: string) {
        const base64 = Buffer.from(frame.buffer, frame.byteOffset, frame.byteLength).toString('base64');
        return {
            model: this.options.model,
            messages: [
                {
                    role: 'user',
                    content: [
                        { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${base64}` } },
                        { type: 'text', text: promptText },
                    ],
                },
            ],
            stream: false,
        };
    }
}
