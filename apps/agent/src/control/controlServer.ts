// Control Server
// Local HTTP surface for status, interrupts, manual vision and typed text.
// Routes only enqueue events; they never touch session state directly.

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import { z } from 'zod';
import type { ControlAck, SessionStatus } from '@glimpse/contracts';

export interface ControlTarget {
    getStatus(): SessionStatus;
    interrupt(): void;
    requestVision(prompt?: string): void;
    submitText(text: string): void;
}

const VisionBodySchema = z.object({
    prompt: z.string().trim().max(500).optional(),
});

const TextBodySchema = z.object({
    text: z.string().trim().min(1, 'text must not be empty').max(2000),
});

function refuse(res: Response, status: number, error: string): void {
    const body: ControlAck = { ok: false, error };
    res.status(status).json(body);
}

function accept(res: Response): void {
    const body: ControlAck = { ok: true };
    res.status(202).json(body);
}

function firstIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) {
        return 'Invalid body';
    }
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function createControlApp(target: ControlTarget): Express {
    const app = express();
    app.use(cors());
    app.use(express.json({ limit: '16kb' }));

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    /**
     * GET /status
     * Session state, episode, camera, connection and recent alerts
     */
    app.get('/status', (_req: Request, res: Response) => {
        res.json(target.getStatus());
    });

    app.post('/interrupt', (_req: Request, res: Response) => {
        console.log('[control] Interrupt requested');
        target.interrupt();
        accept(res);
    });

    /**
     * POST /vision
     * Manual vision trigger, with an optional prompt
     */
    app.post('/vision', (req: Request, res: Response) => {
        const parsed = VisionBodySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            refuse(res, 400, firstIssue(parsed.error));
            return;
        }
        console.log('[control] Vision requested');
        target.requestVision(parsed.data.prompt || undefined);
        accept(res);
    });

    /**
     * POST /text
     * Typed input, handled like recognized speech
     */
    app.post('/text', (req: Request, res: Response) => {
        const parsed = TextBodySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            refuse(res, 400, firstIssue(parsed.error));
            return;
        }
        console.log(`[control] Text input: ${parsed.data.text.slice(0, 60)}`);
        target.submitText(parsed.data.text);
        accept(res);
    });

    app.use((_req: Request, res: Response) => {
        refuse(res, 404, 'Not found');
    });

    // Body parser failures land here
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status =
            typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
                ? error.status
                : 500;
        if (status >= 500) {
            console.error('[control] Request failed:', error);
        }
        refuse(res, status, status === 400 ? 'Invalid JSON body' : 'Request failed');
    });

    return app;
}

export function startControlServer(target: ControlTarget, port: number, host = '127.0.0.1'): Promise<Server> {
    const app = createControlApp(target);
    return new Promise<Server>((resolve, reject) => {
        const server = app.listen(port, host, () => {
            const address = server.address();
            const actualPort = typeof address === 'object' && address !== null ? address.port : port;
            console.log(`[control] Listening on http://${host}:${actualPort}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}

export function stopControlServer(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        // Keep-alive sockets would otherwise hold close() open
        server.closeIdleConnections();
    });
}
