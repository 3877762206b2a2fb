// FFmpeg Camera Driver
// Grabs single JPEG frames by spawning ffmpeg against the capture device

import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import type { CameraDriver } from './CameraController.js';
import { CaptureFailedError, DeviceUnavailableError } from '../utils/errors.js';

const GRAB_TIMEOUT_MS = 5000;
const UNAVAILABLE_PATTERN = /busy|no such file|permission denied|cannot open|could not find|i\/o error/i;

export interface FfmpegCameraOptions {
    command?: string;
    platform?: NodeJS.Platform;
    grabTimeoutMs?: number;
}

interface DeviceInput {
    format: string;
    device: string;
    /** Path that must exist before the device can be opened, if the platform has one. */
    path?: string;
}

export function deviceInput(index: number, platform: NodeJS.Platform): DeviceInput {
    if (platform === 'darwin') {
        return { format: 'avfoundation', device: `${index}:none` };
    }
    if (platform === 'win32') {
        return { format: 'dshow', device: `video=${index}` };
    }
    const path = `/dev/video${index}`;
    return { format: 'v4l2', device: path, path };
}

export class FfmpegCameraDriver implements CameraDriver {
    private readonly command: string;
    private readonly platform: NodeJS.Platform;
    private readonly grabTimeoutMs: number;

    constructor(options: FfmpegCameraOptions = {}) {
        this.command = options.command ?? 'ffmpeg';
        this.platform = options.platform ?? process.platform;
        this.grabTimeoutMs = options.grabTimeoutMs ?? GRAB_TIMEOUT_MS;
    }

    async open(index: number): Promise<void> {
        const input = deviceInput(index, this.platform);
        if (input.path && !existsSync(input.path)) {
            throw new DeviceUnavailableError(`Camera device ${input.path} not found`);
        }
    }

    grab(index: number): Promise<Buffer> {
        const input = deviceInput(index, this.platform);
        const args = [
            '-hide_banner',
            '-loglevel', 'error',
            '-f', input.format,
            '-i', input.device,
            '-frames:v', '1',
            '-f', 'image2pipe',
            '-vcodec', 'mjpeg',
            'pipe:1',
        ];

        return new Promise<Buffer>((resolve, reject) => {
            const child = spawn(this.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
            const chunks: Buffer[] = [];
            let stderr = '';
            let settled = false;

            const finish = (error: Error | null, frame?: Buffer) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (error) {
                    reject(error);
                } else if (frame) {
                    resolve(frame);
                }
            };

            const timer = setTimeout(() => {
                child.kill('SIGKILL');
                finish(new CaptureFailedError(`Camera did not deliver a frame within ${this.grabTimeoutMs}ms`));
            }, this.grabTimeoutMs);

            child.stdout.on('data', (data: Buffer) => chunks.push(data));
            child.stderr.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            child.on('error', (error) => {
                finish(new DeviceUnavailableError(`Cannot start ${this.command}: ${error.message}`, { cause: error }));
            });

            child.on('close', (code) => {
                const message = stderr.trim();
                if (code !== 0) {
                    finish(
                        UNAVAILABLE_PATTERN.test(message)
                            ? new DeviceUnavailableError(`Camera ${input.device} unavailable: ${message}`)
                            : new CaptureFailedError(`${this.command} exited with code ${code}: ${message}`)
                    );
                    return;
                }
                const frame = Buffer.concat(chunks);
                if (frame.length === 0) {
                    finish(new CaptureFailedError('Camera produced no image data'));
                    return;
                }
                finish(null, frame);
            });
        });
    }

    async release(index: number): Promise<void> {
        // Frames are grabbed by short-lived processes; nothing stays open between grabs.
        console.log(`[camera:${index}] Released`);
    }
}
