// Camera Controller
// Owns the camera handle. Open, close and capture are serialized so concurrent
// callers never race on the device.

import {
    CaptureFailedError,
    GlimpseError,
    errorMessage,
} from '../utils/errors.js';

export interface CameraHandle {
    readonly index: number;
    readonly openedAt: number;
}

/**
 * Device access behind the controller. `open` and `grab` reject with
 * DeviceUnavailableError when the device is busy or missing.
 *
 * A driver need not hold the device between calls. The ffmpeg driver only
 * checks the device exists on `open` and takes it for the length of each
 * `grab`, so the controller's handle tracks intent, not a device lock.
 */
export interface CameraDriver {
    open(index: number): Promise<void>;
    grab(index: number): Promise<Buffer>;
    release(index: number): Promise<void>;
}

export class CameraController {
    private handle: CameraHandle | null = null;
    private lock: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly driver: CameraDriver,
        readonly index: number
    ) {}

    /**
     * Open the camera. Opening an open camera returns the existing handle.
     */
    open(): Promise<CameraHandle> {
        return this.serialize(() => this.openLocked());
    }

    /**
     * Close the camera. Never rejects; closing a closed camera does nothing.
     */
    close(): Promise<void> {
        return this.serialize(async () => {
            if (!this.handle) {
                return;
            }
            this.handle = null;
            try {
                await this.driver.release(this.index);
                console.log(`[camera:${this.index}] Closed`);
            } catch (error) {
                console.warn(`[camera:${this.index}] Release failed: ${errorMessage(error)}`);
            }
        });
    }

    /**
     * Capture the current frame, opening the camera first if needed.
     */
    captureFrame(): Promise<Buffer> {
        return this.serialize(async () => {
            await this.openLocked();
            try {
                const frame = await this.driver.grab(this.index);
                if (frame.length === 0) {
                    throw new CaptureFailedError('Camera returned an empty frame');
                }
                return frame;
            } catch (error) {
                if (error instanceof GlimpseError) {
                    throw error;
                }
                throw new CaptureFailedError(`Capture failed: ${errorMessage(error)}`, { cause: error });
            }
        });
    }

    isOpen(): boolean {
        return this.handle !== null;
    }

    getHandle(): CameraHandle | null {
        return this.handle;
    }

    private async openLocked(): Promise<CameraHandle> {
        if (this.handle) {
            return this.handle;
        }
        console.log(`[camera:${this.index}] Opening...`);
        await this.driver.open(this.index);
        this.handle = { index: this.index, openedAt: Date.now() };
        console.log(`[camera:${this.index}] Opened`);
        return this.handle;
    }

    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.lock.then(task, task);
        this.lock = run.catch(() => undefined);
        return run;
    }
}
