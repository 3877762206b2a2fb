import { describe, it, expect, vi } from 'vitest';
import { CameraController } from '../src/camera/CameraController.js';
import { CaptureFailedError, DeviceUnavailableError } from '../src/utils/errors.js';
import { fakeCameraDriver } from './helpers.js';

describe('CameraController', () => {
    it('returns the same handle when opened twice', async () => {
        const driver = fakeCameraDriver();
        const camera = new CameraController(driver, 0);

        const first = await camera.open();
        const second = await camera.open();

        expect(second).toBe(first);
        expect(first.index).toBe(0);
        expect(driver.open).toHaveBeenCalledTimes(1);
    });

    it('serializes concurrent opens into one device open', async () => {
        const driver = fakeCameraDriver();
        const camera = new CameraController(driver, 2);

        const [a, b] = await Promise.all([camera.open(), camera.open()]);

        expect(a).toBe(b);
        expect(driver.open).toHaveBeenCalledTimes(1);
        expect(driver.open).toHaveBeenCalledWith(2);
    });

    it('treats closing a closed camera as a no-op', async () => {
        const driver = fakeCameraDriver();
        const camera = new CameraController(driver, 0);

        await camera.close();
        expect(driver.release).not.toHaveBeenCalled();

        await camera.open();
        await camera.close();
        await camera.close();
        expect(driver.release).toHaveBeenCalledTimes(1);
        expect(camera.isOpen()).toBe(false);
    });

    it('opens the camera on first capture', async () => {
        const driver = fakeCameraDriver(Buffer.from([9, 8, 7]));
        const camera = new CameraController(driver, 0);

        const frame = await camera.captureFrame();

        expect([...frame]).toEqual([9, 8, 7]);
        expect(driver.open).toHaveBeenCalledTimes(1);
        expect(camera.isOpen()).toBe(true);

        await camera.captureFrame();
        expect(driver.open).toHaveBeenCalledTimes(1);
        expect(driver.grab).toHaveBeenCalledTimes(2);
    });

    it('reports an empty frame as CaptureFailed', async () => {
        const driver = fakeCameraDriver(Buffer.alloc(0));
        const camera = new CameraController(driver, 0);

        await expect(camera.captureFrame()).rejects.toBeInstanceOf(CaptureFailedError);
    });

    it('wraps unexpected grab errors as CaptureFailed', async () => {
        const driver = fakeCameraDriver();
        driver.grab.mockRejectedValueOnce(new Error('decoder exploded'));
        const camera = new CameraController(driver, 0);

        const error = await camera.captureFrame().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(CaptureFailedError);
        expect(error).toHaveProperty('message', 'Capture failed: decoder exploded');
    });

    it('passes DeviceUnavailable through and stays closed', async () => {
        const driver = fakeCameraDriver();
        driver.open.mockRejectedValueOnce(new DeviceUnavailableError('Camera /dev/video0 not found'));
        const camera = new CameraController(driver, 0);

        await expect(camera.captureFrame()).rejects.toBeInstanceOf(DeviceUnavailableError);
        expect(camera.isOpen()).toBe(false);
        expect(camera.getHandle()).toBeNull();

        // The next capture tries again
        await expect(camera.captureFrame()).resolves.toHaveLength(3);
    });

    it('closes without rejecting when the driver release fails', async () => {
        const driver = fakeCameraDriver();
        driver.release.mockRejectedValueOnce(new Error('busy'));
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const camera = new CameraController(driver, 1);

        await camera.open();
        await expect(camera.close()).resolves.toBeUndefined();

        expect(camera.isOpen()).toBe(false);
        expect(warn).toHaveBeenCalledWith('[camera:1] Release failed: busy');
        warn.mockRestore();
    });
});
