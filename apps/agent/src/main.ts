#!/usr/bin/env node
// Agent CLI
// Loads configuration, builds the default adapters and runs one voice session

import { config as loadEnv } from 'dotenv';
import { loadConfig } from './config/index.js';
import { parseArgs, printUsage } from './args.js';
import { CameraController } from './camera/CameraController.js';
import { FfmpegCameraDriver } from './camera/FfmpegCameraDriver.js';
import { VisionAnalyzer } from './vision/VisionAnalyzer.js';
import { CommandSpeechSynthesizer } from './speech/SpeechSynthesizer.js';
import { SpeechPlayer } from './speech/SpeechPlayer.js';
import { CommandAudioOutput } from './audio/AudioOutput.js';
import { CommandMicrophone } from './audio/AudioCapture.js';
import { WebsocketProtocol } from './protocol/WebsocketProtocol.js';
import { VoiceSession } from './session/VoiceSession.js';
import { startControlServer, stopControlServer } from './control/controlServer.js';
import { ConfigError, logError } from './utils/errors.js';

async function main(): Promise<void> {
    loadEnv();

    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
        printUsage();
        return;
    }

    const config = loadConfig(process.env, options);
    console.log(`[agent] Dialogue service: ${config.protocol.url}`);
    console.log(`[agent] Vision: ${config.vision.enabled ? `${config.vision.model}, camera ${config.vision.cameraIndex}` : 'disabled'}`);

    const output = new CommandAudioOutput(config.commands.player);
    const player = new SpeechPlayer(
        new CommandSpeechSynthesizer({ command: config.commands.tts, voice: config.commands.ttsVoice }),
        output
    );

    const session = VoiceSession.create({
        protocol: new WebsocketProtocol(config.protocol),
        camera: new CameraController(new FfmpegCameraDriver({ command: config.commands.camera }), config.vision.cameraIndex),
        analyzer: new VisionAnalyzer({
            apiKey: config.vision.apiKey,
            apiUrl: config.vision.apiUrl,
            model: config.vision.model,
        }),
        player,
        remoteOutput: output,
        microphone: options.noMicrophone ? undefined : new CommandMicrophone({ command: config.commands.microphone }),
        vision: config.vision,
        loopGuardMarker: config.loopGuardMarker,
    });

    const server = config.controlPort > 0 ? await startControlServer(session, config.controlPort) : null;

    let stopping = false;
    const shutdown = async (signal: string) => {
        if (stopping) {
            return;
        }
        stopping = true;
        console.log(`[agent] ${signal} received, shutting down...`);
        if (server) {
            await stopControlServer(server);
        }
        await session.shutdown();
        process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch(error => {
                logError(error, 'agent');
                process.exit(1);
            });
        });
    }

    await session.start();
}

main().catch(error => {
    logError(error, 'agent');
    if (error instanceof ConfigError) {
        printUsage();
    }
    process.exit(1);
});
