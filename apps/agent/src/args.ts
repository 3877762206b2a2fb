// Command Line Arguments
// Hand-parsed flags; they win over the environment and the vision file

import type { ConfigOverrides } from './config/index.js';
import { ConfigError } from './utils/errors.js';

export interface CliOptions extends ConfigOverrides {
    noMicrophone: boolean;
    help: boolean;
}

export function printUsage(): void {
    console.log('Usage: glimpse-agent [options]');
    console.log('');
    console.log('  --no-vision            Disable the vision pipeline');
    console.log('  --no-mic               Run without microphone capture (typed text only)');
    console.log('  --camera <index>       Camera index');
    console.log('  --url <ws-url>         Dialogue service WebSocket URL');
    console.log('  --control-port <port>  Port of the local control server (0 disables it)');
    console.log('  --config <path>        Vision config JSON file');
    console.log('  --help                 Show this help');
}

function parseInteger(flag: string, value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new ConfigError(`${flag} expects a non-negative integer, got "${value}"`);
    }
    return parsed;
}

export function parseArgs(args: string[]): CliOptions {
    const options: CliOptions = { noMicrophone: false, help: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const value = args[i + 1];

        if (arg === '--no-vision') {
            options.visionEnabled = false;
        } else if (arg === '--no-mic') {
            options.noMicrophone = true;
        } else if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--camera' && value !== undefined) {
            options.cameraIndex = parseInteger(arg, value);
            i++;
        } else if (arg === '--url' && value !== undefined) {
            options.protocolUrl = value;
            i++;
        } else if (arg === '--control-port' && value !== undefined) {
            options.controlPort = parseInteger(arg, value);
            i++;
        } else if (arg === '--config' && value !== undefined) {
            options.configPath = value;
            i++;
        } else {
            throw new ConfigError(`Unknown or incomplete option: ${arg}`);
        }
    }
    return options;
}
