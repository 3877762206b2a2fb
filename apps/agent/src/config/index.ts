// Agent Configuration
// Vision settings come from a JSON file, session settings from the environment.
// Secrets are never logged.

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_VISION_CONFIG_PATH = fileURLToPath(
    new URL('../../config/vision.json', import.meta.url)
);

export const DEFAULT_LOOP_GUARD_MARKER = 'Vision Analysis: ';

const CameraKeywordGroupSchema = z.object({
    action: z.enum(['open', 'close']),
    keywords: z.array(z.string().min(1)),
});

export type CameraKeywordGroup = z.infer<typeof CameraKeywordGroupSchema>;

const VisionFileSchema = z
    .object({
        ENABLED: z.boolean().default(true),
        API_KEY: z.string().default(''),
        API_URL: z.string().url().default('https://open.bigmodel.cn/api/paas/v4/chat/completions'),
        MODEL: z.string().min(1).default('glm-4v-flash'),
        CAMERA_INDEX: z.number().int().min(0).default(0),
        KEYWORDS: z
            .array(z.string().min(1))
            .default(['看看', '这是什么', '屏幕', '画面', '图片', '看到', '看见', '照片', '摄像头']),
        CAMERA_KEYWORDS: z.array(CameraKeywordGroupSchema).default([
            { action: 'open', keywords: ['打开摄像头', '开启摄像头', '打开相机'] },
            { action: 'close', keywords: ['关闭摄像头', '关掉摄像头', '关闭相机'] },
        ]),
        DEFAULT_PROMPT: z
            .string()
            .min(1)
            .default('图中描绘的是什么景象，请详细描述，因为用户可能是盲人'),
        TIMEOUT_MS: z.number().int().positive().default(10000),
    })
    .strict();

const booleanFromEnv = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
    VISION_CONFIG_PATH: z.string().optional(),
    VISION_ENABLED: booleanFromEnv.optional(),
    VISION_API_KEY: z.string().optional(),
    VISION_API_URL: z.string().url().optional(),
    VISION_MODEL: z.string().min(1).optional(),
    VISION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    CAMERA_INDEX: z.coerce.number().int().min(0).optional(),
    PROTOCOL_URL: z.string().url().default('ws://localhost:8000/xiaozhi/v1/'),
    PROTOCOL_TOKEN: z.string().default('test-token'),
    DEVICE_ID: z.string().default('00:00:00:00:00:00'),
    CLIENT_ID: z.string().default('glimpse-agent'),
    PROTOCOL_HELLO_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(3),
    RECONNECT_DELAY_MS: z.coerce.number().int().positive().default(2000),
    CONTROL_PORT: z.coerce.number().int().min(0).max(65535).default(7310),
    CAMERA_COMMAND: z.string().default('ffmpeg'),
    TTS_COMMAND: z.string().default('espeak-ng'),
    TTS_VOICE: z.string().default('cmn'),
    PLAYER_COMMAND: z.string().default('aplay'),
    MIC_COMMAND: z.string().default('arecord'),
    LOOP_GUARD_MARKER: z.string().min(1).default(DEFAULT_LOOP_GUARD_MARKER),
});

export interface VisionSettings {
    enabled: boolean;
    apiKey: string;
    apiUrl: string;
    model: string;
    cameraIndex: number;
    keywords: string[];
    cameraKeywords: CameraKeywordGroup[];
    defaultPrompt: string;
    timeoutMs: number;
}

export interface ProtocolSettings {
    url: string;
    token: string;
    deviceId: string;
    clientId: string;
    helloTimeoutMs: number;
    reconnectMaxAttempts: number;
    reconnectDelayMs: number;
}

export interface DeviceCommands {
    camera: string;
    tts: string;
    ttsVoice: string;
    player: string;
    microphone: string;
}

export interface AgentConfig {
    vision: VisionSettings;
    protocol: ProtocolSettings;
    commands: DeviceCommands;
    controlPort: number;
    loopGuardMarker: string;
}

/** Values from the command line; they win over file and environment. */
export interface ConfigOverrides {
    configPath?: string;
    visionEnabled?: boolean;
    cameraIndex?: number;
    protocolUrl?: string;
    controlPort?: number;
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Read and validate the vision JSON file. A missing file yields the defaults.
 */
export function loadVisionFile(path: string): z.infer<typeof VisionFileSchema> {
    let raw: unknown = {};

    if (existsSync(path)) {
        try {
            raw = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (error) {
            throw new ConfigError(`Vision config ${path} is not valid JSON`, [
                error instanceof Error ? error.message : String(error),
            ]);
        }
    } else {
        console.log(`[config] ${path} not found, using default vision settings`);
    }

    const parsed = VisionFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Vision config ${path} is invalid`, formatIssues(parsed.error));
    }
    return parsed.data;
}

/**
 * Build the agent configuration from the environment, the vision file and CLI overrides
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {}
): AgentConfig {
    const parsedEnv = EnvSchema.safeParse(env);
    if (!parsedEnv.success) {
        throw new ConfigError('Environment is invalid', formatIssues(parsedEnv.error));
    }
    const e = parsedEnv.data;

    const path = overrides.configPath ?? e.VISION_CONFIG_PATH ?? DEFAULT_VISION_CONFIG_PATH;
    const file = loadVisionFile(path);

    const vision: VisionSettings = {
        enabled: overrides.visionEnabled ?? e.VISION_ENABLED ?? file.ENABLED,
        apiKey: e.VISION_API_KEY ?? file.API_KEY,
        apiUrl: e.VISION_API_URL ?? file.API_URL,
        model: e.VISION_MODEL ?? file.MODEL,
        cameraIndex: overrides.cameraIndex ?? e.CAMERA_INDEX ?? file.CAMERA_INDEX,
        keywords: file.KEYWORDS,
        cameraKeywords: file.CAMERA_KEYWORDS,
        defaultPrompt: file.DEFAULT_PROMPT,
        timeoutMs: e.VISION_TIMEOUT_MS ?? file.TIMEOUT_MS,
    };

    if (vision.enabled && !vision.apiKey) {
        console.warn('[config] Vision is enabled but no API key is configured; analysis calls will fail');
    }

    return {
        vision,
        protocol: {
            url: overrides.protocolUrl ?? e.PROTOCOL_URL,
            token: e.PROTOCOL_TOKEN,
            deviceId: e.DEVICE_ID,
            clientId: e.CLIENT_ID,
            helloTimeoutMs: e.PROTOCOL_HELLO_TIMEOUT_MS,
            reconnectMaxAttempts: e.RECONNECT_MAX_ATTEMPTS,
            reconnectDelayMs: e.RECONNECT_DELAY_MS,
        },
        commands: {
            camera: e.CAMERA_COMMAND,
            tts: e.TTS_COMMAND,
            ttsVoice: e.TTS_VOICE,
            player: e.PLAYER_COMMAND,
            microphone: e.MIC_COMMAND,
        },
        controlPort: overrides.controlPort ?? e.CONTROL_PORT,
        loopGuardMarker: e.LOOP_GUARD_MARKER,
    };
}
