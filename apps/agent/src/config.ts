// Agent Configuration
// Environment variables parsed and validated once at startup

import { z } from 'zod';
import { StreamingError } from '@earshot/core';
import type { RecorderKind } from './audio/recorders.js';

export class ConfigError extends StreamingError {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`, 'CONFIG', { issues });
    }
}

export interface AgentConfig {
    port: number;
    tokenUrl: string;
    streamingUrl: string;
    /** Seeded into the key rotation when storage holds none */
    apiKeys: string[];
    recorder: RecorderKind;
    audioDevice?: string;
    dataDir: string;
    tokenTimeoutMs: number;
    connectTimeoutMs: number;
    errorDisplayMs: number;
}

// `FOO=` in a .env file arrives as an empty string; treat it as unset
const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const milliseconds = (fallback: number) =>
    z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
    AGENT_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(3002)),
    TOKEN_URL: z.preprocess(blankAsUnset, z.string().url().default('http://localhost:3001/token')),
    STREAMING_URL: z.preprocess(blankAsUnset, z.string().url().default('wss://streaming.assemblyai.com/v3/ws')),
    TRANSCRIPTION_API_KEYS: z
        .string()
        .default('')
        .transform((value) =>
            value
                .split(',')
                .map((key) => key.trim())
                .filter((key) => key.length > 0)
        ),
    AUDIO_RECORDER: z.preprocess(blankAsUnset, z.enum(['sox', 'arecord', 'ffmpeg']).default('sox')),
    AUDIO_DEVICE: z.preprocess(blankAsUnset, z.string().optional()),
    DATA_DIR: z.preprocess(blankAsUnset, z.string().default('./data')),
    TOKEN_TIMEOUT_MS: milliseconds(10000),
    CONNECT_TIMEOUT_MS: milliseconds(10000),
    ERROR_DISPLAY_MS: milliseconds(5000),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AgentConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }

    const vars = parsed.data;
    return {
        port: vars.AGENT_PORT,
        tokenUrl: vars.TOKEN_URL,
        streamingUrl: vars.STREAMING_URL,
        apiKeys: vars.TRANSCRIPTION_API_KEYS,
        recorder: vars.AUDIO_RECORDER,
        audioDevice: vars.AUDIO_DEVICE,
        dataDir: vars.DATA_DIR,
        tokenTimeoutMs: vars.TOKEN_TIMEOUT_MS,
        connectTimeoutMs: vars.CONNECT_TIMEOUT_MS,
        errorDisplayMs: vars.ERROR_DISPLAY_MS,
    };
}
