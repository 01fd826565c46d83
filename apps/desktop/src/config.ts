// Desktop Configuration
// Build-time variables (import.meta.env under Vite) validated before anything connects

import { z } from 'zod';
import { StreamingError } from '@earshot/core';

export interface DesktopConfig {
    /** Relay that exchanges an API key for a temporary streaming token */
    tokenUrl: string;
    streamingUrl: string;
    /** Local agent, when the shell drives native capture through it */
    agentUrl: string;
    /** Seeded into the key rotation when storage holds none */
    apiKeys: string[];
    tokenTimeoutMs: number;
    connectTimeoutMs: number;
    errorDisplayMs: number;
    storagePrefix: string;
}

const blankAsUnset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const milliseconds = (fallback: number) =>
    z.preprocess(blankAsUnset, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
    VITE_TOKEN_URL: z.preprocess(blankAsUnset, z.string().url().default('http://localhost:3001/token')),
    VITE_STREAMING_URL: z.preprocess(blankAsUnset, z.string().url().default('wss://streaming.assemblyai.com/v3/ws')),
    VITE_AGENT_URL: z.preprocess(blankAsUnset, z.string().url().default('http://localhost:3002')),
    VITE_TRANSCRIPTION_API_KEYS: z
        .string()
        .default('')
        .transform((value) =>
            value
                .split(',')
                .map((key) => key.trim())
                .filter((key) => key.length > 0)
        ),
    VITE_TOKEN_TIMEOUT_MS: milliseconds(10000),
    VITE_CONNECT_TIMEOUT_MS: milliseconds(10000),
    VITE_ERROR_DISPLAY_MS: milliseconds(5000),
    VITE_STORAGE_PREFIX: z.preprocess(blankAsUnset, z.string().default('earshot:')),
});

export function loadDesktopConfig(env: Record<string, string | undefined>): DesktopConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new StreamingError(`Invalid configuration:\n  ${issues.join('\n  ')}`, 'CONFIG', { issues });
    }

    const vars = parsed.data;
    return {
        tokenUrl: vars.VITE_TOKEN_URL,
        streamingUrl: vars.VITE_STREAMING_URL,
        agentUrl: vars.VITE_AGENT_URL,
        apiKeys: vars.VITE_TRANSCRIPTION_API_KEYS,
        tokenTimeoutMs: vars.VITE_TOKEN_TIMEOUT_MS,
        connectTimeoutMs: vars.VITE_CONNECT_TIMEOUT_MS,
        errorDisplayMs: vars.VITE_ERROR_DISPLAY_MS,
        storagePrefix: vars.VITE_STORAGE_PREFIX,
    };
}
