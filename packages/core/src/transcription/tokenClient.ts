// Token Client
// Exchanges a long-lived API key for a short-lived streaming token via the token relay

import { z } from 'zod';
import { AuthenticationError, TimeoutError, TransportError, errorMessage, withTimeout } from '../utils/errors.js';

export interface TokenRequestOptions {
    tokenUrl: string;
    fetch?: typeof fetch;
    timeoutMs?: number;
}

const TokenResponseSchema = z.object({
    token: z.string().min(1),
});

const BODY_EXCERPT_LENGTH = 100;

export async function requestTemporaryToken(apiKey: string, options: TokenRequestOptions): Promise<string> {
    const fetchImpl = options.fetch ?? fetch;

    let response: Response;
    try {
        response = await withTimeout(
            fetchImpl(options.tokenUrl, {
                method: 'POST',
                headers: {
                    Authorization: apiKey,
                    'Content-Type': 'application/json',
                },
            }),
            options.timeoutMs ?? 0,
            'Token request'
        );
    } catch (error) {
        if (error instanceof TimeoutError) throw error;
        throw new TransportError(`Token request failed: ${errorMessage(error)}`);
    }

    let body: string;
    try {
        body = await response.text();
    } catch (error) {
        throw new TransportError(`Token request failed: ${errorMessage(error)}`);
    }
    console.log(`[token] Token response status: ${response.status}`);

    if (!response.ok) {
        throw new AuthenticationError(
            `Failed to get auth token: ${response.status} - ${body.slice(0, BODY_EXCERPT_LENGTH)}`,
            { status: response.status }
        );
    }

    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch {
        throw new AuthenticationError('Token response was not valid JSON');
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
        throw new AuthenticationError('Token response missing token field');
    }

    return parsed.data.token;
}
