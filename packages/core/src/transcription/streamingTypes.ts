// Streaming API message types
// Inbound JSON frames from the real-time transcription endpoint, discriminated by `type`

import { z } from 'zod';

export const TERMINATE_MESSAGE = JSON.stringify({ type: 'Terminate' });

/**
 * Loose envelope: every field is optional so unknown message types still parse
 * and can be ignored. Known fields are type-checked when present.
 */
export const StreamingMessageSchema = z
    .object({
        type: z.string().optional(),

        // Begin
        id: z.string().optional(),
        expires_at: z.number().optional(),

        // Turn
        transcript: z.string().optional(),
        end_of_turn: z.boolean().optional(),
        turn_order: z.number().optional(),

        // Termination
        audio_duration_seconds: z.number().optional(),
        session_duration_seconds: z.number().optional(),

        // Error. Any non-null value marks an error frame; only strings are shown.
        error: z.unknown().optional(),
        message: z.string().optional(),
    })
    .passthrough();

export type StreamingMessage = z.infer<typeof StreamingMessageSchema>;
