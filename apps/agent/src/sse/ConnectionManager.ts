// SSE Connection Manager
// Fans live session events out to every connected desktop client

import type { LiveEvent } from '@earshot/contracts';

/**
 * The slice of ServerResponse an SSE client needs
 */
export interface SSEStream {
    write(chunk: string): unknown;
    end(): unknown;
    on(event: 'close', listener: () => void): unknown;
}

interface SSEClient {
    stream: SSEStream;
    connectedAt: number;
}

/**
 * Format event as SSE: data: {json}\n\n
 */
export function formatSSEEvent(event: LiveEvent): string {
    return `data: ${JSON.stringify(event)}\n\n`;
}

export class SSEConnectionManager {
    private clients: Set<SSEClient> = new Set();

    /**
     * Register a new SSE client
     * @returns unsubscribe function to remove client on disconnect
     */
    registerClient(stream: SSEStream): () => void {
        const client: SSEClient = {
            stream,
            connectedAt: Date.now(),
        };

        this.clients.add(client);
        console.log(`[sse] Client connected. Total clients: ${this.clients.size}`);

        stream.on('close', () => this.removeClient(client));

        return () => this.removeClient(client);
    }

    broadcast(event: LiveEvent): void {
        if (this.clients.size === 0) {
            return;
        }

        const sseData = formatSSEEvent(event);
        let failCount = 0;

        for (const client of [...this.clients]) {
            try {
                client.stream.write(sseData);
            } catch (err) {
                console.error('[sse] Error writing to client:', err);
                failCount++;
                this.removeClient(client);
            }
        }

        if (failCount > 0) {
            console.warn(`[sse] Failed to send ${event.type} to ${failCount} client(s)`);
        }
    }

    getClientCount(): number {
        return this.clients.size;
    }

    /**
     * End every stream (agent shutdown)
     */
    closeAll(): void {
        console.log(`[sse] Closing ${this.clients.size} connection(s)`);

        for (const client of this.clients) {
            try {
                client.stream.end();
            } catch (err) {
                console.warn('[sse] Stream already closed:', err);
            }
        }

        this.clients.clear();
    }

    private removeClient(client: SSEClient): void {
        if (this.clients.delete(client)) {
            const connectedFor = Date.now() - client.connectedAt;
            console.log(`[sse] Client disconnected after ${connectedFor}ms. Remaining clients: ${this.clients.size}`);
        }
    }
}
