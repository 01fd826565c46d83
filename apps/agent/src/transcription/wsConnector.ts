// WebSocket connector for Node
// Adapts `ws` to the StreamingSocket seam the transcription session talks to

import WebSocket from 'ws';
import type { SocketConnector, StreamingSocket, StreamingSocketHandlers } from '@earshot/core';

function toBuffer(data: WebSocket.RawData): Buffer {
    if (Array.isArray(data)) return Buffer.concat(data);
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    return data;
}

class WsStreamingSocket implements StreamingSocket {
    private handlers: StreamingSocketHandlers | null = null;

    constructor(private readonly ws: WebSocket) {
        // Listeners stay attached for the socket's lifetime so an error after
        // detach never reaches an EventEmitter without an 'error' handler
        ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            const buffer = toBuffer(data);
            this.handlers?.message(isBinary ? new Uint8Array(buffer) : buffer.toString('utf8'));
        });

        ws.on('close', (code: number, reason: Buffer) => {
            this.handlers?.close(code, reason.toString());
        });

        ws.on('error', (error: Error) => {
            if (this.handlers) {
                this.handlers.error(error);
            } else {
                console.warn(`[ws] Error on detached socket: ${error.message}`);
            }
        });
    }

    get isOpen(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }

    send(data: string | Uint8Array): void {
        this.ws.send(data);
    }

    close(code?: number, reason?: string): void {
        this.ws.close(code, reason);
    }

    listen(handlers: StreamingSocketHandlers): () => void {
        this.handlers = handlers;
        return () => {
            if (this.handlers === handlers) {
                this.handlers = null;
            }
        };
    }
}

export class WsSocketConnector implements SocketConnector {
    async open(url: string): Promise<StreamingSocket> {
        const ws = new WebSocket(url);

        await new Promise<void>((resolve, reject) => {
            const onOpen = () => {
                ws.off('error', onError);
                resolve();
            };
            const onError = (error: Error) => {
                ws.off('open', onOpen);
                reject(error);
            };

            ws.once('open', onOpen);
            ws.once('error', onError);
        });

        return new WsStreamingSocket(ws);
    }
}
