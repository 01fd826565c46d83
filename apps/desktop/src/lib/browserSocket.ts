// Browser WebSocket transport for the streaming transcription session

import { TransportError, type SocketConnector, type StreamingSocket, type StreamingSocketHandlers } from '@earshot/core';

/** The members of the DOM WebSocket this transport uses */
export interface BrowserWebSocket {
    readonly readyState: number;
    binaryType: BinaryType;
    onopen: ((event: Event) => void) | null;
    onmessage: ((event: MessageEvent) => void) | null;
    onclose: ((event: CloseEvent) => void) | null;
    onerror: ((event: Event) => void) | null;
    send(data: string | ArrayBuffer): void;
    close(code?: number, reason?: string): void;
}

export type CreateWebSocket = (url: string) => BrowserWebSocket;

const OPEN = 1;

export class BrowserStreamingSocket implements StreamingSocket {
    private handlers: StreamingSocketHandlers | null = null;

    constructor(private readonly socket: BrowserWebSocket) {
        socket.onmessage = (event) => this.handleMessage(event.data);
        socket.onclose = (event) => this.handlers?.close(event.code, event.reason);
        socket.onerror = () => this.handlers?.error(new TransportError('WebSocket error'));
    }

    get isOpen(): boolean {
        return this.socket.readyState === OPEN;
    }

    send(data: string | Uint8Array): void {
        if (typeof data === 'string') {
            this.socket.send(data);
            return;
        }

        // Copy into a standalone ArrayBuffer; the chunk may be a view into a larger one
        const buffer = new ArrayBuffer(data.length);
        new Uint8Array(buffer).set(data);
        this.socket.send(buffer);
    }

    close(code?: number, reason?: string): void {
        this.socket.close(code, reason);
    }

    listen(handlers: StreamingSocketHandlers): () => void {
        this.handlers = handlers;
        return () => {
            if (this.handlers === handlers) {
                this.handlers = null;
            }
        };
    }

    private handleMessage(data: unknown): void {
        if (!this.handlers) {
            console.warn('[socket] Message received with no listener attached');
            return;
        }

        if (typeof data === 'string') {
            this.handlers.message(data);
        } else if (data instanceof ArrayBuffer) {
            this.handlers.message(new Uint8Array(data));
        } else {
            console.warn('[socket] Ignoring frame of unsupported type');
        }
    }
}

export class BrowserSocketConnector implements SocketConnector {
    constructor(private readonly createSocket: CreateWebSocket = (url) => new WebSocket(url)) {}

    open(url: string): Promise<StreamingSocket> {
        return new Promise((resolve, reject) => {
            const socket = this.createSocket(url);
            socket.binaryType = 'arraybuffer';

            socket.onopen = () => {
                socket.onopen = null;
                resolve(new BrowserStreamingSocket(socket));
            };
            socket.onerror = () => {
                reject(new TransportError('WebSocket connection failed'));
            };
            socket.onclose = (event) => {
                reject(new TransportError(`WebSocket closed before opening: ${event.code}`, { reason: event.reason }));
            };
        });
    }
}
