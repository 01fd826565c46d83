// Streaming Socket
// Transport seam between the session and a concrete WebSocket (ws on Node, WebSocket in the browser)

export interface StreamingSocketHandlers {
    /** Text frames arrive as strings, binary frames as bytes */
    message(data: string | Uint8Array): void;
    close(code: number, reason: string): void;
    error(error: Error): void;
}

export interface StreamingSocket {
    readonly isOpen: boolean;
    send(data: string | Uint8Array): void;
    close(code?: number, reason?: string): void;

    /**
     * Attach the single inbound handler set.
     * @returns function that detaches it
     */
    listen(handlers: StreamingSocketHandlers): () => void;
}

export interface SocketConnector {
    /** Resolves once the socket is open; rejects if it fails to open */
    open(url: string): Promise<StreamingSocket>;
}
