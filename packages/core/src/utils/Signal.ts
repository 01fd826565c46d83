// Signal
// Single-purpose broadcast channel: one instance per stream (chunks, amplitude, errors, ...)

export type Listener<T> = (value: T) => void;

export class Signal<T> {
    private listeners: Set<Listener<T>> = new Set();

    constructor(private readonly name: string) {}

    /**
     * Register a listener
     * @returns unsubscribe function
     */
    subscribe(listener: Listener<T>): () => void {
        // Wrap so the same function can be subscribed twice and removed independently
        const entry: Listener<T> = (value) => listener(value);
        this.listeners.add(entry);
        return () => {
            this.listeners.delete(entry);
        };
    }

    /**
     * Deliver a value to every listener in subscription order.
     * A throwing listener is logged and does not stop delivery to the rest.
     */
    emit(value: T): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(value);
            } catch (err) {
                console.error(`[signal:${this.name}] Listener failed:`, err);
            }
        }
    }

    clear(): void {
        this.listeners.clear();
    }

    get listenerCount(): number {
        return this.listeners.size;
    }
}
