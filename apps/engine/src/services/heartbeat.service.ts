export interface HeartbeatSink {
    recordHeartbeat(workerId: string): void | Promise<void>;
}

/**
 * Keeps one heartbeat ticker per worker. Each tick reports the worker as
 * alive to the sink; the pool manager reads those timestamps back through
 * the runtime and acts on the ones that go quiet.
 */
export class HeartbeatService {
    private readonly intervalMs: number;
    private tickers = new Map<string, NodeJS.Timeout>();

    constructor(
        private readonly sink: HeartbeatSink,
        intervalMs: number = 5000
    ) {
        this.intervalMs = intervalMs;
    }

    start(workerId: string): void {
        if (this.tickers.has(workerId)) {
            console.warn(`[heartbeat] already running for worker ${workerId}, restarting`);
            this.stop(workerId);
        }

        console.log(`[heartbeat] started for worker ${workerId} (interval: ${this.intervalMs}ms)`);

        this.tick(workerId);
        const handle = setInterval(() => this.tick(workerId), this.intervalMs);
        handle.unref();
        this.tickers.set(workerId, handle);
    }

    stop(workerId: string): void {
        const handle = this.tickers.get(workerId);
        if (handle) {
            clearInterval(handle);
            this.tickers.delete(workerId);
            console.log(`[heartbeat] stopped for worker ${workerId}`);
        }
    }

    stopAll(): void {
        for (const workerId of Array.from(this.tickers.keys())) {
            this.stop(workerId);
        }
    }

    isRunning(workerId: string): boolean {
        return this.tickers.has(workerId);
    }

    get size(): number {
        return this.tickers.size;
    }

    private tick(workerId: string): void {
        Promise.resolve()
            .then(() => this.sink.recordHeartbeat(workerId))
            .catch(err => console.error(`[heartbeat] failed to record for worker ${workerId}:`, err));
    }
}
