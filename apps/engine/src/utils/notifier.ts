/**
 * Wakes every pending waiter on notify(). wait() resolves true when
 * notified and false when the timeout elapses first.
 */
export class Notifier {
    private waiters = new Set<(notified: boolean) => void>();

    wait(timeoutMs: number): Promise<boolean> {
        return new Promise(resolve => {
            const timeout = setTimeout(() => {
                this.waiters.delete(settle);
                resolve(false);
            }, Math.max(0, timeoutMs));
            timeout.unref();

            const settle = (notified: boolean) => {
                clearTimeout(timeout);
                this.waiters.delete(settle);
                resolve(notified);
            };
            this.waiters.add(settle);
        });
    }

    notify(): void {
        for (const settle of Array.from(this.waiters)) {
            settle(true);
        }
    }

    get waiting(): number {
        return this.waiters.size;
    }
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms).unref());
