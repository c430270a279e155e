import { ResultPayload } from '@swarmline/sdk';
import { Notifier } from '../utils/notifier';

/**
 * Completion/failure reports. Many workers publish, the scheduler alone
 * drains. No ordering is promised between reports.
 */
export interface ResultChannel {
    publish(report: ResultPayload): Promise<void>;
    drain(): Promise<ResultPayload[]>;
    /** true when woken by a report (or close), false when the timeout elapsed first. */
    waitForReports(timeoutMs: number): Promise<boolean>;
    size(): Promise<number>;
    close(): Promise<void>;
}

export class InMemoryResultChannel implements ResultChannel {
    private reports: ResultPayload[] = [];
    private readonly arrived = new Notifier();
    private closed = false;

    async publish(report: ResultPayload): Promise<void> {
        if (this.closed) {
            throw new Error('result channel is closed');
        }
        this.reports.push(report);
        this.arrived.notify();
    }

    async drain(): Promise<ResultPayload[]> {
        const reports = this.reports;
        this.reports = [];
        return reports;
    }

    async waitForReports(timeoutMs: number): Promise<boolean> {
        if (this.reports.length > 0) return true;
        if (this.closed) return false;
        return this.arrived.wait(timeoutMs);
    }

    async size(): Promise<number> {
        return this.reports.length;
    }

    async close(): Promise<void> {
        this.closed = true;
        this.arrived.notify();
    }
}
