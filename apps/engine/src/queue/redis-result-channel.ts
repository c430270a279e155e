import { decodeResult, encodeResult, ResultPayload, SerializationError } from '@swarmline/sdk';
import { QueueRedis } from './redis-client';
import { ResultChannel } from './result-channel';
import { sleep } from '../utils/notifier';

const TAG = '[queue]';
const MAX_DRAIN = 1000;

export interface RedisResultChannelOptions {
    prefix?: string;
    pollIntervalMs?: number;
}

export class RedisResultChannel implements ResultChannel {
    private readonly key: string;
    private readonly pollIntervalMs: number;
    private closed = false;

    constructor(
        private readonly redis: QueueRedis,
        opts: RedisResultChannelOptions = {},
    ) {
        this.key = `${opts.prefix ?? 'swarmline'}:results`;
        this.pollIntervalMs = opts.pollIntervalMs ?? 50;
    }

    async publish(report: ResultPayload): Promise<void> {
        await this.redis.lpush(this.key, encodeResult(report));
    }

    async drain(): Promise<ResultPayload[]> {
        const reports: ResultPayload[] = [];
        for (let i = 0; i < MAX_DRAIN; i++) {
            const raw = await this.redis.rpop(this.key);
            if (raw === null) break;
            try {
                reports.push(decodeResult(raw));
            } catch (err) {
                if (!(err instanceof SerializationError)) throw err;
                console.error(`${TAG} dropping malformed report:`, err);
            }
        }
        return reports;
    }

    async waitForReports(timeoutMs: number): Promise<boolean> {
        const deadline = Date.now() + timeoutMs;
        while (!this.closed) {
            if ((await this.redis.llen(this.key)) > 0) return true;
            const remaining = deadline - Date.now();
            if (remaining <= 0) return false;
            await sleep(Math.min(this.pollIntervalMs, remaining));
        }
        return false;
    }

    async size(): Promise<number> {
        return this.redis.llen(this.key);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}
