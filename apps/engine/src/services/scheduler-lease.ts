import { LeaseRedis } from '../queue';

export const SCHEDULER_LEASE_KEY = 'swarmline:scheduler:leader';

const RELEASE_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("del", KEYS[1])
    else
        return 0
    end
`;

const RENEW_SCRIPT = `
    if redis.call("get", KEYS[1]) == ARGV[1] then
        return redis.call("expire", KEYS[1], ARGV[2])
    else
        return 0
    end
`;

/**
 * Guards the single-scheduler assumption with a TTL'd SET NX key. Not a
 * consensus protocol: it only keeps a second process from starting its own
 * scheduler against the same Redis.
 */
export class SchedulerLease {
    private renewalInterval: NodeJS.Timeout | null = null;
    private lost = false;

    constructor(
        private readonly redis: LeaseRedis,
        private readonly ttlSeconds: number,
        readonly holderId: string = `scheduler-${process.pid}-${Date.now()}`,
        private readonly onLost: () => void = () => undefined,
    ) { }

    async acquire(): Promise<boolean> {
        // SET NX with TTL: atomic
        const result = await this.redis.set(SCHEDULER_LEASE_KEY, this.holderId, 'EX', this.ttlSeconds, 'NX');
        if (result === 'OK') {
            this.startRenewal();
            return true;
        }

        // same holder after a restart
        const current = await this.redis.get(SCHEDULER_LEASE_KEY);
        if (current === this.holderId) {
            this.startRenewal();
            return true;
        }
        return false;
    }

    async release(): Promise<void> {
        this.stopRenewal();
        await this.redis.eval(RELEASE_SCRIPT, 1, SCHEDULER_LEASE_KEY, this.holderId);
    }

    async isHeld(): Promise<boolean> {
        return (await this.redis.get(SCHEDULER_LEASE_KEY)) === this.holderId;
    }

    get wasLost(): boolean {
        return this.lost;
    }

    async renew(): Promise<boolean> {
        const result = await this.redis.eval(RENEW_SCRIPT, 1, SCHEDULER_LEASE_KEY, this.holderId, this.ttlSeconds);
        return result === 1;
    }

    private startRenewal(): void {
        if (this.renewalInterval) return;
        // Renew at half the TTL
        const renewalMs = (this.ttlSeconds * 1000) / 2;

        this.renewalInterval = setInterval(() => {
            this.renew()
                .then(held => {
                    if (held) return;
                    console.error(`[lease] scheduler lease ${SCHEDULER_LEASE_KEY} lost by ${this.holderId}`);
                    this.lost = true;
                    this.stopRenewal();
                    this.onLost();
                })
                .catch(err => console.error('[lease] scheduler lease renewal failed:', err));
        }, renewalMs);
        this.renewalInterval.unref();
    }

    private stopRenewal(): void {
        if (this.renewalInterval) {
            clearInterval(this.renewalInterval);
            this.renewalInterval = null;
        }
    }
}
