/**
 * The slice of the ioredis client the queue, the result channel and the
 * scheduler lease use. ioredis' `Redis` satisfies it; tests pass an
 * in-process fake.
 */
export interface QueueRedis {
    lpush(key: string, ...values: string[]): Promise<number>;
    rpush(key: string, ...values: string[]): Promise<number>;
    brpop(key: string, timeout: number): Promise<[string, string] | null>;
    rpop(key: string): Promise<string | null>;
    llen(key: string): Promise<number>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
    ltrim(key: string, start: number, stop: number): Promise<'OK'>;
    hset(key: string, field: string, value: string): Promise<number>;
    hget(key: string, field: string): Promise<string | null>;
    hdel(key: string, ...fields: string[]): Promise<number>;
    hgetall(key: string): Promise<Record<string, string>>;
    duplicate(): QueueRedis;
    quit(): Promise<'OK'>;
    disconnect(): void;
}

export interface LeaseRedis {
    set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}
