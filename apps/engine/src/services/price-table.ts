import fs from 'fs/promises';
import { TokenUsage } from '@swarmline/sdk';
import { CostTotals } from '../db/worker.entity';
import { ConfigError } from '../errors';
import builtInPrices from './model-prices.json';

const TAG = '[pricing]';

/** USD per million tokens. */
export interface ModelPrice {
    input: number;
    output: number;
}

const FREE: ModelPrice = { input: 0, output: 0 };

function rate(value: unknown, where: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${where} must be a non-negative number`);
    }
    return value;
}

/**
 * Per-model token prices. A model missing from the table costs nothing, so
 * its tokens are still counted.
 */
export class PriceTable {
    private readonly prices: ReadonlyMap<string, ModelPrice>;

    constructor(prices: Iterable<[string, ModelPrice]> = []) {
        this.prices = new Map(prices);
    }

    /** Validates a `{ "<model>": { "input": n, "output": n } }` document. */
    static fromJson(raw: unknown, source = 'model prices'): PriceTable {
        if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
            throw new ConfigError(`${source} must be an object keyed by model`);
        }
        const entries: [string, ModelPrice][] = [];
        for (const [model, price] of Object.entries(raw)) {
            if (typeof price !== 'object' || price === null) {
                throw new ConfigError(`${source}: price of ${model} must be an object`);
            }
            entries.push([model, {
                input: rate('input' in price ? price.input : undefined, `${source}: ${model}.input`),
                output: rate('output' in price ? price.output : undefined, `${source}: ${model}.output`),
            }]);
        }
        return new PriceTable(entries);
    }

    static builtIn(): PriceTable {
        return PriceTable.fromJson(builtInPrices, 'model-prices.json');
    }

    price(model: string): ModelPrice {
        return this.prices.get(model) ?? FREE;
    }

    charge(model: string, usage: TokenUsage): CostTotals {
        const { input, output } = this.price(model);
        return {
            input_tokens: usage.input_tokens,
            output_tokens: usage.output_tokens,
            cost: (usage.input_tokens / 1_000_000) * input + (usage.output_tokens / 1_000_000) * output,
        };
    }
}

export async function loadPriceTable(file: string | null): Promise<PriceTable> {
    if (!file) return PriceTable.builtIn();

    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (err) {
        throw new ConfigError(`cannot read MODEL_PRICES_FILE ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const table = PriceTable.fromJson(raw, file);
    console.log(`${TAG} loaded prices from ${file}`);
    return table;
}
