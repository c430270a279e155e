import path from 'path';
import { decodeTask, handlerRegistry } from '@swarmline/sdk';
import '../handlers';
import type { TaskResult, ThreadJob } from '../services/task-executor';

const TAG = '[worker]';

// Load user handler modules
const handlerPaths = process.env.SWARMLINE_HANDLERS?.split(',').filter(Boolean) || [];
for (const p of handlerPaths) {
    const trimmed = p.trim();
    // relative to process.cwd(), not this file
    const resolved = path.isAbsolute(trimmed) ? trimmed : path.resolve(process.cwd(), trimmed);
    try {
        // eslint-disable-next-line
        require(resolved);
        console.log(`${TAG} loaded handlers from: ${resolved}`);
    } catch (err) {
        console.error(`${TAG} failed to load handlers: ${p}`, err);
    }
}

export default async function runTask(job: ThreadJob): Promise<TaskResult> {
    const entry = handlerRegistry.get(job.handler);
    if (!entry) {
        throw new Error(`Handler "${job.handler}" is not registered (known: ${handlerRegistry.list().join(', ') || 'none'})`);
    }

    const payload = decodeTask(job.payload);
    const output = await entry.handler(payload, { workerId: job.workerId, model: job.model });
    const fallback = `${job.handler} finished ${payload.id}`;
    if (typeof output === 'string') return { detail: output, usage: null };
    if (typeof output !== 'object' || output === null) return { detail: fallback, usage: null };
    return { detail: output.detail ?? fallback, usage: output.usage ?? null };
}
