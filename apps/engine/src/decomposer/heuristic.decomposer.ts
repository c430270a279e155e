import { TaskPriority } from '@swarmline/sdk';
import keywords from './keywords.json';
import { Decomposer, TaskDescription } from './decomposer';

const TAG = '[decomposer]';

const BULLET = /^(?:[-*+•]|\d+[.)])\s+/;
const AFTER = /\(after\s+([\d,\s]+)\)\s*$/i;
const MIN_LINE_LENGTH = 10;
const MAX_TITLE_LENGTH = 50;

const actions = new Set(keywords.actions);
const skip = new Set(keywords.skip);
const highWords = new Set(keywords.priority.high);
const lowWords = new Set(keywords.priority.low);

export function taskKey(n: number): string {
    return `task-${String(n).padStart(2, '0')}`;
}

export function slugify(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 40)
        .replace(/-+$/, '');
}

function titleCase(text: string): string {
    return text
        .split(/\s+/)
        .filter(Boolean)
        .map(word => word[0].toUpperCase() + word.slice(1))
        .join(' ');
}

function words(text: string): string[] {
    return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

/**
 * Line-oriented decomposer: one task per meaningful line of a requirements
 * document. A line ending in `(after 1, 3)` depends on tasks 1 and 3.
 */
export class HeuristicDecomposer implements Decomposer {
    async decompose(goal: string): Promise<TaskDescription[]> {
        const tasks: TaskDescription[] = [];

        for (const raw of goal.split(/\r?\n/)) {
            let line = raw.trim();
            if (line === '' || line.startsWith('#')) continue;
            line = line.replace(BULLET, '').trim();

            let after: number[] = [];
            const match = AFTER.exec(line);
            if (match) {
                after = match[1].split(',').map(s => Number(s.trim())).filter(n => Number.isInteger(n) && n > 0);
                line = line.slice(0, match.index).trim();
            }

            if (line.length < MIN_LINE_LENGTH) continue;
            if (skip.has(line.toLowerCase().replace(/[:.]+$/, ''))) continue;

            const key = taskKey(tasks.length + 1);
            const { title, instruction } = this.phrase(line);
            tasks.push({
                key,
                title,
                instruction,
                target_paths: this.targetPaths(line),
                branch: `feature/${key}-${slugify(title)}`,
                priority: this.priority(line),
                depends_on: after.map(taskKey),
            });
        }

        console.log(`${TAG} decomposed goal into ${tasks.length} tasks`);
        return tasks;
    }

    private phrase(line: string): { title: string; instruction: string } {
        const [first, ...rest] = line.split(/\s+/);
        const action = first.toLowerCase().replace(/[^a-z]/g, '');
        const target = rest.join(' ').replace(/[.;:]+$/, '');

        if (actions.has(action) && target !== '') {
            return {
                title: `${action[0].toUpperCase()}${action.slice(1)} ${titleCase(target)}`,
                instruction: `${action} ${target}`,
            };
        }
        return { title: line.slice(0, MAX_TITLE_LENGTH), instruction: line };
    }

    private priority(line: string): TaskPriority {
        const tokens = words(line);
        if (tokens.some(w => highWords.has(w))) return 'high';
        if (tokens.some(w => lowWords.has(w))) return 'low';
        return 'medium';
    }

    private targetPaths(line: string): string[] {
        const tokens = new Set(words(line));
        const paths: string[] = [];
        for (const topic of keywords.topics) {
            if (!topic.keywords.some(k => tokens.has(k))) continue;
            for (const path of topic.paths) {
                if (!paths.includes(path)) paths.push(path);
            }
        }
        return paths.length > 0 ? paths : [...keywords.defaultPaths];
    }
}
