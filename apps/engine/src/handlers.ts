import { taskHandler } from '@swarmline/sdk';

// Built-in handler: acknowledges the task without touching the target paths.
taskHandler('echo', async (task, ctx) => {
    return `${ctx.model} acknowledged "${task.title}" on ${task.branch} (${task.target_paths.join(', ') || 'no paths'})`;
});
