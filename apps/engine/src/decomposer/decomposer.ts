import { TaskPriority } from '@swarmline/sdk';

/**
 * One decomposed unit of work as the decomposer emits it. `key` names the
 * description inside its batch; `depends_on` refers to keys of the same
 * batch or to ids already in the store. The shape is untrusted until
 * ingestion validates it.
 */
export interface TaskDescription {
    key?: string;
    title: string;
    instruction: string;
    target_paths?: string[];
    branch?: string;
    priority?: TaskPriority;
    depends_on?: string[];
}

export interface Decomposer {
    decompose(goal: string): Promise<TaskDescription[]>;
}
