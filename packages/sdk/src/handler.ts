import { TaskHandler } from './types';

export interface RegisteredHandler {
    name: string;
    handler: TaskHandler;
}

class Registry {
    private handlers = new Map<string, RegisteredHandler>();
    private static readonly NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 100;

    register(name: string, handler: TaskHandler): RegisteredHandler {
        if (!name || name.length === 0) {
            throw new Error('Handler name cannot be empty');
        }
        if (name.length > Registry.MAX_NAME_LENGTH) {
            throw new Error(`Handler name exceeds maximum length of ${Registry.MAX_NAME_LENGTH} characters`);
        }
        if (!Registry.NAME_PATTERN.test(name)) {
            throw new Error('Handler name must contain only alphanumeric characters, dashes, and underscores');
        }
        if (this.handlers.has(name)) {
            throw new Error(`Handler "${name}" is already registered.`);
        }
        const entry: RegisteredHandler = { name, handler };
        this.handlers.set(name, entry);
        return entry;
    }

    get(name: string): RegisteredHandler | undefined {
        return this.handlers.get(name);
    }

    list(): string[] {
        return Array.from(this.handlers.keys());
    }

    unregister(name: string): boolean {
        return this.handlers.delete(name);
    }
}

export const handlerRegistry = new Registry();

// usage (in a module listed in SWARMLINE_HANDLERS):
//   taskHandler('codegen', async (task, ctx) => { ...; return 'patched 2 files'; });
export function taskHandler(name: string, handler: TaskHandler): RegisteredHandler {
    return handlerRegistry.register(name, handler);
}
