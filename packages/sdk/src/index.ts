// public api for @swarmline/sdk
// usage:
//   import { taskHandler } from '@swarmline/sdk';
//   taskHandler('codegen', async (task, ctx) => { ... });

export * from './types';
export { taskHandler, handlerRegistry } from './handler';
export type { RegisteredHandler } from './handler';
export {
    serialize,
    deserialize,
    encodeTask,
    decodeTask,
    encodeResult,
    decodeResult,
    SerializationError,
} from './utils/serialization';
