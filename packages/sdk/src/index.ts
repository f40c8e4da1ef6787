// public api for @batchline/sdk
// usage:
//   import { TaskRegistry } from '@batchline/sdk';
//   const registry = new TaskRegistry();
//   registry.register('analyze-document', async ({ documentId }, ctx) => { ... });

export { TaskRegistry, isTaskModule } from './registry';
export {
    TaskRegistryError,
    UnknownTaskError,
    DuplicateTaskError,
    InvalidTaskNameError,
} from './errors';
export type {
    Task,
    TaskHandler,
    TaskContext,
    TaskModule,
    TaskRegistrar,
    RegisterOptions,
} from './types';
export {
    serialize,
    deserialize,
    toJsonEnvelope,
    fromJsonEnvelope,
    SerializationError,
} from './utils/serialization';
export type { JsonEnvelope } from './utils/serialization';
