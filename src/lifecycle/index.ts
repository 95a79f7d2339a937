/**
 * Lifecycle Module - Public API
 */

// Types
export type { HttpServerHandle, LifecycleOptions, ListenAddress } from "./schema.js";
export type { LifecycleError } from "./errors.js";
export type { CollectionLoopOptions } from "./service.js";

// Error utilities
export { formatLifecycleError } from "./errors.js";

// Service functions
export { createCollectionLoops, runLifecycle } from "./service.js";
export { startHttpServer } from "./server.js";
