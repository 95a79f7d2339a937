/**
 * Setup Module - Public API
 */

// Types
export type { SetupAnswers, SetupDefaults } from "./schema.js";
export type { SetupError } from "./errors.js";
export type { SetupOptions } from "./service.js";

export { DEFAULT_ENV_FILE } from "./schema.js";

// Error utilities
export { formatSetupError } from "./errors.js";

// Service functions
export { runSetup } from "./service.js";
