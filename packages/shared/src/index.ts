/**
 * @stackwright/shared - Shared Types, Schemas, Constants & Errors
 */

// Types
export * from './types/index.js';

// Schemas
export * from './schemas/index.js';

// Constants
export * from './constants/index.js';

// Errors
export * from './errors/index.js';

// Utils
export { parseEnvContent } from './utils/env-file.js';
export { sleep, type Sleep } from './utils/sleep.js';
export { errorCause, errorCode, errorField, isError, toError } from './utils/error-fields.js';
