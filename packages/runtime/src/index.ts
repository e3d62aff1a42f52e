/**
 * @causeway/runtime
 *
 * Logging, concurrency primitives and configuration loading shared by the engine
 */

export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { Semaphore } from './semaphore.js';
export { KeyedMutex } from './keyed-mutex.js';
export { TimeoutError, withTimeout } from './timeout.js';
export { expandEnvVars, loadConfigFile, fingerprintConfig } from './config.js';
export type { EnvExpansionOptions } from './config.js';
