export * from './epistemics/index.js';
export { logDebug, logError, logInfo, logWarning } from './telemetry/logger.js';
