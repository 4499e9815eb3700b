/**
 * @streamplan/utils
 * 
 * Shared utilities package containing:
 * - Logger factory
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export { ensureDir, safeWriteFile, safeReadFile } from './file.js';

// Path utilities
export { getExtension, siblingPath } from './path.js';

// Type guards
export { isNumber, isPositiveInteger, splitTokens } from './guards.js';

// Logger
export { createLogger, createSilentLogger, type Logger, type CreateLoggerOptions } from './logger.js';
