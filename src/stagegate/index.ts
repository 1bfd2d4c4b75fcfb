// Element
export * from './element';

// Locks and gates
export * from './locks';
export * from './gates';

// Schema and stages
export * from './schema';
export * from './stages';

// Process
export * from './process';

// Definitions
export * from './protocol';

// Ambient
export { loadConfig, getConfig, resetConfig, type EngineConfig, type LogLevel } from './config';
export { createLogger, setLogLevel, getLogLevel, type Logger } from './shared/logger';
export { ConfigurationError, DefinitionError } from './errors';

// Types
export * from './types';
