/**
 * Logging Module
 * ==============
 */

export * from './types';
export { AgentLogger } from './agent-logger';
export type { LogContext } from './agent-logger';
export { ComponentLogger } from './component-logger';
export { LocalLogBackend } from './local-backend';
export type { LocalLogBackendOptions } from './local-backend';
