/**
 * Agent Logger
 * =============
 *
 * Structured logging for agent-level events (channel, heartbeat, dispatcher, etc.)
 * Writes to the console and forwards every entry to the configured LogBackends.
 *
 * Usage:
 *   const logger = new AgentLogger(backends);
 *   await logger.info('Channel connected', { component: LogComponents.REALTIME_CHANNEL });
 *   await logger.error('Heartbeat failed', error, { component: LogComponents.HEARTBEAT });
 */

import type { LogBackend, LogLevel, LogMessage } from './types';

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

// Log level hierarchy for filtering
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export class AgentLogger {
	private readonly backends: LogBackend[];
	private agentId?: string;
	private minLogLevel: LogLevel;

	constructor(backends: LogBackend | LogBackend[] = [], initialLogLevel: LogLevel = 'info') {
		this.backends = Array.isArray(backends) ? backends : [backends];
		this.minLogLevel = initialLogLevel;
	}

	/**
	 * Tag all subsequent logs with the agent ID
	 */
	public setAgentId(agentId: string): void {
		this.agentId = agentId || undefined;
	}

	/**
	 * Update the minimum log level
	 */
	public setLogLevel(level: LogLevel): void {
		if (level === this.minLogLevel) {
			return;
		}
		const oldLevel = this.minLogLevel;
		this.minLogLevel = level;
		// Always shown, regardless of the new level
		this.consoleLog('info', `Log level changed: ${oldLevel} -> ${level}`, { component: 'AgentLogger' });
	}

	public getLogLevel(): LogLevel {
		return this.minLogLevel;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.minLogLevel];
	}

	public async debug(message: string, context?: LogContext): Promise<void> {
		await this.log('debug', message, context);
	}

	public async info(message: string, context?: LogContext): Promise<void> {
		await this.log('info', message, context);
	}

	public async warn(message: string, context?: LogContext): Promise<void> {
		await this.log('warn', message, context);
	}

	public async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
		await this.log('error', message, { ...context, ...errorContext(error) });
	}

	/**
	 * Core logging method. Never rejects: a failing backend is reported on stderr.
	 */
	private async log(level: LogLevel, message: string, context?: LogContext): Promise<void> {
		if (!this.shouldLog(level)) {
			return;
		}

		const logMessage: LogMessage = {
			timestamp: Date.now(),
			level,
			message,
			source: {
				type: 'system',
				name: context?.component || 'agent',
			},
			...(this.agentId && { agentId: this.agentId }),
			...(context && { context }),
		};

		this.consoleLog(level, message, context);

		await Promise.all(
			this.backends.map(backend =>
				backend.log(logMessage).catch((err: unknown) => {
					console.error('[AgentLogger] Failed to log to backend:', err);
				}),
			),
		);
	}

	/**
	 * Console output (for development and journald)
	 */
	private consoleLog(level: LogLevel, message: string, context?: LogContext): void {
		const timestamp = new Date().toISOString();
		const component = context?.component || 'agent';
		let output = `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;

		if (context) {
			const { component: _, ...otherContext } = context;
			if (Object.keys(otherContext).length > 0) {
				output += ` ${JSON.stringify(otherContext)}`;
			}
		}

		switch (level) {
			case 'debug':
			case 'info':
				console.log(output);
				break;
			case 'warn':
				console.warn(output);
				break;
			case 'error':
				console.error(output);
				break;
		}
	}

	/**
	 * Synchronous log methods (for places where async is difficult)
	 * These don't wait for backend writes
	 */
	public debugSync(message: string, context?: LogContext): void {
		void this.log('debug', message, context);
	}

	public infoSync(message: string, context?: LogContext): void {
		void this.log('info', message, context);
	}

	public warnSync(message: string, context?: LogContext): void {
		void this.log('warn', message, context);
	}

	public errorSync(message: string, error?: unknown, context?: LogContext): void {
		void this.log('error', message, { ...context, ...errorContext(error) });
	}
}

function errorContext(error: unknown): LogContext {
	if (error === undefined) {
		return {};
	}
	if (error instanceof Error) {
		return {
			error: {
				name: error.name,
				message: error.message,
				stack: error.stack,
			},
		};
	}
	return { error: { message: String(error) } };
}
