/**
 * Component Logger
 * ================
 *
 * Wrapper around AgentLogger that automatically includes the component name in all log calls.
 *
 * Usage:
 *   const logger = new ComponentLogger(agentLogger, LogComponents.HEARTBEAT);
 *   logger.infoSync('Heartbeat sent'); // component: 'Heartbeat' auto-added
 *   logger.errorSync('Publish failed', error, { path: 'fallback' });
 */

import type { AgentLogger, LogContext } from './agent-logger';

export class ComponentLogger {
	constructor(
		private readonly agentLogger: AgentLogger,
		private readonly component: string,
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	async debug(message: string, context?: LogContext): Promise<void> {
		await this.agentLogger.debug(message, this.mergeContext(context));
	}

	async info(message: string, context?: LogContext): Promise<void> {
		await this.agentLogger.info(message, this.mergeContext(context));
	}

	async warn(message: string, context?: LogContext): Promise<void> {
		await this.agentLogger.warn(message, this.mergeContext(context));
	}

	async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
		await this.agentLogger.error(message, error, this.mergeContext(context));
	}

	debugSync(message: string, context?: LogContext): void {
		this.agentLogger.debugSync(message, this.mergeContext(context));
	}

	infoSync(message: string, context?: LogContext): void {
		this.agentLogger.infoSync(message, this.mergeContext(context));
	}

	warnSync(message: string, context?: LogContext): void {
		this.agentLogger.warnSync(message, this.mergeContext(context));
	}

	errorSync(message: string, error?: unknown, context?: LogContext): void {
		this.agentLogger.errorSync(message, error, this.mergeContext(context));
	}
}
