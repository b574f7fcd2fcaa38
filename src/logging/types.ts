/**
 * Logging types and interfaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMessage {
	/** Unique log message ID */
	id?: string;
	/** Log message content */
	message: string;
	/** Timestamp in milliseconds since epoch */
	timestamp: number;
	/** Log level/severity */
	level: LogLevel;
	/** Source of the log */
	source: LogSource;
	/** Agent the entry belongs to (once configured) */
	agentId?: string;
	/** Structured context attached by the caller */
	context?: Record<string, unknown>;
}

export interface LogSource {
	/** Type of log source */
	type: 'system' | 'device';
	/** Component name */
	name: string;
}

export interface LogFilter {
	/** Filter by log level */
	level?: LogLevel;
	/** Filter by component */
	component?: string;
	/** Start timestamp (ms) - logs after this time */
	since?: number;
	/** End timestamp (ms) - logs before this time */
	until?: number;
	/** Maximum number of logs to return (most recent) */
	limit?: number;
}

export interface LogBackend {
	/** Store a log message */
	log(message: LogMessage): Promise<void>;
	/** Retrieve logs matching filter */
	getLogs(filter?: LogFilter): Promise<LogMessage[]>;
	/** Clear old logs */
	cleanup(olderThanMs: number): Promise<number>;
	/** Get total number of stored logs */
	getLogCount(): Promise<number>;
}

/**
 * Standardized component names for structured logging.
 *
 * Usage:
 *   logger.info('Connected', { component: LogComponents.REALTIME_CHANNEL });
 */
export const LogComponents = {
	AGENT: 'Agent',
	CONFIG: 'ConfigStore',
	REALTIME_CHANNEL: 'RealtimeChannel',
	FALLBACK_EXCHANGE: 'FallbackExchange',
	DELIVERY: 'DeliveryRouter',
	HEARTBEAT: 'Heartbeat',
	DISPATCHER: 'CommandDispatcher',
	INBOX: 'CommandInbox',
	PENDING_RESULTS: 'PendingResults',
	DEVICE_PROVIDER: 'DeviceProvider',
	SYSTEM_INFO: 'SystemInfo',
} as const;
