/**
 * Local Log Backend
 *
 * Stores logs in memory with optional file-based persistence (JSON lines).
 * Implements log rotation and automatic cleanup.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { LogMessage, LogFilter, LogBackend } from './types';

export interface LocalLogBackendOptions {
	/** Maximum number of logs to keep in memory */
	maxLogs?: number;
	/** Auto-cleanup logs older than this (ms) */
	maxAge?: number;
	/** Directory for log files; persistence is off when unset */
	logDir?: string;
	/** Rotate log file when it reaches this size (bytes) */
	maxFileSize?: number;
}

export class LocalLogBackend implements LogBackend {
	private logs: LogMessage[] = [];
	private logIdCounter = 0;
	private readonly maxLogs: number;
	private readonly maxAge: number;
	private readonly logDir?: string;
	private readonly maxFileSize: number;
	private currentLogFile: string | null = null;
	private currentLogFileSize = 0;
	private cleanupTimer?: NodeJS.Timeout;

	constructor(options: LocalLogBackendOptions = {}) {
		this.maxLogs = options.maxLogs ?? 5000;
		this.maxAge = options.maxAge ?? 24 * 60 * 60 * 1000; // 24 hours
		this.logDir = options.logDir;
		this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
	}

	/**
	 * Create the log directory and start periodic cleanup
	 */
	public async initialize(): Promise<void> {
		if (this.logDir) {
			await fs.mkdir(this.logDir, { recursive: true });
			this.currentLogFile = this.newLogFilePath(this.logDir);
		}

		this.cleanupTimer = setInterval(() => {
			this.cleanup(this.maxAge).catch((error: unknown) => {
				console.error('[LocalLogBackend] Cleanup failed:', error);
			});
		}, 60 * 60 * 1000);
		this.cleanupTimer.unref();
	}

	public stop(): void {
		if (this.cleanupTimer) {
			clearInterval(this.cleanupTimer);
			this.cleanupTimer = undefined;
		}
	}

	public async log(message: LogMessage): Promise<void> {
		const logEntry: LogMessage = {
			...message,
			id: message.id ?? `log-${++this.logIdCounter}`,
		};

		this.logs.push(logEntry);
		if (this.logs.length > this.maxLogs) {
			this.logs.shift();
		}

		if (this.currentLogFile) {
			await this.writeToFile(logEntry);
		}
	}

	public async getLogs(filter?: LogFilter): Promise<LogMessage[]> {
		let filtered = [...this.logs];

		if (!filter) {
			return filtered;
		}

		const { level, component, since, until, limit } = filter;

		if (level !== undefined) {
			filtered = filtered.filter((log) => log.level === level);
		}
		if (component !== undefined) {
			filtered = filtered.filter((log) => log.source.name === component);
		}
		if (since !== undefined) {
			filtered = filtered.filter((log) => log.timestamp >= since);
		}
		if (until !== undefined) {
			filtered = filtered.filter((log) => log.timestamp <= until);
		}
		if (limit !== undefined && limit > 0) {
			filtered = filtered.slice(-limit);
		}

		return filtered;
	}

	/**
	 * Clear logs older than specified time
	 */
	public async cleanup(olderThanMs: number): Promise<number> {
		const cutoffTime = Date.now() - olderThanMs;
		const initialCount = this.logs.length;

		this.logs = this.logs.filter((log) => log.timestamp >= cutoffTime);

		if (this.logDir) {
			await this.cleanupOldLogFiles(this.logDir, cutoffTime);
		}

		return initialCount - this.logs.length;
	}

	public async getLogCount(): Promise<number> {
		return this.logs.length;
	}

	private async writeToFile(logEntry: LogMessage): Promise<void> {
		if (!this.currentLogFile || !this.logDir) {
			return;
		}

		const logLine = JSON.stringify(logEntry) + '\n';
		const lineSize = Buffer.byteLength(logLine, 'utf-8');

		if (this.currentLogFileSize + lineSize > this.maxFileSize) {
			this.currentLogFile = this.newLogFilePath(this.logDir);
			this.currentLogFileSize = 0;
		}

		try {
			await fs.appendFile(this.currentLogFile, logLine, 'utf-8');
			this.currentLogFileSize += lineSize;
		} catch (error) {
			console.error('[LocalLogBackend] Failed to write log to file:', error);
		}
	}

	private newLogFilePath(logDir: string): string {
		return path.join(logDir, `device-agent-${Date.now()}.log`);
	}

	private async cleanupOldLogFiles(logDir: string, cutoffTime: number): Promise<void> {
		try {
			const files = await fs.readdir(logDir);

			for (const file of files) {
				const filePath = path.join(logDir, file);
				if (!file.endsWith('.log') || filePath === this.currentLogFile) {
					continue;
				}

				const stats = await fs.stat(filePath);
				if (stats.mtimeMs < cutoffTime) {
					await fs.unlink(filePath);
				}
			}
		} catch (error) {
			console.error('[LocalLogBackend] Failed to cleanup old log files:', error);
		}
	}
}
