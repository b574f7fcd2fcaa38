/**
 * Agent Configuration Store
 * =========================
 * Loads configuration from multiple sources with priority:
 * 1. Config file (config.json) - highest priority
 * 2. Environment variables
 * 3. Default values
 *
 * The agent is ready once apiKey and dashboardUrl are both set. reconfigure()
 * persists new credentials atomically (temp file + rename) and emits 'changed'.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigFault, describeError } from './errors';
import type { AgentLogger } from './logging/agent-logger';
import { ComponentLogger } from './logging/component-logger';
import { LogComponents } from './logging/types';
import { isValidDashboardUrl } from './utils/api-utils';

export const DEFAULT_CONFIG_DIR = '/etc/device-agent';
export const CONFIG_FILE_NAME = 'config.json';

export const AgentConfigSchema = z.object({
	agentId: z.string().default(''),
	apiKey: z.string().default(''),
	dashboardUrl: z.string().default(''),
	heartbeatIntervalSeconds: z.number().int().positive().default(30),
	useRealtimeTransport: z.boolean().default(true),

	// Tunables
	reconnectDelaySeconds: z.number().positive().default(10),
	reconnectStrategy: z.enum(['fixed', 'exponential']).default('fixed'),
	maxReconnectDelaySeconds: z.number().positive().default(300),
	requestTimeoutSeconds: z.number().positive().default(30),
	commandTimeoutSeconds: z.number().positive().default(180),
	readinessPollSeconds: z.number().positive().default(5),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	logDir: z.string().min(1).optional(),
	deviceHandlerDir: z.string().min(1).default('/usr/lib/device-agent/handlers'),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

const AgentConfigLayerSchema = AgentConfigSchema.partial();

type AgentConfigLayer = z.infer<typeof AgentConfigLayerSchema>;

/**
 * Read-only identity used to authenticate against the dashboard
 */
export interface AgentIdentity {
	readonly agentId: string;
	readonly apiKey: string;
	readonly dashboardUrl: string;
}

export interface ReconfigureOptions {
	apiKey: string;
	dashboardUrl: string;
	agentId?: string;
}

interface ConfigStoreEvents {
	'changed': (config: AgentConfig, previous: AgentConfig) => void;
}

/**
 * Config file location: AGENT_CONFIG_PATH, else CONFIG_DIR/config.json
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	if (env.AGENT_CONFIG_PATH) {
		return env.AGENT_CONFIG_PATH;
	}
	return path.join(env.CONFIG_DIR || DEFAULT_CONFIG_DIR, CONFIG_FILE_NAME);
}

export class ConfigStore extends EventEmitter {
	private config: AgentConfig;
	private readonly configPath: string;
	private readonly env: NodeJS.ProcessEnv;
	private logger?: ComponentLogger;

	constructor(options: { configPath?: string; env?: NodeJS.ProcessEnv; logger?: AgentLogger } = {}) {
		super();
		this.env = options.env ?? process.env;
		this.configPath = options.configPath ?? resolveConfigPath(this.env);
		this.logger = options.logger && new ComponentLogger(options.logger, LogComponents.CONFIG);
		this.config = this.load();
	}

	public setLogger(logger: AgentLogger): void {
		this.logger = new ComponentLogger(logger, LogComponents.CONFIG);
	}

	public getConfigPath(): string {
		return this.configPath;
	}

	public getConfig(): AgentConfig {
		return { ...this.config };
	}

	/**
	 * Ready = non-empty apiKey and dashboardUrl
	 */
	public isReady(): boolean {
		return this.config.apiKey.trim() !== '' && this.config.dashboardUrl.trim() !== '';
	}

	public getIdentity(): AgentIdentity {
		return {
			agentId: this.config.agentId || os.hostname(),
			apiKey: this.config.apiKey,
			dashboardUrl: this.config.dashboardUrl,
		};
	}

	/**
	 * Re-read env and file. Emits 'changed' when the merged result differs.
	 */
	public reload(): AgentConfig {
		const previous = this.config;
		const next = this.load();
		this.config = next;

		if (JSON.stringify(previous) !== JSON.stringify(next)) {
			this.emit('changed', { ...next }, { ...previous });
		}
		return this.getConfig();
	}

	/**
	 * Persist new credentials and swap them in
	 *
	 * @throws ConfigFault for an empty API key, an invalid URL or a failed write
	 */
	public async reconfigure(options: ReconfigureOptions): Promise<AgentConfig> {
		const apiKey = options.apiKey.trim();
		if (!apiKey) {
			throw new ConfigFault('API key is required');
		}
		if (!isValidDashboardUrl(options.dashboardUrl)) {
			throw new ConfigFault(`Invalid dashboard URL: ${options.dashboardUrl}`);
		}
		const dashboardUrl = options.dashboardUrl.trim().replace(/\/+$/, '');

		const fileContent: Record<string, unknown> = {
			...this.readFileObject(),
			apiKey,
			dashboardUrl,
			...(options.agentId !== undefined && { agentId: options.agentId }),
		};

		const tempPath = `${this.configPath}.${process.pid}.tmp`;
		try {
			await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true });
			await fs.promises.writeFile(tempPath, JSON.stringify(fileContent, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
			await fs.promises.rename(tempPath, this.configPath);
		} catch (error) {
			await fs.promises.rm(tempPath, { force: true });
			throw new ConfigFault(`Failed to save configuration to ${this.configPath}: ${describeError(error)}`, { cause: error });
		}

		this.logger?.infoSync('Configuration saved', { path: this.configPath, dashboardUrl });

		const previous = this.config;
		this.config = this.load();
		this.emit('changed', this.getConfig(), { ...previous });
		return this.getConfig();
	}

	private load(): AgentConfig {
		const merged = {
			...this.sanitizeLayer(this.readEnvLayer(), 'environment'),
			...this.sanitizeLayer(this.readFileObject(), this.configPath),
		};

		const parsed = AgentConfigSchema.safeParse(merged);
		if (parsed.success) {
			return parsed.data;
		}

		this.reportFault(new ConfigFault('Configuration invalid, using defaults', { cause: parsed.error }));
		return AgentConfigSchema.parse({});
	}

	/**
	 * Parsed config file, or {} when absent or unreadable
	 */
	private readFileObject(): Record<string, unknown> {
		let content: string;
		try {
			if (!fs.existsSync(this.configPath)) {
				return {};
			}
			content = fs.readFileSync(this.configPath, 'utf-8');
		} catch (error) {
			this.reportFault(new ConfigFault(`Failed to read ${this.configPath}`, { cause: error }));
			return {};
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (error) {
			this.reportFault(new ConfigFault(`Config file ${this.configPath} is not valid JSON`, { cause: error }));
			return {};
		}

		const object = z.record(z.unknown()).safeParse(raw);
		if (!object.success) {
			this.reportFault(new ConfigFault(`Config file ${this.configPath} must contain a JSON object`));
			return {};
		}

		// Older files name the transport switch useWebSocket
		const legacy = object.data.useWebSocket;
		if (object.data.useRealtimeTransport === undefined && typeof legacy === 'boolean') {
			return { ...object.data, useRealtimeTransport: legacy };
		}
		return object.data;
	}

	private readEnvLayer(): Record<string, unknown> {
		const env = this.env;
		const layer: Record<string, unknown> = {
			agentId: env.AGENT_ID,
			apiKey: env.API_KEY,
			dashboardUrl: env.DASHBOARD_URL,
			heartbeatIntervalSeconds: parseNumber(env.HEARTBEAT_INTERVAL_SECONDS),
			useRealtimeTransport: parseBoolean(env.USE_REALTIME_TRANSPORT),
			reconnectDelaySeconds: parseNumber(env.RECONNECT_DELAY_SECONDS),
			reconnectStrategy: env.RECONNECT_STRATEGY,
			maxReconnectDelaySeconds: parseNumber(env.MAX_RECONNECT_DELAY_SECONDS),
			requestTimeoutSeconds: parseNumber(env.REQUEST_TIMEOUT_SECONDS),
			commandTimeoutSeconds: parseNumber(env.COMMAND_TIMEOUT_SECONDS),
			readinessPollSeconds: parseNumber(env.READINESS_POLL_SECONDS),
			logLevel: env.LOG_LEVEL,
			logDir: env.LOG_DIR,
			deviceHandlerDir: env.DEVICE_HANDLER_DIR,
		};

		// Remove undefined values
		for (const key of Object.keys(layer)) {
			if (layer[key] === undefined) {
				delete layer[key];
			}
		}
		return layer;
	}

	/**
	 * Validate one source; invalid keys are reported and dropped
	 */
	private sanitizeLayer(raw: Record<string, unknown>, source: string): AgentConfigLayer {
		const first = AgentConfigLayerSchema.safeParse(raw);
		if (first.success) {
			return first.data;
		}

		const cleaned = { ...raw };
		for (const issue of first.error.issues) {
			const key = issue.path[0];
			if (typeof key === 'string') {
				delete cleaned[key];
				this.reportFault(new ConfigFault(`Ignoring invalid ${key} from ${source}: ${issue.message}`));
			}
		}

		const second = AgentConfigLayerSchema.safeParse(cleaned);
		return second.success ? second.data : {};
	}

	private reportFault(fault: ConfigFault): void {
		if (this.logger) {
			this.logger.warnSync(fault.message, { reason: fault.cause === undefined ? undefined : describeError(fault.cause) });
		} else {
			console.warn(`⚠️  ${fault.message}`);
		}
	}

	// Typed event emitter methods
	public on<K extends keyof ConfigStoreEvents>(event: K, listener: ConfigStoreEvents[K]): this {
		return super.on(event, listener);
	}

	public off<K extends keyof ConfigStoreEvents>(event: K, listener: ConfigStoreEvents[K]): this {
		return super.off(event, listener);
	}

	public emit<K extends keyof ConfigStoreEvents>(event: K, ...args: Parameters<ConfigStoreEvents[K]>): boolean {
		return super.emit(event, ...args);
	}
}

// ========================================================================
// Helpers
// ========================================================================

export function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	const num = Number(value);
	return Number.isFinite(num) ? num : undefined;
}

export function parseBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	const normalized = value.trim().toLowerCase();
	return normalized === 'true' || normalized === '1' || normalized === 'yes';
}
