/**
 * Fallback Exchange
 *
 * HTTP request/response path to the dashboard, used whenever the real-time
 * channel is not connected or a real-time send fails. Heartbeat responses may
 * carry commands the dashboard queued while the channel was down.
 *
 * Both calls are best-effort: failures are logged and reported as not accepted.
 */

import axios from 'axios';
import { z } from 'zod';
import { describeError } from '../errors';
import { parseCommand } from '../commands/types';
import type { Command, CommandId, CommandResult } from '../commands/types';
import type { AgentIdentity } from '../config-loader';
import type { HeartbeatPayload } from '../heartbeat/types';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import { buildDashboardEndpoint } from '../utils/api-utils';
import { getHttpStatus, getNetworkErrorType } from '../utils/network-errors';

export interface HttpResponse {
	status: number;
	data: unknown;
}

export interface HttpRequestOptions {
	headers: Record<string, string>;
	timeout: number;
}

export interface DashboardHttpClient {
	post(url: string, body: unknown, options: HttpRequestOptions): Promise<HttpResponse>;
}

export interface FallbackExchangeConfig {
	getIdentity: () => AgentIdentity;
	requestTimeoutMs?: number;
	userAgent?: string;
}

export interface HeartbeatExchangeResult {
	accepted: boolean;
	queuedCommands: Command[];
}

const HeartbeatResponseSchema = z
	.object({
		success: z.boolean().optional(),
		commands: z.array(z.unknown()).nullish(),
	})
	.passthrough();

/**
 * Default client on axios; non-2xx responses reject
 */
export function createAxiosHttpClient(userAgent: string): DashboardHttpClient {
	const instance = axios.create({
		headers: {
			'Content-Type': 'application/json',
			'User-Agent': userAgent,
		},
	});

	return {
		async post(url, body, options) {
			const response = await instance.post<unknown>(url, body, {
				headers: options.headers,
				timeout: options.timeout,
			});
			return { status: response.status, data: response.data };
		},
	};
}

export class FallbackExchange {
	private readonly logger: ComponentLogger;
	private readonly httpClient: DashboardHttpClient;
	private readonly requestTimeoutMs: number;

	constructor(
		private readonly config: FallbackExchangeConfig,
		agentLogger: AgentLogger,
		httpClient?: DashboardHttpClient,
	) {
		this.logger = new ComponentLogger(agentLogger, LogComponents.FALLBACK_EXCHANGE);
		this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
		this.httpClient = httpClient ?? createAxiosHttpClient(config.userAgent ?? 'device-agent');
	}

	/**
	 * POST the heartbeat; collect any commands queued in the response
	 */
	public async publishHeartbeat(payload: HeartbeatPayload): Promise<HeartbeatExchangeResult> {
		const identity = this.config.getIdentity();
		const url = buildDashboardEndpoint(identity.dashboardUrl, '/agents/heartbeat');

		let response: HttpResponse;
		try {
			response = await this.httpClient.post(url, payload, this.requestOptions(identity));
		} catch (error) {
			this.logFailure('Heartbeat POST failed', error, { url });
			return { accepted: false, queuedCommands: [] };
		}

		this.logger.debugSync(`Heartbeat sent via HTTP (${payload.devices.length} devices)`, { status: response.status });
		return { accepted: true, queuedCommands: this.extractCommands(response.data) };
	}

	/**
	 * POST one command result. Never rejects.
	 */
	public async publishCommandResult(commandId: CommandId, result: CommandResult): Promise<boolean> {
		const identity = this.config.getIdentity();
		const url = buildDashboardEndpoint(
			identity.dashboardUrl,
			`/agents/command/${encodeURIComponent(String(commandId))}/result`,
		);

		try {
			await this.httpClient.post(url, result, this.requestOptions(identity));
			this.logger.debugSync('Command result sent via HTTP', { commandId });
			return true;
		} catch (error) {
			this.logFailure('Command result POST failed', error, { url, commandId });
			return false;
		}
	}

	private requestOptions(identity: AgentIdentity): HttpRequestOptions {
		return {
			headers: { 'X-API-Key': identity.apiKey },
			timeout: this.requestTimeoutMs,
		};
	}

	private extractCommands(data: unknown): Command[] {
		const parsed = HeartbeatResponseSchema.safeParse(data);
		if (!parsed.success || !parsed.data.commands) {
			return [];
		}

		const commands: Command[] = [];
		for (const raw of parsed.data.commands) {
			try {
				const command = parseCommand(raw);
				if (command.rejection !== undefined) {
					this.logger.warnSync('Malformed queued command, answering with failure', {
						commandId: command.id,
						reason: command.rejection,
					});
				}
				commands.push(command);
			} catch (error) {
				this.logger.warnSync('Skipping invalid queued command', { reason: describeError(error) });
			}
		}

		if (commands.length > 0) {
			this.logger.infoSync(`Received ${commands.length} queued commands`);
		}
		return commands;
	}

	private logFailure(message: string, error: unknown, context: Record<string, unknown>): void {
		this.logger.warnSync(message, {
			...context,
			errorType: getNetworkErrorType(error),
			status: getHttpStatus(error),
			reason: describeError(error),
		});
	}
}
