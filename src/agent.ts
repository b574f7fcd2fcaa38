/**
 * DEVICE AGENT
 * ============
 *
 * Owns the lifecycle of the agent's concurrent activities:
 *
 *   1. wait for configuration readiness (re-reading the config file)
 *   2. start, side by side until shutdown:
 *        - real-time channel maintenance (when enabled)
 *        - heartbeat loop (flushes pending results after each tick)
 *        - command consumer (inbox -> dispatcher -> delivery router)
 *        - config watcher
 *   3. on shutdown, give in-flight commands a grace period to report
 *
 * Every command is handled concurrently; its result path is chosen at send time.
 * A result no path accepts waits in the pending result queue.
 */

import { CommandInbox } from './command-inbox';
import type { InboxEntry } from './command-inbox';
import { CommandDispatcher } from './commands/command-dispatcher';
import type { CommandId, CommandResult } from './commands/types';
import type { AgentConfig, AgentIdentity, ConfigStore } from './config-loader';
import type { ConnectionHealth } from './connection-monitor';
import type { DeviceCapabilityProvider } from './devices/types';
import { TransportFault } from './errors';
import { HeartbeatLoop } from './heartbeat/heartbeat-loop';
import type { HeartbeatStats } from './heartbeat/heartbeat-loop';
import { SystemInformationSource, getAgentVersion } from './heartbeat/system-info';
import type { SystemInfoSource } from './heartbeat/system-info';
import type { AgentLogger } from './logging/agent-logger';
import { ComponentLogger } from './logging/component-logger';
import { LogComponents } from './logging/types';
import { OfflineQueue } from './offline-queue';
import { DeliveryRouter } from './transport/delivery-router';
import { FallbackExchange } from './transport/fallback-exchange';
import type { DashboardHttpClient } from './transport/fallback-exchange';
import { RealtimeChannel } from './transport/realtime-channel';
import type { ChannelConnector } from './transport/realtime-channel';
import { WsConnector } from './transport/ws-connector';
import { createReconnectPolicy } from './utils/reconnect-policy';
import type { ReconnectPolicy } from './utils/reconnect-policy';
import { sleep } from './utils/sleep';

export interface DeviceAgentDeps {
	config: ConfigStore;
	provider: DeviceCapabilityProvider;
	logger: AgentLogger;
	connector?: ChannelConnector;
	httpClient?: DashboardHttpClient;
	systemInfo?: SystemInfoSource;
	agentVersion?: string;
	/** How long shutdown waits for in-flight commands */
	commandGracePeriodMs?: number;
	maxPendingResults?: number;
}

export interface PendingResult {
	commandId: CommandId;
	result: CommandResult;
}

export type AgentPhase = 'idle' | 'waiting-for-config' | 'running' | 'stopped';

export interface AgentStatus {
	phase: AgentPhase;
	connection?: ConnectionHealth;
	heartbeat?: HeartbeatStats;
	pendingResults: number;
	inFlightCommands: number;
}

interface RunningComponents {
	dispatcher: CommandDispatcher;
	inbox: CommandInbox;
	router: DeliveryRouter;
	heartbeat: HeartbeatLoop;
	channel?: RealtimeChannel;
}

export class DeviceAgent {
	private readonly logger: ComponentLogger;
	private readonly pendingResults: OfflineQueue<PendingResult>;
	private readonly inFlight = new Set<Promise<void>>();
	private readonly agentVersion: string;
	private components?: RunningComponents;
	private phase: AgentPhase = 'idle';

	constructor(private readonly deps: DeviceAgentDeps) {
		this.logger = new ComponentLogger(deps.logger, LogComponents.AGENT);
		this.agentVersion = deps.agentVersion ?? getAgentVersion();
		this.pendingResults = new OfflineQueue<PendingResult>(
			LogComponents.PENDING_RESULTS,
			deps.maxPendingResults ?? 1000,
			deps.logger,
		);
	}

	/**
	 * Run until the signal aborts
	 */
	public async run(signal: AbortSignal): Promise<void> {
		const { config, logger } = this.deps;
		this.logger.infoSync('Device agent starting', { version: this.agentVersion });

		this.phase = 'waiting-for-config';
		if (!(await this.waitUntilReady(signal))) {
			this.phase = 'stopped';
			return;
		}

		const current = config.getConfig();
		logger.setLogLevel(current.logLevel);
		logger.setAgentId(config.getIdentity().agentId);
		this.logger.infoSync(`Agent configured for ${current.dashboardUrl}`, {
			realtime: current.useRealtimeTransport,
			heartbeatIntervalSeconds: current.heartbeatIntervalSeconds,
		});

		const components = this.buildComponents(current);
		this.components = components;
		this.phase = 'running';

		const onChanged = (next: AgentConfig, previous: AgentConfig) => this.applyConfigChange(next, previous);
		config.on('changed', onChanged);

		try {
			await Promise.all([
				components.channel?.run(signal),
				components.heartbeat.run(signal),
				this.consumeCommands(components, signal),
				this.watchConfig(signal),
			]);
		} finally {
			config.off('changed', onChanged);
			await this.drainInFlight();
			this.phase = 'stopped';
			this.logger.infoSync('Device agent stopped', { pendingResults: this.pendingResults.size() });
		}
	}

	public getStatus(): AgentStatus {
		return {
			phase: this.phase,
			connection: this.components?.channel?.getStateView().getHealth(),
			heartbeat: this.components?.heartbeat.getStats(),
			pendingResults: this.pendingResults.size(),
			inFlightCommands: this.inFlight.size,
		};
	}

	/**
	 * Deliver queued results in order over whichever path is live
	 */
	public async flushPendingResults(): Promise<number> {
		const router = this.components?.router;
		if (!router || this.pendingResults.isEmpty()) {
			return 0;
		}

		return this.pendingResults.flush(async ({ commandId, result }) => {
			const path = await router.deliverCommandResult(commandId, result);
			if (path === 'none') {
				throw new TransportFault(`No delivery path accepted result for command ${commandId}`);
			}
		});
	}

	private async waitUntilReady(signal: AbortSignal): Promise<boolean> {
		const { config } = this.deps;
		let warned = false;

		while (!config.isReady()) {
			if (!warned) {
				this.logger.warnSync('Agent not configured, waiting for apiKey and dashboardUrl', {
					configPath: config.getConfigPath(),
				});
				warned = true;
			}
			if (!(await sleep(config.getConfig().readinessPollSeconds * 1000, signal))) {
				return false;
			}
			config.reload();
		}

		return !signal.aborted;
	}

	private buildComponents(current: AgentConfig): RunningComponents {
		const { config, logger, provider } = this.deps;
		const getIdentity = (): AgentIdentity => config.getIdentity();

		const dispatcher = new CommandDispatcher(provider, logger, {
			commandTimeoutMs: current.commandTimeoutSeconds * 1000,
		});
		const inbox = new CommandInbox(1000, logger);

		const fallback = new FallbackExchange(
			{
				getIdentity,
				requestTimeoutMs: current.requestTimeoutSeconds * 1000,
				userAgent: `device-agent/${this.agentVersion}`,
			},
			logger,
			this.deps.httpClient,
		);

		let channel: RealtimeChannel | undefined;
		if (current.useRealtimeTransport) {
			const reconnectPolicy: ReconnectPolicy = {
				nextDelayMs: (attempt) => {
					const latest = config.getConfig();
					return createReconnectPolicy({
						strategy: latest.reconnectStrategy,
						reconnectDelayMs: latest.reconnectDelaySeconds * 1000,
						maxReconnectDelayMs: latest.maxReconnectDelaySeconds * 1000,
					}).nextDelayMs(attempt);
				},
			};
			channel = new RealtimeChannel(
				this.deps.connector ?? new WsConnector({ handshakeTimeoutMs: current.requestTimeoutSeconds * 1000 }),
				{ getIdentity, reconnectPolicy },
				logger,
				(command) => {
					inbox.push(command, 'realtime');
				},
			);
		}

		const router = new DeliveryRouter(fallback, inbox, logger, channel);

		const heartbeat = new HeartbeatLoop(
			provider,
			router,
			this.deps.systemInfo ?? new SystemInformationSource(logger),
			{
				getIntervalMs: () => config.getConfig().heartbeatIntervalSeconds * 1000,
				getAgentId: () => config.getIdentity().agentId,
				agentVersion: this.agentVersion,
				enumerationTimeoutMs: current.commandTimeoutSeconds * 1000,
				onTickComplete: async () => {
					await this.flushPendingResults();
				},
			},
			logger,
		);

		return { dispatcher, inbox, router, heartbeat, channel };
	}

	private async consumeCommands(components: RunningComponents, signal: AbortSignal): Promise<void> {
		for (;;) {
			const entry = await components.inbox.next(signal);
			if (!entry) {
				return;
			}
			this.track(this.processCommand(components, entry));
		}
	}

	/**
	 * Dispatch one command and report its result. Never rejects.
	 */
	private async processCommand(components: RunningComponents, entry: InboxEntry): Promise<void> {
		const { command, source } = entry;
		try {
			const result = await components.dispatcher.handle(command);
			const path = await components.router.deliverCommandResult(command.id, result);

			if (path === 'none') {
				this.pendingResults.enqueue({ commandId: command.id, result });
				this.logger.warnSync('Command result queued for retry', {
					commandId: command.id,
					pendingResults: this.pendingResults.size(),
				});
			} else {
				this.logger.debugSync('Command result delivered', { commandId: command.id, source, path });
			}
		} catch (error) {
			this.logger.errorSync('Command processing failed', error, { commandId: command.id });
		}
	}

	private track(task: Promise<void>): void {
		this.inFlight.add(task);
		void task.finally(() => {
			this.inFlight.delete(task);
		});
	}

	private async drainInFlight(): Promise<void> {
		if (this.inFlight.size === 0) {
			return;
		}

		const graceMs = this.deps.commandGracePeriodMs ?? 5000;
		this.logger.infoSync(`Waiting up to ${graceMs}ms for ${this.inFlight.size} in-flight commands`);

		const timeout = new AbortController();
		await Promise.race([
			Promise.all(this.inFlight).then(() => timeout.abort()),
			sleep(graceMs, timeout.signal),
		]);
		timeout.abort();
	}

	private async watchConfig(signal: AbortSignal): Promise<void> {
		while (await sleep(this.deps.config.getConfig().readinessPollSeconds * 1000, signal)) {
			try {
				this.deps.config.reload();
			} catch (error) {
				this.logger.errorSync('Config reload failed', error);
			}
		}
	}

	private applyConfigChange(next: AgentConfig, previous: AgentConfig): void {
		const { logger } = this.deps;
		logger.setLogLevel(next.logLevel);
		logger.setAgentId(this.deps.config.getIdentity().agentId);

		const identityChanged =
			next.apiKey !== previous.apiKey ||
			next.dashboardUrl !== previous.dashboardUrl ||
			next.agentId !== previous.agentId;

		if (identityChanged) {
			this.logger.infoSync('Identity changed, reconnecting real-time channel', {
				dashboardUrl: next.dashboardUrl,
			});
			this.components?.channel?.restart();
		}
		if (next.useRealtimeTransport !== previous.useRealtimeTransport) {
			this.logger.warnSync('useRealtimeTransport change takes effect after agent restart');
		}
	}
}
