/**
 * HEARTBEAT LOOP
 * ==============
 *
 * Every interval: list devices, build the heartbeat payload and publish it over
 * whichever path is live. Ticks are scheduled from the previous tick's start, so
 * slow or failing ticks never stretch the period. A tick never throws.
 *
 * The post-tick hook runs beside the loop: at most one at a time, never awaited by
 * the next tick, awaited once on shutdown.
 */

import { ProviderFault, describeError } from '../errors';
import type { DeviceCapabilityProvider, DeviceSnapshot } from '../devices/types';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import type { DeliveryPath, DeliveryRouter } from '../transport/delivery-router';
import { sleep } from '../utils/sleep';
import { getAgentVersion } from './system-info';
import type { SystemInfoSource } from './system-info';
import type { HeartbeatPayload } from './types';

export interface HeartbeatLoopConfig {
	/** Read before every wait so configuration reloads apply */
	getIntervalMs: () => number;
	getAgentId: () => string;
	agentVersion?: string;
	/** Device enumeration is abandoned after this long (default 60s) */
	enumerationTimeoutMs?: number;
	/** Started after every tick unless the previous run is still going */
	onTickComplete?: () => Promise<void>;
}

export type TickOutcome = DeliveryPath | 'failed';

export interface HeartbeatStats {
	ticks: number;
	failedTicks: number;
	consecutiveFailures: number;
	lastTickAt?: number;
	lastOutcome?: TickOutcome;
}

export class HeartbeatLoop {
	private readonly logger: ComponentLogger;
	private readonly agentVersion: string;
	private stats: HeartbeatStats = { ticks: 0, failedTicks: 0, consecutiveFailures: 0 };
	private afterTickTask?: Promise<void>;

	constructor(
		private readonly provider: DeviceCapabilityProvider,
		private readonly router: Pick<DeliveryRouter, 'deliverHeartbeat'>,
		private readonly systemInfo: SystemInfoSource,
		private readonly config: HeartbeatLoopConfig,
		agentLogger: AgentLogger,
	) {
		this.logger = new ComponentLogger(agentLogger, LogComponents.HEARTBEAT);
		this.agentVersion = config.agentVersion ?? getAgentVersion();
	}

	public async run(signal: AbortSignal): Promise<void> {
		this.logger.infoSync('Heartbeat loop started', { intervalMs: this.config.getIntervalMs() });

		while (!signal.aborted) {
			const tickStarted = Date.now();

			await this.tick();
			this.startAfterTick();

			const elapsed = Date.now() - tickStarted;
			const waitMs = Math.max(0, this.config.getIntervalMs() - elapsed);
			if (!(await sleep(waitMs, signal))) {
				break;
			}
		}

		await this.afterTickTask;
		this.logger.infoSync('Heartbeat loop stopped', { ticks: this.stats.ticks });
	}

	/**
	 * One heartbeat. Never rejects.
	 */
	public async tick(): Promise<TickOutcome> {
		let outcome: TickOutcome;
		try {
			const payload = await this.buildPayload();
			outcome = await this.router.deliverHeartbeat(payload);
			if (outcome === 'none') {
				this.logger.warnSync('Heartbeat not accepted by any path');
			}
		} catch (error) {
			this.logger.errorSync('Heartbeat tick failed', error, { reason: describeError(error) });
			outcome = 'failed';
		}

		this.record(outcome);
		return outcome;
	}

	public async buildPayload(): Promise<HeartbeatPayload> {
		const [devices, host] = await Promise.all([this.listDevices(), this.systemInfo.describeHost()]);
		return {
			agentId: this.config.getAgentId(),
			hostname: host.hostname,
			osDescriptor: host.osDescriptor,
			agentVersion: this.agentVersion,
			ipAddress: host.ipAddress,
			devices,
		};
	}

	public getStats(): HeartbeatStats {
		return { ...this.stats };
	}

	private async listDevices(): Promise<DeviceSnapshot[]> {
		const timeoutMs = this.config.enumerationTimeoutMs ?? 60_000;
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				reject(new ProviderFault(`Device enumeration timed out after ${timeoutMs}ms`));
			}, timeoutMs);
		});

		try {
			return await Promise.race([this.provider.listDevices(), timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	private startAfterTick(): void {
		const hook = this.config.onTickComplete;
		if (!hook) {
			return;
		}
		if (this.afterTickTask) {
			this.logger.debugSync('Post-tick hook still running, skipped');
			return;
		}

		const task = hook()
			.catch((error: unknown) => {
				this.logger.errorSync('Post-tick hook failed', error);
			})
			.finally(() => {
				this.afterTickTask = undefined;
			});
		this.afterTickTask = task;
	}

	private record(outcome: TickOutcome): void {
		const failed = outcome === 'failed' || outcome === 'none';
		this.stats = {
			ticks: this.stats.ticks + 1,
			failedTicks: this.stats.failedTicks + (failed ? 1 : 0),
			consecutiveFailures: failed ? this.stats.consecutiveFailures + 1 : 0,
			lastTickAt: Date.now(),
			lastOutcome: outcome,
		};
	}
}
