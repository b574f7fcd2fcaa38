/**
 * Delivery Router
 *
 * Chooses the outbound path at send time: the real-time channel when it is
 * connected, otherwise (or when the real-time send fails) the fallback exchange.
 * Commands returned by a fallback heartbeat are pushed to the command inbox.
 */

import { describeError } from '../errors';
import type { CommandInbox } from '../command-inbox';
import type { CommandId, CommandResult } from '../commands/types';
import type { HeartbeatPayload } from '../heartbeat/types';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import type { FallbackExchange } from './fallback-exchange';
import type { RealtimeChannel } from './realtime-channel';

export type RealtimePublisher = Pick<RealtimeChannel, 'isConnected' | 'sendHeartbeat' | 'sendCommandResult'>;
export type FallbackPublisher = Pick<FallbackExchange, 'publishHeartbeat' | 'publishCommandResult'>;

/** Path that accepted the message; 'none' when every path failed */
export type DeliveryPath = 'realtime' | 'fallback' | 'none';

export class DeliveryRouter {
	private readonly logger: ComponentLogger;

	constructor(
		private readonly fallback: FallbackPublisher,
		private readonly inbox: CommandInbox,
		agentLogger: AgentLogger,
		private readonly realtime?: RealtimePublisher,
	) {
		this.logger = new ComponentLogger(agentLogger, LogComponents.DELIVERY);
	}

	public async deliverHeartbeat(payload: HeartbeatPayload): Promise<DeliveryPath> {
		if (this.realtime?.isConnected()) {
			try {
				await this.realtime.sendHeartbeat(payload);
				this.logger.debugSync(`Heartbeat sent via real-time channel (${payload.devices.length} devices)`);
				return 'realtime';
			} catch (error) {
				this.logger.warnSync('Real-time heartbeat failed, falling back to HTTP', { reason: describeError(error) });
			}
		}

		const { accepted, queuedCommands } = await this.fallback.publishHeartbeat(payload);
		for (const command of queuedCommands) {
			this.inbox.push(command, 'fallback');
		}
		return accepted ? 'fallback' : 'none';
	}

	public async deliverCommandResult(commandId: CommandId, result: CommandResult): Promise<DeliveryPath> {
		if (this.realtime?.isConnected()) {
			try {
				await this.realtime.sendCommandResult(commandId, result);
				this.logger.debugSync('Command result sent via real-time channel', { commandId });
				return 'realtime';
			} catch (error) {
				this.logger.warnSync('Real-time result send failed, falling back to HTTP', {
					commandId,
					reason: describeError(error),
				});
			}
		}

		return (await this.fallback.publishCommandResult(commandId, result)) ? 'fallback' : 'none';
	}
}
