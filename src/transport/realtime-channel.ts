/**
 * REALTIME CHANNEL
 * ================
 *
 * Persistent, auto-reconnecting connection to the dashboard.
 *
 *   run(signal)
 *     loop until shutdown:
 *       connecting -> handshake (X-API-Key) -> connected -> receive until close
 *       -> disconnected -> wait reconnect delay (cut short by shutdown)
 *
 * Inbound frames are assembled, parsed as envelopes and commands are handed to
 * the onCommand hook. Nothing in frame handling ends the receive loop except an
 * oversize frame, which drops the connection.
 *
 * Outbound writes are serialized by a mutex. Publishing while not connected
 * rejects with TransportFault so the caller can fall back.
 */

import { TransportFault, describeError } from '../errors';
import { ConnectionMonitor } from '../connection-monitor';
import type { ConnectionStateView } from '../connection-monitor';
import type { AgentIdentity } from '../config-loader';
import type { Command, CommandId, CommandResult } from '../commands/types';
import type { HeartbeatPayload } from '../heartbeat/types';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import { buildRealtimeUrl } from '../utils/api-utils';
import { Mutex } from '../utils/mutex';
import type { ReconnectPolicy } from '../utils/reconnect-policy';
import { sleep } from '../utils/sleep';
import { FrameAssembler } from './frame-assembler';
import { encodeEnvelope, parseInboundFrame } from './envelopes';
import type { OutboundEnvelope } from './envelopes';

export interface ChannelHandlers {
	onData(chunk: Buffer | string, isFinal: boolean): void;
	onClose(code: number, reason: string): void;
	onError(error: Error): void;
}

export interface ChannelConnection {
	send(frame: string): Promise<void>;
	close(code?: number, reason?: string): void;
	isOpen(): boolean;
}

/**
 * Opens one connection. Resolves once the handshake succeeds; rejects with a
 * TransportFault when it fails or the signal aborts first.
 */
export interface ChannelConnector {
	connect(
		url: string,
		headers: Record<string, string>,
		handlers: ChannelHandlers,
		signal: AbortSignal,
	): Promise<ChannelConnection>;
}

export interface RealtimeChannelConfig {
	/** Read on every connect so a reconfiguration takes effect on reconnect */
	getIdentity: () => AgentIdentity;
	reconnectPolicy: ReconnectPolicy;
	maxFrameBytes?: number;
}

export type CommandListener = (command: Command) => void;

const SHUTDOWN_REASON = 'shutdown';
const RESTART_REASON = 'restart requested';

export class RealtimeChannel {
	private readonly monitor: ConnectionMonitor;
	private readonly logger: ComponentLogger;
	private readonly writeLock = new Mutex();
	private readonly maxFrameBytes: number;
	private connection?: ChannelConnection;
	private restartRequested = false;
	private wake?: AbortController;
	private running = false;

	constructor(
		private readonly connector: ChannelConnector,
		private readonly config: RealtimeChannelConfig,
		agentLogger: AgentLogger,
		private readonly onCommand: CommandListener,
		monitor?: ConnectionMonitor,
	) {
		this.monitor = monitor ?? new ConnectionMonitor(agentLogger);
		this.logger = new ComponentLogger(agentLogger, LogComponents.REALTIME_CHANNEL);
		this.maxFrameBytes = config.maxFrameBytes ?? 1024 * 1024;
	}

	/**
	 * Maintain the connection until the signal aborts
	 */
	public async run(signal: AbortSignal): Promise<void> {
		if (this.running) {
			throw new TransportFault('Real-time channel is already running');
		}
		this.running = true;
		this.restartRequested = false;

		try {
			while (!signal.aborted) {
				this.monitor.markConnecting();
				const reason = await this.connectAndReceive(signal);
				this.monitor.markDisconnected(reason);

				if (signal.aborted) {
					break;
				}
				if (this.restartRequested) {
					this.restartRequested = false;
					this.logger.infoSync('Reconnecting with current identity');
					continue;
				}

				const attempt = Math.max(1, this.monitor.getSnapshot().consecutiveFailures);
				const delayMs = this.config.reconnectPolicy.nextDelayMs(attempt);
				this.logger.infoSync(`Reconnecting in ${delayMs}ms`, { reason, attempt });
				await this.waitBeforeReconnect(delayMs, signal);
				this.restartRequested = false;
			}
		} finally {
			this.running = false;
			this.logger.infoSync('Real-time channel stopped');
		}
	}

	/**
	 * Drop the current connection (or pending reconnect wait) and reconnect at once
	 */
	public restart(): void {
		this.restartRequested = true;
		this.wake?.abort();
		this.connection?.close(1000, RESTART_REASON);
	}

	public async publish(envelope: OutboundEnvelope): Promise<void> {
		const frame = encodeEnvelope(envelope);

		await this.writeLock.runExclusive(async () => {
			const connection = this.connection;
			if (!connection || !this.monitor.isConnected() || !connection.isOpen()) {
				throw new TransportFault('Real-time channel is not connected');
			}

			try {
				await connection.send(frame);
			} catch (error) {
				throw new TransportFault(`Real-time send failed: ${describeError(error)}`, { cause: error });
			}
		});
	}

	public async sendHeartbeat(payload: HeartbeatPayload): Promise<void> {
		await this.publish({ type: 'heartbeat', payload });
	}

	public async sendCommandResult(commandId: CommandId, result: CommandResult): Promise<void> {
		await this.publish({ type: 'command_result', commandId, result });
	}

	public isConnected(): boolean {
		return this.monitor.isConnected();
	}

	public getStateView(): ConnectionStateView {
		return this.monitor;
	}

	/**
	 * One connection lifetime. Resolves with the reason it ended.
	 */
	private async connectAndReceive(signal: AbortSignal): Promise<string> {
		const identity = this.config.getIdentity();
		const url = buildRealtimeUrl(identity.dashboardUrl);
		const assembler = new FrameAssembler(this.maxFrameBytes);

		const lifetime: { endReason?: string } = {};
		let resolveEnded: (reason: string) => void = () => {};
		const ended = new Promise<string>((resolve) => {
			resolveEnded = resolve;
		});
		const end = (reason: string) => {
			if (lifetime.endReason === undefined) {
				lifetime.endReason = reason;
				resolveEnded(reason);
			}
		};

		let connection: ChannelConnection | undefined;
		this.logger.infoSync('Connecting to real-time endpoint', { url });

		try {
			connection = await this.connector.connect(
				url,
				{ 'X-API-Key': identity.apiKey },
				{
					onData: (chunk, isFinal) => {
						const fault = this.handleData(assembler, chunk, isFinal);
						if (fault) {
							end(fault);
							connection?.close(1009, 'Frame too large');
						}
					},
					onClose: (code, reason) => end(`closed (${code}${reason ? `: ${reason}` : ''})`),
					onError: (error) => end(`transport error: ${error.message}`),
				},
				signal,
			);
		} catch (error) {
			if (signal.aborted) {
				return SHUTDOWN_REASON;
			}
			this.logger.warnSync('Real-time handshake failed', { url, reason: describeError(error) });
			return `handshake failed: ${describeError(error)}`;
		}

		if (lifetime.endReason !== undefined) {
			return lifetime.endReason;
		}

		this.connection = connection;
		this.monitor.markConnected();

		const onAbort = () => end(SHUTDOWN_REASON);
		signal.addEventListener('abort', onAbort, { once: true });
		if (signal.aborted) {
			onAbort();
		}
		if (this.restartRequested) {
			end(RESTART_REASON);
		}

		try {
			return await ended;
		} finally {
			signal.removeEventListener('abort', onAbort);
			this.connection = undefined;
			if (connection.isOpen()) {
				connection.close(1000, lifetime.endReason === SHUTDOWN_REASON ? 'Agent shutting down' : 'Reconnecting');
			}
		}
	}

	/**
	 * Returns a disconnect reason when the connection must be dropped
	 */
	private handleData(assembler: FrameAssembler, chunk: Buffer | string, isFinal: boolean): string | undefined {
		let frame: string | undefined;
		try {
			frame = assembler.push(chunk, isFinal);
		} catch (error) {
			this.logger.warnSync('Dropping connection after oversize frame', { reason: describeError(error) });
			return describeError(error);
		}

		if (frame === undefined) {
			return undefined;
		}

		try {
			const message = parseInboundFrame(frame);
			if (message.kind === 'ignored') {
				this.logger.debugSync(`Ignoring envelope of type ${message.type}`);
				return undefined;
			}

			const { command } = message;
			if (command.rejection !== undefined) {
				this.logger.warnSync('Malformed command received, answering with failure', {
					commandId: command.id,
					reason: command.rejection,
				});
			} else {
				this.logger.debugSync('Command received', { commandId: command.id, kind: command.kind });
			}
			this.onCommand(command);
		} catch (error) {
			this.logger.warnSync('Dropping inbound frame', { reason: describeError(error) });
		}
		return undefined;
	}

	private async waitBeforeReconnect(delayMs: number, signal: AbortSignal): Promise<void> {
		const wake = new AbortController();
		const onAbort = () => wake.abort();
		this.wake = wake;
		signal.addEventListener('abort', onAbort, { once: true });

		try {
			await sleep(delayMs, wake.signal);
		} finally {
			signal.removeEventListener('abort', onAbort);
			this.wake = undefined;
		}
	}
}
