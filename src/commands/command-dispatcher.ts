/**
 * Command Dispatcher
 * ==================
 *
 * Maps a command kind to its handler and turns every outcome, including thrown
 * provider faults and timeouts, into exactly one CommandResult. The result's
 * deviceId always mirrors the command's.
 */

import { describeError } from '../errors';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import { KeyedMutex } from '../utils/mutex';
import type { DeviceCapabilityProvider } from '../devices/types';
import { createDefaultHandlers } from './handlers';
import type { CommandHandler, CommandOutcome, HandlerContext } from './handlers';
import type { Command, CommandResult } from './types';

export interface CommandDispatcherConfig {
	/** Upper bound for a single command, in milliseconds */
	commandTimeoutMs?: number;
}

export class CommandDispatcher {
	private readonly handlers: Map<string, CommandHandler>;
	private readonly context: HandlerContext;
	private readonly logger: ComponentLogger;
	private readonly config: Required<CommandDispatcherConfig>;

	constructor(
		provider: DeviceCapabilityProvider,
		agentLogger: AgentLogger,
		config: CommandDispatcherConfig = {},
		handlers: Map<string, CommandHandler> = createDefaultHandlers(),
	) {
		this.handlers = handlers;
		this.logger = new ComponentLogger(agentLogger, LogComponents.DISPATCHER);
		this.context = { provider, locks: new KeyedMutex(), logger: this.logger };
		this.config = {
			commandTimeoutMs: config.commandTimeoutMs ?? 180_000,
		};
	}

	public supports(kind: string): boolean {
		return this.handlers.has(kind);
	}

	public registerHandler(kind: string, handler: CommandHandler): void {
		this.handlers.set(kind, handler);
	}

	/**
	 * Run a command to completion. Never rejects.
	 */
	public async handle(command: Command): Promise<CommandResult> {
		const started = Date.now();
		this.logger.infoSync('Handling command', {
			operation: command.kind,
			commandId: command.id,
			device: command.deviceId ?? 'all',
		});

		const outcome = await this.runHandler(command);
		const result: CommandResult = {
			success: outcome.success,
			message: outcome.message,
			...(command.deviceId !== undefined && { deviceId: command.deviceId }),
			actionsTaken: [...outcome.actionsTaken],
		};

		const context = {
			operation: command.kind,
			commandId: command.id,
			success: result.success,
			durationMs: Date.now() - started,
		};
		if (result.success) {
			this.logger.infoSync(`Command completed: ${result.message}`, context);
		} else {
			this.logger.warnSync(`Command failed: ${result.message}`, context);
		}

		return result;
	}

	private async runHandler(command: Command): Promise<CommandOutcome> {
		if (command.rejection !== undefined) {
			return { success: false, message: command.rejection, actionsTaken: [] };
		}

		const handler = this.handlers.get(command.kind);
		if (!handler) {
			return { success: false, message: `Unknown command type: ${command.kind}`, actionsTaken: [] };
		}

		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<CommandOutcome>((resolve) => {
			timer = setTimeout(() => {
				resolve({
					success: false,
					message: `Command timed out after ${Math.round(this.config.commandTimeoutMs / 1000)}s`,
					actionsTaken: [],
				});
			}, this.config.commandTimeoutMs);
		});

		try {
			return await Promise.race([handler(command, this.context), timeout]);
		} catch (error) {
			this.logger.errorSync(`Command ${command.kind} failed`, error, { commandId: command.id });
			return { success: false, message: `Command failed: ${describeError(error)}`, actionsTaken: [] };
		} finally {
			clearTimeout(timer);
		}
	}
}
