/**
 * COMMAND INBOX
 * =============
 *
 * The single ordered hand-off point for inbound commands. The real-time channel
 * and the fallback exchange push; the agent's command consumer awaits next().
 *
 * A command id already seen (the same command delivered over both paths) is
 * rejected. Seen ids are remembered in a bounded window.
 */

import { commandKey } from './commands/types';
import type { Command, CommandSource } from './commands/types';
import type { AgentLogger } from './logging/agent-logger';
import { ComponentLogger } from './logging/component-logger';
import { LogComponents } from './logging/types';

export interface InboxEntry {
	command: Command;
	source: CommandSource;
	receivedAt: number;
}

type Waiter = (entry: InboxEntry | undefined) => void;

export class CommandInbox {
	private readonly queue: InboxEntry[] = [];
	private readonly waiters: Waiter[] = [];
	private readonly seenIds = new Set<string>();
	private readonly seenOrder: string[] = [];
	private readonly logger?: ComponentLogger;

	constructor(
		private readonly maxRememberedIds: number = 1000,
		agentLogger?: AgentLogger,
	) {
		this.logger = agentLogger && new ComponentLogger(agentLogger, LogComponents.INBOX);
	}

	/**
	 * Enqueue a command. Returns false when its id was already accepted.
	 */
	public push(command: Command, source: CommandSource): boolean {
		const key = commandKey(command.id);
		if (this.seenIds.has(key)) {
			this.logger?.debugSync('Ignoring duplicate command', { commandId: command.id, source });
			return false;
		}
		this.remember(key);

		const entry: InboxEntry = { command, source, receivedAt: Date.now() };
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(entry);
		} else {
			this.queue.push(entry);
		}
		return true;
	}

	/**
	 * Next command in arrival order. Resolves undefined once the signal aborts.
	 */
	public next(signal: AbortSignal): Promise<InboxEntry | undefined> {
		const queued = this.queue.shift();
		if (queued) {
			return Promise.resolve(queued);
		}
		if (signal.aborted) {
			return Promise.resolve(undefined);
		}

		return new Promise((resolve) => {
			const waiter: Waiter = (entry) => {
				signal.removeEventListener('abort', onAbort);
				resolve(entry);
			};
			const onAbort = () => {
				const index = this.waiters.indexOf(waiter);
				if (index !== -1) {
					this.waiters.splice(index, 1);
				}
				resolve(undefined);
			};

			this.waiters.push(waiter);
			signal.addEventListener('abort', onAbort, { once: true });
		});
	}

	public size(): number {
		return this.queue.length;
	}

	private remember(key: string): void {
		this.seenIds.add(key);
		this.seenOrder.push(key);
		if (this.seenOrder.length > this.maxRememberedIds) {
			const evicted = this.seenOrder.shift();
			if (evicted !== undefined) {
				this.seenIds.delete(evicted);
			}
		}
	}
}
