/**
 * OFFLINE QUEUE
 * ==============
 *
 * Bounded FIFO for operations that failed on every delivery path.
 * Flushed by the heartbeat loop after each tick.
 *
 * Features:
 * - FIFO ordering
 * - Automatic size limiting (drops oldest when full)
 * - Items are retried until delivered; only overflow drops them
 */

import { describeError } from './errors';
import type { AgentLogger } from './logging/agent-logger';

interface QueueEntry<T> {
	item: T;
	createdAt: number;
	attempts: number;
}

export class OfflineQueue<T> {
	private entries: QueueEntry<T>[] = [];
	private flushing = false;

	constructor(
		private readonly queueName: string,
		private readonly maxSize: number = 1000,
		private readonly logger?: AgentLogger,
	) {}

	/**
	 * Add item to queue
	 */
	public enqueue(item: T): void {
		this.entries.push({ item, createdAt: Date.now(), attempts: 0 });

		if (this.entries.length > this.maxSize) {
			this.entries.shift();
			this.logger?.warnSync('Queue full, dropped oldest item', {
				component: 'OfflineQueue',
				queueName: this.queueName,
				maxSize: this.maxSize,
			});
		}
	}

	/**
	 * Flush queue (send items in order).
	 *
	 * A rejected send counts an attempt and the item stays at the head until the
	 * next flush. Returns number of successfully sent items.
	 */
	public async flush(sendFn: (item: T) => Promise<void>): Promise<number> {
		if (this.flushing || this.entries.length === 0) {
			return 0;
		}
		this.flushing = true;

		let successCount = 0;
		let remaining = this.entries.length;

		try {
			while (remaining > 0 && this.entries.length > 0) {
				const entry = this.entries[0];
				remaining--;

				try {
					await sendFn(entry.item);
					this.removeEntry(entry);
					successCount++;
				} catch (error) {
					entry.attempts++;
					this.logger?.debugSync('Flush stopped, item kept for next flush', {
						component: 'OfflineQueue',
						queueName: this.queueName,
						attempts: entry.attempts,
						ageMs: Date.now() - entry.createdAt,
						reason: describeError(error),
					});
					break;
				}
			}
		} finally {
			this.flushing = false;
		}

		if (successCount > 0) {
			this.logger?.infoSync('Queue flush completed', {
				component: 'OfflineQueue',
				queueName: this.queueName,
				successCount,
				remaining: this.entries.length,
			});
		}
		return successCount;
	}

	/**
	 * Get queue size
	 */
	public size(): number {
		return this.entries.length;
	}

	public isEmpty(): boolean {
		return this.entries.length === 0;
	}

	private removeEntry(entry: QueueEntry<T>): void {
		const index = this.entries.indexOf(entry);
		if (index !== -1) {
			this.entries.splice(index, 1);
		}
	}
}
