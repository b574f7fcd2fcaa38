/**
 * Reconnect delay policies for the real-time channel.
 *
 * fixed        - the same delay after every disconnect (default, 10 s)
 * exponential  - doubles per consecutive failure, capped, with +-30% jitter
 */

export type ReconnectStrategy = 'fixed' | 'exponential';

export interface ReconnectPolicy {
	/**
	 * Delay before the next connect attempt.
	 * @param attempt consecutive failures so far (1 after the first disconnect)
	 */
	nextDelayMs(attempt: number): number;
}

export interface ReconnectPolicyConfig {
	strategy: ReconnectStrategy;
	reconnectDelayMs: number;
	maxReconnectDelayMs: number;
}

export class FixedDelayPolicy implements ReconnectPolicy {
	constructor(private readonly delayMs: number) {}

	nextDelayMs(_attempt?: number): number {
		return this.delayMs;
	}
}

export class ExponentialBackoffPolicy implements ReconnectPolicy {
	constructor(
		private readonly baseDelayMs: number,
		private readonly maxDelayMs: number,
		private readonly multiplier: number = 2,
		private readonly jitterPercent: number = 0.3,
		private readonly random: () => number = Math.random,
	) {}

	nextDelayMs(attempt: number): number {
		return calculateBackoffWithJitter(
			Math.max(1, attempt),
			this.baseDelayMs,
			this.multiplier,
			this.maxDelayMs,
			this.jitterPercent,
			this.random,
		);
	}
}

/**
 * Calculate exponential backoff delay with optional jitter
 *
 * @param attempt Current attempt number (1-based)
 * @param jitterPercent 0.3 = +-30%
 */
export function calculateBackoffWithJitter(
	attempt: number,
	baseDelayMs: number,
	multiplier: number,
	maxDelayMs: number,
	jitterPercent: number = 0,
	random: () => number = Math.random,
): number {
	const exponentialDelay = baseDelayMs * Math.pow(multiplier, attempt - 1);
	const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

	if (jitterPercent > 0) {
		const jitter = (random() * 2 - 1) * jitterPercent;
		return Math.floor(cappedDelay * (1 + jitter));
	}

	return cappedDelay;
}

export function createReconnectPolicy(config: ReconnectPolicyConfig): ReconnectPolicy {
	switch (config.strategy) {
		case 'exponential':
			return new ExponentialBackoffPolicy(config.reconnectDelayMs, config.maxReconnectDelayMs);
		case 'fixed':
			return new FixedDelayPolicy(config.reconnectDelayMs);
	}
}
