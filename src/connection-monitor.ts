/**
 * CONNECTION MONITOR
 * ==================
 *
 * Holds the real-time channel's connection state:
 *
 *   disconnected -> connecting -> connected -> disconnected
 *                        \-> disconnected (handshake failure)
 *
 * The channel is the only writer. Everyone else receives a ConnectionStateView
 * and reads snapshots; reads never block.
 */

import { EventEmitter } from 'events';
import { InternalInconsistencyError } from './errors';
import type { AgentLogger } from './logging/agent-logger';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface ConnectionSnapshot {
	state: ConnectionState;
	since: number;
	consecutiveFailures: number;
	totalConnects: number;
	totalDisconnects: number;
	lastConnectedAt?: number;
	lastDisconnectReason?: string;
}

export interface ConnectionHealth {
	status: ConnectionState;
	timeInState: number;
	consecutiveFailures: number;
	totalConnects: number;
	totalDisconnects: number;
	lastConnected: string | null;
	lastDisconnectReason: string | null;
}

/**
 * Read-only view handed to components that choose a delivery path
 */
export interface ConnectionStateView {
	getState(): ConnectionState;
	isConnected(): boolean;
	getSnapshot(): ConnectionSnapshot;
	getHealth(): ConnectionHealth;
}

interface ConnectionMonitorEvents {
	'connecting': () => void;
	'connected': () => void;
	'disconnected': (reason: string) => void;
	'state-changed': (snapshot: ConnectionSnapshot) => void;
}

const ALLOWED_TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
	disconnected: ['connecting'],
	connecting: ['connected', 'disconnected'],
	connected: ['disconnected'],
};

export class ConnectionMonitor extends EventEmitter implements ConnectionStateView {
	private snapshot: ConnectionSnapshot;
	private logger?: AgentLogger;

	constructor(logger?: AgentLogger) {
		super();
		this.logger = logger;
		this.snapshot = {
			state: 'disconnected',
			since: Date.now(),
			consecutiveFailures: 0,
			totalConnects: 0,
			totalDisconnects: 0,
		};
	}

	public markConnecting(): void {
		this.transition('connecting');
		this.emit('connecting');
		this.emit('state-changed', this.getSnapshot());
	}

	public markConnected(): void {
		this.transition('connected');
		this.snapshot.consecutiveFailures = 0;
		this.snapshot.totalConnects++;
		this.snapshot.lastConnectedAt = this.snapshot.since;

		this.logger?.infoSync('Real-time channel connected', {
			component: 'ConnectionMonitor',
			totalConnects: this.snapshot.totalConnects,
		});

		this.emit('connected');
		this.emit('state-changed', this.getSnapshot());
	}

	/**
	 * Record a connection loss or a failed handshake.
	 * Calling it while already disconnected is a no-op.
	 */
	public markDisconnected(reason: string): void {
		if (this.snapshot.state === 'disconnected') {
			return;
		}

		const wasConnected = this.snapshot.state === 'connected';
		this.transition('disconnected');
		this.snapshot.lastDisconnectReason = reason;
		if (wasConnected) {
			this.snapshot.totalDisconnects++;
		} else {
			this.snapshot.consecutiveFailures++;
		}

		this.logger?.warnSync(wasConnected ? 'Real-time channel disconnected' : 'Real-time channel handshake failed', {
			component: 'ConnectionMonitor',
			reason,
			consecutiveFailures: this.snapshot.consecutiveFailures,
		});

		this.emit('disconnected', reason);
		this.emit('state-changed', this.getSnapshot());
	}

	public getState(): ConnectionState {
		return this.snapshot.state;
	}

	public isConnected(): boolean {
		return this.snapshot.state === 'connected';
	}

	public getSnapshot(): ConnectionSnapshot {
		return { ...this.snapshot };
	}

	/**
	 * Get connection health summary
	 */
	public getHealth(): ConnectionHealth {
		return {
			status: this.snapshot.state,
			timeInState: Date.now() - this.snapshot.since,
			consecutiveFailures: this.snapshot.consecutiveFailures,
			totalConnects: this.snapshot.totalConnects,
			totalDisconnects: this.snapshot.totalDisconnects,
			lastConnected: this.snapshot.lastConnectedAt
				? new Date(this.snapshot.lastConnectedAt).toISOString()
				: null,
			lastDisconnectReason: this.snapshot.lastDisconnectReason ?? null,
		};
	}

	private transition(next: ConnectionState): void {
		const current = this.snapshot.state;
		if (!ALLOWED_TRANSITIONS[current].includes(next)) {
			throw new InternalInconsistencyError(`Invalid connection transition: ${current} -> ${next}`);
		}
		this.snapshot.state = next;
		this.snapshot.since = Date.now();
	}

	// Typed event emitter methods
	public on<K extends keyof ConnectionMonitorEvents>(
		event: K,
		listener: ConnectionMonitorEvents[K],
	): this {
		return super.on(event, listener);
	}

	public emit<K extends keyof ConnectionMonitorEvents>(
		event: K,
		...args: Parameters<ConnectionMonitorEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}
}
