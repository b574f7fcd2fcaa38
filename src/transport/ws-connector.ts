/**
 * WebSocket connector for the real-time channel (ws)
 */

import WebSocket from 'ws';
import type { RawData } from 'ws';
import { TransportFault } from '../errors';
import type { ChannelConnection, ChannelConnector, ChannelHandlers } from './realtime-channel';

export interface WsConnectorConfig {
	/** Abort the opening handshake after this many milliseconds */
	handshakeTimeoutMs?: number;
}

function toBuffer(data: RawData): Buffer {
	if (Array.isArray(data)) {
		return Buffer.concat(data);
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(new Uint8Array(data));
	}
	return data;
}

export class WsConnection implements ChannelConnection {
	constructor(private readonly socket: WebSocket) {}

	send(frame: string): Promise<void> {
		return new Promise((resolve, reject) => {
			this.socket.send(frame, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	close(code: number = 1000, reason: string = ''): void {
		if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
			this.socket.close(code, reason);
		}
	}

	isOpen(): boolean {
		return this.socket.readyState === WebSocket.OPEN;
	}
}

export class WsConnector implements ChannelConnector {
	private readonly handshakeTimeoutMs: number;

	constructor(config: WsConnectorConfig = {}) {
		this.handshakeTimeoutMs = config.handshakeTimeoutMs ?? 30_000;
	}

	connect(
		url: string,
		headers: Record<string, string>,
		handlers: ChannelHandlers,
		signal: AbortSignal,
	): Promise<ChannelConnection> {
		return new Promise((resolve, reject) => {
			if (signal.aborted) {
				reject(new TransportFault('Connect aborted'));
				return;
			}

			const socket = new WebSocket(url, {
				headers,
				handshakeTimeout: this.handshakeTimeoutMs,
			});
			let opened = false;

			const onAbort = () => {
				socket.terminate();
				reject(new TransportFault('Connect aborted'));
			};
			signal.addEventListener('abort', onAbort, { once: true });

			socket.on('open', () => {
				opened = true;
				signal.removeEventListener('abort', onAbort);
				resolve(new WsConnection(socket));
			});

			// ws reassembles fragmented messages itself
			socket.on('message', (data: RawData) => {
				handlers.onData(toBuffer(data), true);
			});

			socket.on('close', (code: number, reason: Buffer) => {
				signal.removeEventListener('abort', onAbort);
				if (opened) {
					handlers.onClose(code, reason.toString());
				} else {
					reject(new TransportFault(`Connection closed during handshake (${code})`));
				}
			});

			socket.on('error', (error: Error) => {
				if (opened) {
					handlers.onError(error);
				} else {
					reject(new TransportFault(`Handshake failed: ${error.message}`, { cause: error }));
				}
			});
		});
	}
}
