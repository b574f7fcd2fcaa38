/**
 * Real-time channel envelopes
 *
 * Outbound:  {type:"heartbeat", payload}
 *            {type:"command_result", commandId, result}
 * Inbound:   {type:"command", command}   (legacy senders use `body`)
 */

import { z } from 'zod';
import { ProtocolFault } from '../errors';
import { parseCommand } from '../commands/types';
import type { Command, CommandId, CommandResult } from '../commands/types';
import type { HeartbeatPayload } from '../heartbeat/types';

export interface HeartbeatEnvelope {
	type: 'heartbeat';
	payload: HeartbeatPayload;
}

export interface CommandResultEnvelope {
	type: 'command_result';
	commandId: CommandId;
	result: CommandResult;
}

export type OutboundEnvelope = HeartbeatEnvelope | CommandResultEnvelope;

export type InboundMessage =
	| { kind: 'command'; command: Command }
	| { kind: 'ignored'; type: string };

const EnvelopeSchema = z
	.object({
		type: z.string(),
		command: z.unknown().optional(),
		body: z.unknown().optional(),
	})
	.passthrough();

export function encodeEnvelope(envelope: OutboundEnvelope): string {
	return JSON.stringify(envelope);
}

/**
 * Parse one complete inbound frame
 *
 * @throws ProtocolFault for text that is not JSON, not an envelope, or a command
 * envelope whose command is invalid
 */
export function parseInboundFrame(frame: string): InboundMessage {
	let raw: unknown;
	try {
		raw = JSON.parse(frame);
	} catch (error) {
		throw new ProtocolFault('Frame is not valid JSON', { cause: error });
	}

	const envelope = EnvelopeSchema.safeParse(raw);
	if (!envelope.success) {
		throw new ProtocolFault('Frame is not an envelope', { cause: envelope.error });
	}

	const { type, command, body } = envelope.data;
	if (type !== 'command') {
		return { kind: 'ignored', type };
	}

	return { kind: 'command', command: parseCommand(command ?? body) };
}
