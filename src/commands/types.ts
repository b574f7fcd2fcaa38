import { z } from 'zod';
import { ProtocolFault } from '../errors';

/**
 * Command kinds understood by the dispatcher
 */
export const COMMAND_KINDS = {
	RESTART_SUBSYSTEM: 'restart_subsystem',
	CLEAR_QUEUE: 'clear_queue',
	FIX_DEVICE: 'fix_device',
	TEST_OUTPUT: 'test_output',
	GET_STATUS: 'get_status',
	INSTALL_DRIVER: 'install_driver',
	UPDATE_DRIVER: 'update_driver',
} as const;

export const DEFAULT_PACKAGE_SELECTOR = '*.inf';

/**
 * Command as received on the wire.
 * The kind arrives as `kind` or the legacy `commandType` field.
 */
const CommandIdSchema = z.union([z.number(), z.string().min(1)]);

export const RawCommandSchema = z
	.object({
		id: CommandIdSchema,
		kind: z.string().min(1).optional(),
		commandType: z.string().min(1).optional(),
		deviceId: z.union([z.string(), z.number()]).nullish(),
		payload: z.record(z.unknown()).nullish(),
	})
	.refine((raw) => raw.kind !== undefined || raw.commandType !== undefined, {
		message: 'Command kind is required',
		path: ['kind'],
	});

export type CommandId = number | string;

export interface Command {
	/** Correlation key for exactly one CommandResult */
	id: CommandId;
	kind: string;
	deviceId?: string;
	payload: Record<string, unknown>;
	/** Set when the command carries an id but is otherwise malformed */
	rejection?: string;
}

export interface CommandResult {
	success: boolean;
	message: string;
	deviceId?: string;
	actionsTaken: string[];
}

export type CommandSource = 'realtime' | 'fallback';

/**
 * Validate an inbound command.
 *
 * A malformed command that still has a usable id comes back with `rejection`
 * set, so it can be answered with a failure result.
 *
 * @throws ProtocolFault when the value has no usable id
 */
export function parseCommand(raw: unknown): Command {
	const parsed = RawCommandSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || 'command'}: ${issue.message}`)
			.join('; ');
		const message = `Invalid command: ${issues}`;

		const id = z.object({ id: CommandIdSchema }).safeParse(raw);
		if (!id.success) {
			throw new ProtocolFault(message, { cause: parsed.error });
		}
		return { id: id.data.id, kind: '', payload: {}, rejection: message };
	}

	const { id, kind, commandType, deviceId, payload } = parsed.data;
	const device = deviceId === null || deviceId === undefined ? '' : String(deviceId);
	return {
		id,
		kind: kind ?? commandType ?? '',
		...(device ? { deviceId: device } : {}),
		payload: payload ?? {},
	};
}

export function commandKey(id: CommandId): string {
	return String(id);
}
