/**
 * Command Handlers
 * ================
 *
 * One handler per command kind. Handlers call the device capability provider and
 * describe what they did; the dispatcher attaches the correlation fields.
 *
 * Mutating provider calls run under a per-key lock so the same device never sees
 * two concurrent mutations. The subsystem restart and the driver store have keys
 * of their own.
 */

import { describeError } from '../errors';
import type { ComponentLogger } from '../logging/component-logger';
import type { KeyedMutex } from '../utils/mutex';
import type { DeviceCapabilityProvider, DeviceSnapshot } from '../devices/types';
import { COMMAND_KINDS, DEFAULT_PACKAGE_SELECTOR } from './types';
import type { Command } from './types';

export interface CommandOutcome {
	success: boolean;
	message: string;
	actionsTaken: string[];
}

export interface HandlerContext {
	provider: DeviceCapabilityProvider;
	locks: KeyedMutex;
	logger: ComponentLogger;
}

export type CommandHandler = (command: Command, ctx: HandlerContext) => Promise<CommandOutcome>;

export const SUBSYSTEM_LOCK_KEY = 'subsystem';
export const DRIVER_STORE_LOCK_KEY = 'driver-store';

export function deviceLockKey(deviceName: string): string {
	return `device:${deviceName.toLowerCase()}`;
}

/**
 * Target device: the command's deviceId, else payload.deviceName
 */
export function resolveDeviceName(command: Command): string | undefined {
	if (command.deviceId) {
		return command.deviceId;
	}
	return payloadString(command, 'deviceName');
}

function payloadString(command: Command, key: string): string | undefined {
	const value = command.payload[key];
	return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function payloadStringList(command: Command, key: string): string[] {
	const value = command.payload[key];
	if (!Array.isArray(value)) {
		return [];
	}
	return value.filter((item): item is string => typeof item === 'string');
}

function findDevice(devices: DeviceSnapshot[], name: string): DeviceSnapshot | undefined {
	const wanted = name.toLowerCase();
	return devices.find((device) => device.name.toLowerCase() === wanted);
}

const failed = (message: string): CommandOutcome => ({ success: false, message, actionsTaken: [] });

const deviceNameRequired = (): CommandOutcome => failed('Device name is required');

const restartSubsystem: CommandHandler = async (_command, { provider, locks }) => {
	const restarted = await locks.runExclusive(SUBSYSTEM_LOCK_KEY, () => provider.restartSubsystem());

	if (!restarted) {
		return failed('Failed to restart subsystem');
	}
	return {
		success: true,
		message: 'Subsystem restarted successfully',
		actionsTaken: ['Stopped subsystem service', 'Started subsystem service'],
	};
};

const clearQueue: CommandHandler = async (command, { provider, locks }) => {
	const name = resolveDeviceName(command);
	if (!name) {
		return deviceNameRequired();
	}

	const cleared = await locks.runExclusive(deviceLockKey(name), () => provider.clearQueue(name));

	if (!cleared) {
		return failed(`Failed to clear queue for ${name}`);
	}
	return {
		success: true,
		message: `Queue cleared for ${name}`,
		actionsTaken: [`Purged all jobs from ${name} queue`],
	};
};

/**
 * Composite remediation: restart the subsystem, clear the named device's queue,
 * then re-read its status. Each step runs even when an earlier one failed.
 */
const fixDevice: CommandHandler = async (command, { provider, locks, logger }) => {
	const name = resolveDeviceName(command);
	const issues = payloadStringList(command, 'issues');
	const actionsTaken: string[] = [];

	logger.infoSync('Fixing device', { operation: 'fix_device', device: name ?? 'all', issues });

	try {
		if (await locks.runExclusive(SUBSYSTEM_LOCK_KEY, () => provider.restartSubsystem())) {
			actionsTaken.push('Restarted subsystem service');
		}
	} catch (error) {
		logger.warnSync('Subsystem restart step failed', { operation: 'fix_device', reason: describeError(error) });
	}

	if (name) {
		try {
			if (await locks.runExclusive(deviceLockKey(name), () => provider.clearQueue(name))) {
				actionsTaken.push(`Cleared queue for ${name}`);
			}
		} catch (error) {
			logger.warnSync('Queue clear step failed', { operation: 'fix_device', device: name, reason: describeError(error) });
		}
	}

	let device: DeviceSnapshot | undefined;
	if (name) {
		try {
			device = findDevice(await provider.listDevices(), name);
		} catch (error) {
			logger.warnSync('Status verification step failed', { operation: 'fix_device', device: name, reason: describeError(error) });
		}
	}

	if (name && device) {
		actionsTaken.push(`Verified device status: ${device.status}`);
		const healthy = device.status === 'online' || device.status === 'warning';
		return {
			success: healthy,
			message: healthy ? `Device ${name} fixed successfully` : `Device ${name} still showing as ${device.status}`,
			actionsTaken,
		};
	}

	const anyRemediation = actionsTaken.length > 0;
	return {
		success: anyRemediation,
		message: anyRemediation ? 'General device maintenance completed' : 'Could not find specified device',
		actionsTaken,
	};
};

const testOutput: CommandHandler = async (command, { provider, locks }) => {
	const name = resolveDeviceName(command);
	if (!name) {
		return deviceNameRequired();
	}

	const sent = await locks.runExclusive(deviceLockKey(name), () => provider.testOutput(name));

	if (!sent) {
		return failed(`Failed to send test output to ${name}`);
	}
	return {
		success: true,
		message: `Test output sent to ${name}`,
		actionsTaken: [`Sent diagnostic test output to ${name}`],
	};
};

/**
 * Read-only: never locks, always succeeds
 */
const getStatus: CommandHandler = async (command, { provider }) => {
	const name = resolveDeviceName(command);
	const devices = await provider.listDevices();

	if (!name) {
		return { success: true, message: `Found ${devices.length} devices`, actionsTaken: [] };
	}

	const device = findDevice(devices, name);
	return {
		success: true,
		message: device ? `Status: ${device.status}, Jobs: ${device.pendingJobCount}` : `Device ${name} not found`,
		actionsTaken: [],
	};
};

const installDriver: CommandHandler = async (command, { provider, locks }) => {
	const driverPath = payloadString(command, 'driverPath');
	if (!driverPath) {
		return failed('Driver path is required');
	}
	const packageSelector = payloadString(command, 'packageSelector') ?? DEFAULT_PACKAGE_SELECTOR;

	const installed = await locks.runExclusive(DRIVER_STORE_LOCK_KEY, () =>
		provider.installDriver(driverPath, packageSelector),
	);

	if (!installed) {
		return failed('Failed to install driver');
	}
	return {
		success: true,
		message: 'Driver installed successfully',
		actionsTaken: [`Installed driver from ${driverPath}`],
	};
};

const updateDriver: CommandHandler = async (command, { provider, locks, logger }) => {
	const name = resolveDeviceName(command);
	if (!name) {
		return deviceNameRequired();
	}
	const downloadUrl = payloadString(command, 'downloadUrl');
	if (!downloadUrl) {
		return failed('Download URL is required');
	}

	logger.infoSync('Updating driver', { operation: 'update_driver', device: name, downloadUrl });

	const updated = await locks.runExclusive(deviceLockKey(name), () =>
		locks.runExclusive(DRIVER_STORE_LOCK_KEY, () => provider.updateDriver(name, downloadUrl)),
	);

	if (!updated) {
		return failed(`Failed to update driver for ${name}`);
	}
	return {
		success: true,
		message: `Driver update completed for ${name}`,
		actionsTaken: ['Downloaded latest driver package', 'Installed updated driver'],
	};
};

/**
 * Handlers keyed by command kind
 */
export function createDefaultHandlers(): Map<string, CommandHandler> {
	return new Map<string, CommandHandler>([
		[COMMAND_KINDS.RESTART_SUBSYSTEM, restartSubsystem],
		[COMMAND_KINDS.CLEAR_QUEUE, clearQueue],
		[COMMAND_KINDS.FIX_DEVICE, fixDevice],
		[COMMAND_KINDS.TEST_OUTPUT, testOutput],
		[COMMAND_KINDS.GET_STATUS, getStatus],
		[COMMAND_KINDS.INSTALL_DRIVER, installDriver],
		[COMMAND_KINDS.UPDATE_DRIVER, updateDriver],
	]);
}
