/**
 * Command Dispatcher Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { CommandDispatcher } from '../../src/commands/command-dispatcher';
import type { Command } from '../../src/commands/types';
import { ProviderFault } from '../../src/errors';
import { FakeProvider, createTestLogger, device } from '../helpers/fakes';

function command(id: number, kind: string, extra: Partial<Command> = {}): Command {
	return { id, kind, payload: {}, ...extra };
}

describe('CommandDispatcher', () => {
	let provider: FakeProvider;
	let dispatcher: CommandDispatcher;

	beforeEach(() => {
		provider = new FakeProvider();
		dispatcher = new CommandDispatcher(provider, createTestLogger().logger);
	});

	describe('get_status', () => {
		it('should report the named device status and job count', async () => {
			provider.devices = [device({ name: 'LaserJet-1', status: 'warning', pendingJobCount: 3 })];

			const result = await dispatcher.handle(command(7, 'get_status', { deviceId: 'LaserJet-1' }));

			expect(result).toEqual({
				success: true,
				message: 'Status: warning, Jobs: 3',
				deviceId: 'LaserJet-1',
				actionsTaken: [],
			});
		});

		it('should match the device name case-insensitively', async () => {
			provider.devices = [device({ name: 'LaserJet-1', status: 'error', pendingJobCount: 1 })];

			const result = await dispatcher.handle(command(1, 'get_status', { deviceId: 'laserjet-1' }));

			expect(result.message).toBe('Status: error, Jobs: 1');
		});

		it('should count devices when no device is named', async () => {
			provider.devices = [device({ name: 'A' }), device({ name: 'B' })];

			const result = await dispatcher.handle(command(2, 'get_status'));

			expect(result).toEqual({ success: true, message: 'Found 2 devices', actionsTaken: [] });
			expect('deviceId' in result).toBe(false);
		});

		it('should succeed with a not-found message for an unknown device', async () => {
			const result = await dispatcher.handle(command(3, 'get_status', { deviceId: 'Ghost' }));

			expect(result).toEqual({
				success: true,
				message: 'Device Ghost not found',
				deviceId: 'Ghost',
				actionsTaken: [],
			});
		});
	});

	describe('clear_queue', () => {
		it('should fail without a device name', async () => {
			const result = await dispatcher.handle(command(8, 'clear_queue'));

			expect(result).toEqual({ success: false, message: 'Device name is required', actionsTaken: [] });
			expect(provider.callsTo('clearQueue')).toEqual([]);
		});

		it('should take the device name from the payload', async () => {
			const result = await dispatcher.handle(command(9, 'clear_queue', { payload: { deviceName: 'Office' } }));

			expect(result).toEqual({
				success: true,
				message: 'Queue cleared for Office',
				actionsTaken: ['Purged all jobs from Office queue'],
			});
			expect(provider.callsTo('clearQueue')).toEqual([['Office']]);
		});

		it('should report a provider failure', async () => {
			provider.results.clearQueue = false;

			const result = await dispatcher.handle(command(10, 'clear_queue', { deviceId: 'A' }));

			expect(result).toEqual({
				success: false,
				message: 'Failed to clear queue for A',
				deviceId: 'A',
				actionsTaken: [],
			});
		});

		it('should turn a thrown provider fault into a failed result', async () => {
			provider.failures.clearQueue = new ProviderFault('spooler offline');

			const result = await dispatcher.handle(command(11, 'clear_queue', { deviceId: 'A' }));

			expect(result).toEqual({
				success: false,
				message: 'Command failed: spooler offline',
				deviceId: 'A',
				actionsTaken: [],
			});
		});
	});

	describe('restart_subsystem', () => {
		it('should list the stop and start actions', async () => {
			const result = await dispatcher.handle(command(12, 'restart_subsystem'));

			expect(result).toEqual({
				success: true,
				message: 'Subsystem restarted successfully',
				actionsTaken: ['Stopped subsystem service', 'Started subsystem service'],
			});
		});

		it('should fail when the restart fails', async () => {
			provider.results.restartSubsystem = false;

			const result = await dispatcher.handle(command(13, 'restart_subsystem'));

			expect(result).toEqual({ success: false, message: 'Failed to restart subsystem', actionsTaken: [] });
		});
	});

	describe('fix_device', () => {
		it('should restart, clear and verify a healthy device', async () => {
			provider.devices = [device({ name: 'LaserJet-1', status: 'online' })];

			const result = await dispatcher.handle(command(20, 'fix_device', { deviceId: 'LaserJet-1' }));

			expect(result).toEqual({
				success: true,
				message: 'Device LaserJet-1 fixed successfully',
				deviceId: 'LaserJet-1',
				actionsTaken: [
					'Restarted subsystem service',
					'Cleared queue for LaserJet-1',
					'Verified device status: online',
				],
			});
		});

		it('should keep going after a failed step and report a device still in error', async () => {
			provider.devices = [device({ name: 'LaserJet-1', status: 'error' })];
			provider.failures.restartSubsystem = new Error('service stuck');

			const result = await dispatcher.handle(command(21, 'fix_device', { deviceId: 'LaserJet-1' }));

			expect(result).toEqual({
				success: false,
				message: 'Device LaserJet-1 still showing as error',
				deviceId: 'LaserJet-1',
				actionsTaken: ['Cleared queue for LaserJet-1', 'Verified device status: error'],
			});
		});

		it('should report general maintenance when the device is not found', async () => {
			provider.results.clearQueue = false;

			const result = await dispatcher.handle(command(22, 'fix_device', { deviceId: 'Ghost' }));

			expect(result).toEqual({
				success: true,
				message: 'General device maintenance completed',
				deviceId: 'Ghost',
				actionsTaken: ['Restarted subsystem service'],
			});
		});

		it('should fail when nothing could be remediated', async () => {
			provider.results.restartSubsystem = false;

			const result = await dispatcher.handle(command(23, 'fix_device'));

			expect(result).toEqual({ success: false, message: 'Could not find specified device', actionsTaken: [] });
		});
	});

	describe('test_output', () => {
		it('should send a test output to the device', async () => {
			const result = await dispatcher.handle(command(30, 'test_output', { deviceId: 'A' }));

			expect(result).toEqual({
				success: true,
				message: 'Test output sent to A',
				deviceId: 'A',
				actionsTaken: ['Sent diagnostic test output to A'],
			});
		});
	});

	describe('install_driver', () => {
		it('should require a driver path', async () => {
			const result = await dispatcher.handle(command(40, 'install_driver'));

			expect(result).toEqual({ success: false, message: 'Driver path is required', actionsTaken: [] });
		});

		it('should use the default package selector', async () => {
			const result = await dispatcher.handle(
				command(41, 'install_driver', { payload: { driverPath: '/opt/drivers/pkg' } }),
			);

			expect(provider.callsTo('installDriver')).toEqual([['/opt/drivers/pkg', '*.inf']]);
			expect(result).toEqual({
				success: true,
				message: 'Driver installed successfully',
				actionsTaken: ['Installed driver from /opt/drivers/pkg'],
			});
		});

		it('should pass a custom package selector through', async () => {
			await dispatcher.handle(
				command(42, 'install_driver', { payload: { driverPath: '/opt/drivers/pkg', packageSelector: 'hp*.inf' } }),
			);

			expect(provider.callsTo('installDriver')).toEqual([['/opt/drivers/pkg', 'hp*.inf']]);
		});
	});

	describe('update_driver', () => {
		it('should require a download URL', async () => {
			const result = await dispatcher.handle(command(50, 'update_driver', { deviceId: 'A' }));

			expect(result).toEqual({
				success: false,
				message: 'Download URL is required',
				deviceId: 'A',
				actionsTaken: [],
			});
		});

		it('should download and install the new driver', async () => {
			const result = await dispatcher.handle(
				command(51, 'update_driver', { deviceId: 'A', payload: { downloadUrl: 'https://drivers.example.com/a.zip' } }),
			);

			expect(provider.callsTo('updateDriver')).toEqual([['A', 'https://drivers.example.com/a.zip']]);
			expect(result).toEqual({
				success: true,
				message: 'Driver update completed for A',
				deviceId: 'A',
				actionsTaken: ['Downloaded latest driver package', 'Installed updated driver'],
			});
		});
	});

	it('should reject an unknown command kind without touching the provider', async () => {
		const result = await dispatcher.handle(command(60, 'reboot_universe'));

		expect(result).toEqual({ success: false, message: 'Unknown command type: reboot_universe', actionsTaken: [] });
		expect(provider.calls).toEqual([]);
		expect(dispatcher.supports('reboot_universe')).toBe(false);
		expect(dispatcher.supports('get_status')).toBe(true);
	});

	it('should time out a command that never finishes', async () => {
		dispatcher = new CommandDispatcher(provider, createTestLogger().logger, { commandTimeoutMs: 30 });
		provider.hangOn = 'testOutput';

		const result = await dispatcher.handle(command(61, 'test_output', { deviceId: 'A' }));

		expect(result).toEqual({
			success: false,
			message: 'Command timed out after 0s',
			deviceId: 'A',
			actionsTaken: [],
		});
	});

	it('should serialize mutations of the same device', async () => {
		provider.delayMs = 20;

		await Promise.all([
			dispatcher.handle(command(70, 'clear_queue', { deviceId: 'A' })),
			dispatcher.handle(command(71, 'test_output', { deviceId: 'a' })),
			dispatcher.handle(command(72, 'clear_queue', { deviceId: 'A' })),
		]);

		// Device names are compared case-insensitively, so 'A' and 'a' share one lock
		expect(provider.maxConcurrentOverall).toBe(1);
		expect(provider.calls.map((call) => call.method)).toEqual(['clearQueue', 'testOutput', 'clearQueue']);
	});

	it('should run commands for different devices concurrently', async () => {
		provider.delayMs = 30;

		const results = await Promise.all([
			dispatcher.handle(command(80, 'clear_queue', { deviceId: 'A' })),
			dispatcher.handle(command(81, 'clear_queue', { deviceId: 'B' })),
		]);

		expect(results.map((result) => result.success)).toEqual([true, true]);
		expect(provider.callsTo('clearQueue')).toEqual([['A'], ['B']]);
		expect(provider.maxConcurrentOverall).toBe(2);
	});

	it('should use a registered handler', async () => {
		dispatcher.registerHandler('ping', async () => ({ success: true, message: 'pong', actionsTaken: ['Replied'] }));

		const result = await dispatcher.handle(command(90, 'ping', { deviceId: 'A' }));

		expect(result).toEqual({ success: true, message: 'pong', deviceId: 'A', actionsTaken: ['Replied'] });
	});

	it('should answer a malformed command with its rejection and run nothing', async () => {
		const result = await dispatcher.handle(
			command(91, '', { rejection: 'Invalid command: kind: Command kind is required' }),
		);

		expect(result).toEqual({
			success: false,
			message: 'Invalid command: kind: Command kind is required',
			actionsTaken: [],
		});
		expect(provider.calls).toEqual([]);
	});
});
