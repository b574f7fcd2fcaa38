/**
 * Script Device Provider
 * ======================
 *
 * Implements the device capability interface by running handler executables from
 * a directory, one per operation:
 *
 *   list-devices                         prints a JSON array of device snapshots
 *   restart-subsystem
 *   clear-queue <device>
 *   test-output <device>
 *   install-driver <path> <selector>
 *   update-driver <device> <downloadUrl>
 *
 * Exit code 0 means success. Output is captured, size-limited and logged.
 */

import { spawn } from 'child_process';
import type { ChildProcess, SpawnOptions } from 'child_process';
import * as path from 'path';
import { ProviderFault, describeError } from '../errors';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import { DeviceSnapshotSchema } from './types';
import type { DeviceCapabilityProvider, DeviceSnapshot } from './types';

export const HANDLERS = {
	LIST_DEVICES: 'list-devices',
	RESTART_SUBSYSTEM: 'restart-subsystem',
	CLEAR_QUEUE: 'clear-queue',
	TEST_OUTPUT: 'test-output',
	INSTALL_DRIVER: 'install-driver',
	UPDATE_DRIVER: 'update-driver',
} as const;

const KILL_GRACE_MS = 5000;

export interface ScriptDeviceProviderConfig {
	handlerDir: string;
	/** Per-call timeout in milliseconds */
	timeoutMs?: number;
	/** Captured output is cut at this many characters */
	maxOutputLength?: number;
}

export interface HandlerRunResult {
	exitCode: number;
	stdout: string;
	stderr: string;
	success: boolean;
	reason: string;
}

export class ScriptDeviceProvider implements DeviceCapabilityProvider {
	private readonly config: Required<ScriptDeviceProviderConfig>;
	private readonly logger: ComponentLogger;

	constructor(config: ScriptDeviceProviderConfig, agentLogger: AgentLogger) {
		this.config = {
			handlerDir: config.handlerDir,
			timeoutMs: config.timeoutMs ?? 120_000,
			maxOutputLength: config.maxOutputLength ?? 1024 * 1024,
		};
		this.logger = new ComponentLogger(agentLogger, LogComponents.DEVICE_PROVIDER);
	}

	public async listDevices(): Promise<DeviceSnapshot[]> {
		const result = await this.runHandler(HANDLERS.LIST_DEVICES, []);
		if (!result.success) {
			throw new ProviderFault(`Device enumeration failed: ${result.reason}`);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(result.stdout.trim() || '[]');
		} catch (error) {
			throw new ProviderFault('Device enumeration returned invalid JSON', { cause: error });
		}
		if (!Array.isArray(parsed)) {
			throw new ProviderFault('Device enumeration did not return an array');
		}

		const devices: DeviceSnapshot[] = [];
		for (const entry of parsed) {
			const snapshot = DeviceSnapshotSchema.safeParse(entry);
			if (snapshot.success) {
				devices.push(snapshot.data);
			} else {
				this.logger.warnSync('Skipping invalid device entry', {
					operation: HANDLERS.LIST_DEVICES,
					issues: snapshot.error.issues.map((issue) => issue.message),
				});
			}
		}
		return devices;
	}

	public async restartSubsystem(): Promise<boolean> {
		return this.runBoolean(HANDLERS.RESTART_SUBSYSTEM, []);
	}

	public async clearQueue(deviceName: string): Promise<boolean> {
		return this.runBoolean(HANDLERS.CLEAR_QUEUE, [deviceName]);
	}

	public async testOutput(deviceName: string): Promise<boolean> {
		return this.runBoolean(HANDLERS.TEST_OUTPUT, [deviceName]);
	}

	public async installDriver(driverPath: string, packageSelector: string): Promise<boolean> {
		return this.runBoolean(HANDLERS.INSTALL_DRIVER, [driverPath, packageSelector]);
	}

	public async updateDriver(deviceName: string, downloadUrl: string): Promise<boolean> {
		return this.runBoolean(HANDLERS.UPDATE_DRIVER, [deviceName, downloadUrl]);
	}

	private async runBoolean(handler: string, args: string[]): Promise<boolean> {
		const result = await this.runHandler(handler, args);
		if (!result.success) {
			this.logger.warnSync(`Handler ${handler} failed: ${result.reason}`, {
				operation: handler,
				stderr: result.stderr,
			});
		}
		return result.success;
	}

	/**
	 * Execute a handler executable. Never rejects.
	 *
	 * Each handler runs in its own process group. On timeout the whole group is
	 * signalled and the call settles at once, whether or not the processes that
	 * still hold its output pipes have exited.
	 */
	public runHandler(handler: string, args: string[]): Promise<HandlerRunResult> {
		const command = path.join(this.config.handlerDir, handler);
		this.logger.debugSync(`Running handler ${handler}`, { operation: handler, args });

		return new Promise((resolve) => {
			const options: SpawnOptions = {
				stdio: ['ignore', 'pipe', 'pipe'],
				shell: false,
				detached: true,
			};

			let stdout = '';
			let stderr = '';
			let settled = false;
			let killTimer: NodeJS.Timeout | undefined;

			const finish = (result: HandlerRunResult) => {
				if (settled) {
					return;
				}
				settled = true;
				clearTimeout(timer);
				resolve(result);
			};

			let child: ChildProcess;
			try {
				child = spawn(command, args, options);
			} catch (error) {
				const message = describeError(error);
				resolve({ exitCode: 1, stdout: '', stderr: message, success: false, reason: `Process spawn failed: ${message}` });
				return;
			}

			const timer = setTimeout(() => {
				this.signalGroup(child, handler, 'SIGTERM');
				child.stdout?.destroy();
				child.stderr?.destroy();

				// Force kill after the grace period
				killTimer = setTimeout(() => {
					this.signalGroup(child, handler, 'SIGKILL');
				}, KILL_GRACE_MS);
				killTimer.unref();

				finish({
					exitCode: 1,
					stdout,
					stderr,
					success: false,
					reason: `Handler timed out after ${this.config.timeoutMs}ms`,
				});
			}, this.config.timeoutMs);

			child.stdout?.on('data', (data: Buffer) => {
				stdout = this.truncateOutput(stdout + data.toString());
			});

			child.stderr?.on('data', (data: Buffer) => {
				stderr = this.truncateOutput(stderr + data.toString());
			});

			child.on('exit', () => {
				clearTimeout(killTimer);
			});

			child.on('close', (code) => {
				const exitCode = code ?? 1;
				const success = exitCode === 0;
				const reason = success ? 'Handler executed successfully' : `Handler failed with exit code ${exitCode}`;

				finish({ exitCode, stdout, stderr, success, reason });
			});

			child.on('error', (error) => {
				finish({
					exitCode: 1,
					stdout: '',
					stderr: error.message,
					success: false,
					reason: `Process spawn failed: ${error.message}`,
				});
			});
		});
	}

	private signalGroup(child: ChildProcess, handler: string, signal: NodeJS.Signals): void {
		if (child.pid === undefined) {
			return;
		}
		try {
			process.kill(-child.pid, signal);
		} catch (error) {
			// ESRCH: the group already exited
			this.logger.debugSync(`Could not signal handler ${handler}`, { signal, reason: describeError(error) });
		}
	}

	private truncateOutput(output: string): string {
		if (output.length <= this.config.maxOutputLength) {
			return output;
		}
		return output.substring(0, this.config.maxOutputLength);
	}
}
