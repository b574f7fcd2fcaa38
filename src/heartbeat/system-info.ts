/**
 * SYSTEM INFO
 * ===========
 *
 * Host facts for the heartbeat payload, collected with systeminformation.
 */

import * as fs from 'fs';
import * as path from 'path';
import systeminformation from 'systeminformation';
import { z } from 'zod';
import type { AgentLogger } from '../logging/agent-logger';
import { ComponentLogger } from '../logging/component-logger';
import { LogComponents } from '../logging/types';
import type { HostDescriptor } from './types';

export const FALLBACK_IP_ADDRESS = '127.0.0.1';

export interface SystemInfoSource {
	describeHost(): Promise<HostDescriptor>;
}

export class SystemInformationSource implements SystemInfoSource {
	private readonly logger?: ComponentLogger;

	constructor(agentLogger?: AgentLogger) {
		this.logger = agentLogger && new ComponentLogger(agentLogger, LogComponents.SYSTEM_INFO);
	}

	public async describeHost(): Promise<HostDescriptor> {
		const [osDetails, ipAddress] = await Promise.all([this.getOsDetails(), this.getIpAddress()]);
		return {
			hostname: osDetails.hostname,
			osDescriptor: osDetails.osDescriptor,
			ipAddress,
		};
	}

	/**
	 * Format: "Debian GNU/Linux 12 (bookworm)" or similar
	 */
	private async getOsDetails(): Promise<{ hostname: string; osDescriptor: string }> {
		try {
			const osInfo = await systeminformation.osInfo();
			return {
				hostname: osInfo.hostname || 'unknown',
				osDescriptor: `${osInfo.distro} ${osInfo.release}${osInfo.codename ? ` (${osInfo.codename})` : ''}`.trim(),
			};
		} catch (error) {
			this.logger?.debugSync('OS info unavailable', { error: String(error) });
			return { hostname: 'unknown', osDescriptor: 'unknown' };
		}
	}

	/**
	 * IPv4 of the default interface, else the first external IPv4
	 */
	private async getIpAddress(): Promise<string> {
		try {
			const defaultIface = await systeminformation.networkInterfaceDefault();
			const result = await systeminformation.networkInterfaces();
			const interfaces = Array.isArray(result) ? result : [result];

			const primary = interfaces.find((iface) => iface.iface === defaultIface && iface.ip4);
			const external = interfaces.find((iface) => !iface.internal && iface.ip4);
			return primary?.ip4 || external?.ip4 || FALLBACK_IP_ADDRESS;
		} catch (error) {
			this.logger?.debugSync('Network interfaces unavailable', { error: String(error) });
			return FALLBACK_IP_ADDRESS;
		}
	}
}

const PackageManifestSchema = z.object({ version: z.string() }).passthrough();

let cachedVersion: string | undefined;

/**
 * Agent version from npm's environment, else the nearest package.json
 */
export function getAgentVersion(): string {
	if (cachedVersion) {
		return cachedVersion;
	}

	let version = process.env.npm_package_version;
	let dir = __dirname;
	for (let depth = 0; !version && depth < 5; depth++) {
		const manifestPath = path.join(dir, 'package.json');
		if (fs.existsSync(manifestPath)) {
			try {
				const manifest = PackageManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
				version = manifest.success ? manifest.data.version : undefined;
			} catch {
				version = undefined;
			}
		}
		dir = path.dirname(dir);
	}

	cachedVersion = version || '0.0.0';
	return cachedVersion;
}
