import type { DeviceSnapshot } from '../devices/types';

/**
 * Host facts reported with every heartbeat
 */
export interface HostDescriptor {
	hostname: string;
	osDescriptor: string;
	ipAddress: string;
}

export interface HeartbeatPayload extends HostDescriptor {
	agentId: string;
	agentVersion: string;
	devices: DeviceSnapshot[];
}
