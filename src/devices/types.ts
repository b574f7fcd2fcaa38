import { z } from 'zod';

/**
 * Device health as reported by the capability provider
 */
export const DeviceStatusSchema = z.enum(['online', 'warning', 'error', 'offline', 'unknown']);

export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

/**
 * Point-in-time state of one managed device.
 * Produced fresh on every heartbeat tick.
 */
export const DeviceSnapshotSchema = z.object({
	name: z.string().min(1),
	model: z.string().default(''),
	manufacturer: z.string().default(''),
	port: z.string().default(''),
	status: DeviceStatusSchema.catch('unknown'),
	driverVersion: z.string().default(''),
	driverStatus: z.string().default('current'),
	/** Consumable name -> remaining percentage */
	consumableLevels: z.record(z.number()).optional(),
	pendingJobCount: z.number().int().nonnegative().default(0),
});

export type DeviceSnapshot = z.infer<typeof DeviceSnapshotSchema>;

/**
 * Narrow capability interface over the platform's device tooling.
 * Every operation reports success as a boolean; a rejection is treated as failure.
 */
export interface DeviceCapabilityProvider {
	listDevices(): Promise<DeviceSnapshot[]>;
	restartSubsystem(): Promise<boolean>;
	clearQueue(deviceName: string): Promise<boolean>;
	testOutput(deviceName: string): Promise<boolean>;
	installDriver(driverPath: string, packageSelector: string): Promise<boolean>;
	updateDriver(deviceName: string, downloadUrl: string): Promise<boolean>;
}
