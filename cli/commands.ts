/**
 * Device Agent CLI commands
 * =========================
 *
 * Each command writes its report through `out` so it can run outside a terminal.
 */

import * as fs from 'fs';
import { ConfigStore } from '../src/config-loader';
import { describeError } from '../src/errors';
import { buildDashboardEndpoint, buildRealtimeUrl } from '../src/utils/api-utils';

export type Output = (line: string) => void;

/**
 * Keep the last four characters of a secret
 */
export function maskApiKey(apiKey: string): string {
	if (!apiKey) {
		return '(not set)';
	}
	if (apiKey.length <= 4) {
		return '****';
	}
	return `${'*'.repeat(apiKey.length - 4)}${apiKey.slice(-4)}`;
}

export async function configureCommand(
	options: { apiKey: string; dashboardUrl: string; agentId?: string; configPath?: string },
	out: Output,
): Promise<boolean> {
	const store = new ConfigStore({ configPath: options.configPath });
	try {
		const config = await store.reconfigure({
			apiKey: options.apiKey,
			dashboardUrl: options.dashboardUrl,
			agentId: options.agentId,
		});
		out(`✅ Configuration saved to ${store.getConfigPath()}`);
		out(`   Dashboard: ${config.dashboardUrl}`);
		out(`   API key:   ${maskApiKey(config.apiKey)}`);
		return true;
	} catch (error) {
		out(`❌ ${describeError(error)}`);
		return false;
	}
}

export function showConfigCommand(options: { configPath?: string }, out: Output): void {
	const store = new ConfigStore({ configPath: options.configPath });
	const config = store.getConfig();

	out('📋 Agent Configuration:');
	out('');
	out(JSON.stringify({ ...config, apiKey: maskApiKey(config.apiKey) }, null, 2));
	out('');
	out(`📁 Config file: ${store.getConfigPath()}`);
}

export function showStatusCommand(options: { configPath?: string }, out: Output): boolean {
	const store = new ConfigStore({ configPath: options.configPath });
	const config = store.getConfig();
	const identity = store.getIdentity();

	out('📊 Agent Status:');
	out('');
	out(fs.existsSync(store.getConfigPath())
		? `✅ Config File: ${store.getConfigPath()}`
		: `⚠️  Config File: Not found (${store.getConfigPath()})`);

	if (!store.isReady()) {
		out('⚠️  Not configured: apiKey and dashboardUrl are required');
		out('   Set them with: device-agent configure --api-key <key> --dashboard-url <url>');
		return false;
	}

	out(`✅ Agent ID: ${identity.agentId}`);
	out(`✅ Heartbeat: ${buildDashboardEndpoint(config.dashboardUrl, '/agents/heartbeat')} every ${config.heartbeatIntervalSeconds}s`);
	out(config.useRealtimeTransport
		? `✅ Real-time: ${buildRealtimeUrl(config.dashboardUrl)}`
		: 'ℹ️  Real-time: disabled (HTTP only)');
	return true;
}
