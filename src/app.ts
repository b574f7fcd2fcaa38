/**
 * Device Agent Entry Point
 *
 * Wires configuration, logging and the script device provider into a
 * DeviceAgent and runs it until SIGINT/SIGTERM.
 */

import process from 'process';
import * as dotenv from 'dotenv';
import { DeviceAgent } from './agent';
import { ConfigStore } from './config-loader';
import { ScriptDeviceProvider } from './devices/script-provider';
import { AgentLogger } from './logging/agent-logger';
import { LocalLogBackend } from './logging/local-backend';
import { describeError } from './errors';

export interface StartAgentOptions {
	configPath?: string;
}

/**
 * Run the agent until a shutdown signal arrives
 */
export async function startAgent(options: StartAgentOptions = {}): Promise<void> {
	const config = new ConfigStore({ configPath: options.configPath });
	const initial = config.getConfig();

	const backend = new LocalLogBackend({ logDir: initial.logDir });
	await backend.initialize();
	const logger = new AgentLogger([backend], initial.logLevel);
	config.setLogger(logger);

	const provider = new ScriptDeviceProvider(
		{ handlerDir: initial.deviceHandlerDir, timeoutMs: initial.commandTimeoutSeconds * 1000 },
		logger,
	);
	const agent = new DeviceAgent({ config, provider, logger });

	const controller = new AbortController();
	const shutdown = (reason: string) => {
		if (controller.signal.aborted) {
			console.log(`Already shutting down, ignoring ${reason}`);
			return;
		}
		console.log(`\n${reason} received. Starting graceful shutdown...`);
		controller.abort();
	};

	const onSigterm = () => shutdown('SIGTERM');
	const onSigint = () => shutdown('SIGINT');
	const onUnhandledRejection = (reason: unknown) => {
		logger.errorSync('Unhandled rejection', reason);
		shutdown('unhandledRejection');
	};

	process.on('SIGTERM', onSigterm);
	process.on('SIGINT', onSigint);
	process.on('unhandledRejection', onUnhandledRejection);

	try {
		await agent.run(controller.signal);
		console.log('✅ Device agent stopped successfully');
	} finally {
		process.off('SIGTERM', onSigterm);
		process.off('SIGINT', onSigint);
		process.off('unhandledRejection', onUnhandledRejection);
		backend.stop();
	}
}

if (require.main === module) {
	dotenv.config();

	startAgent()
		.then(() => process.exit(0))
		.catch((error: unknown) => {
			console.error('❌ Device agent failed:', describeError(error));
			process.exit(1);
		});
}
