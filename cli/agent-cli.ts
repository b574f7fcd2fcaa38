#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as dotenv from 'dotenv';
import { startAgent } from '../src/app';
import { configureCommand, showConfigCommand, showStatusCommand } from './commands';

// Load environment variables
dotenv.config();

const print = (line: string) => console.log(line);

async function main(): Promise<void> {
	await yargs(hideBin(process.argv))
		.scriptName('device-agent')
		.option('config', {
			alias: 'c',
			description: 'Path to config.json (default: $AGENT_CONFIG_PATH or $CONFIG_DIR/config.json)',
			type: 'string',
		})
		.command(
			'run',
			'Run the agent in the foreground',
			(args) => args,
			async (argv) => {
				await startAgent({ configPath: argv.config });
				process.exit(0);
			},
		)
		.command(
			'configure',
			'Save dashboard credentials',
			(args) =>
				args
					.option('api-key', { description: 'Agent API key', type: 'string', demandOption: true })
					.option('dashboard-url', { description: 'Dashboard base URL', type: 'string', demandOption: true })
					.option('agent-id', { description: 'Agent identifier (default: hostname)', type: 'string' }),
			async (argv) => {
				const saved = await configureCommand(
					{
						apiKey: argv['api-key'],
						dashboardUrl: argv['dashboard-url'],
						agentId: argv['agent-id'],
						configPath: argv.config,
					},
					print,
				);
				process.exitCode = saved ? 0 : 1;
			},
		)
		.command('config', 'Inspect configuration', (args) =>
			args
				.command(
					'show',
					'Print the effective configuration (API key masked)',
					(sub) => sub,
					(argv) => showConfigCommand({ configPath: argv.config }, print),
				)
				.demandCommand(1, 'Specify a config subcommand'),
		)
		.command(
			'status',
			'Check whether the agent is configured',
			(args) => args,
			(argv) => {
				process.exitCode = showStatusCommand({ configPath: argv.config }, print) ? 0 : 1;
			},
		)
		.demandCommand(1, 'Specify a command')
		.strict()
		.help()
		.alias('help', 'h')
		.version()
		.alias('version', 'v')
		.parseAsync();
}

main().catch((error: unknown) => {
	console.error('❌', error instanceof Error ? error.message : error);
	process.exit(1);
});
