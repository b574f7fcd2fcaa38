/**
 * CLI Command Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { configureCommand, maskApiKey, showConfigCommand, showStatusCommand } from '../../cli/commands';

describe('CLI commands', () => {
	let dir: string;
	let configPath: string;
	let lines: string[];
	const out = (line: string) => lines.push(line);

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'device-agent-cli-'));
		configPath = path.join(dir, 'config.json');
		lines = [];
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe('maskApiKey', () => {
		it('should keep only the last four characters', () => {
			expect(maskApiKey('test-secret')).toBe('*******cret');
		});

		it('should hide short and empty keys', () => {
			expect(maskApiKey('abcd')).toBe('****');
			expect(maskApiKey('')).toBe('(not set)');
		});
	});

	describe('configure', () => {
		it('should save the configuration and print a summary', async () => {
			const saved = await configureCommand(
				{ apiKey: 'test-secret', dashboardUrl: 'https://dash.example.com/', configPath },
				out,
			);

			expect(saved).toBe(true);
			expect(lines).toEqual([
				`✅ Configuration saved to ${configPath}`,
				'   Dashboard: https://dash.example.com',
				'   API key:   *******cret',
			]);
			expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({
				apiKey: 'test-secret',
				dashboardUrl: 'https://dash.example.com',
			});
		});

		it('should print the error for an invalid URL', async () => {
			const saved = await configureCommand({ apiKey: 'test-secret', dashboardUrl: 'dashboard', configPath }, out);

			expect(saved).toBe(false);
			expect(lines).toEqual(['❌ Invalid dashboard URL: dashboard']);
		});
	});

	describe('config show', () => {
		it('should print the configuration with the key masked', () => {
			fs.writeFileSync(configPath, JSON.stringify({ apiKey: 'test-secret', dashboardUrl: 'http://dashboard.local' }));

			showConfigCommand({ configPath }, out);

			expect(lines[0]).toBe('📋 Agent Configuration:');
			expect(JSON.parse(lines[2])).toMatchObject({ apiKey: '*******cret', dashboardUrl: 'http://dashboard.local' });
			expect(lines[4]).toBe(`📁 Config file: ${configPath}`);
		});
	});

	describe('status', () => {
		it('should describe a configured agent', () => {
			fs.writeFileSync(
				configPath,
				JSON.stringify({ agentId: 'agent-1', apiKey: 'test-secret', dashboardUrl: 'https://dash.example.com', heartbeatIntervalSeconds: 30, useRealtimeTransport: true }),
			);

			expect(showStatusCommand({ configPath }, out)).toBe(true);
			expect(lines).toEqual([
				'📊 Agent Status:',
				'',
				`✅ Config File: ${configPath}`,
				'✅ Agent ID: agent-1',
				'✅ Heartbeat: https://dash.example.com/api/agents/heartbeat every 30s',
				'✅ Real-time: wss://dash.example.com/ws/agent',
			]);
		});

		it('should report a missing configuration', () => {
			fs.writeFileSync(configPath, JSON.stringify({ apiKey: '', dashboardUrl: '' }));

			expect(showStatusCommand({ configPath }, out)).toBe(false);
			expect(lines[3]).toBe('⚠️  Not configured: apiKey and dashboardUrl are required');
		});
	});
});
