/**
 * Config Store Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigStore, parseBoolean, parseNumber, resolveConfigPath } from '../../src/config-loader';
import type { AgentConfig } from '../../src/config-loader';
import { ConfigFault } from '../../src/errors';

describe('ConfigStore', () => {
	let dir: string;
	let configPath: string;

	function writeConfig(content: unknown): void {
		fs.writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content));
	}

	function readConfig(): unknown {
		return JSON.parse(fs.readFileSync(configPath, 'utf-8'));
	}

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), 'device-agent-config-'));
		configPath = path.join(dir, 'config.json');
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe('loading', () => {
		it('should use defaults when nothing is configured', () => {
			const store = new ConfigStore({ configPath, env: {} });
			const config = store.getConfig();

			expect(config).toMatchObject({
				agentId: '',
				apiKey: '',
				dashboardUrl: '',
				heartbeatIntervalSeconds: 30,
				useRealtimeTransport: true,
				reconnectDelaySeconds: 10,
				reconnectStrategy: 'fixed',
				commandTimeoutSeconds: 180,
				logLevel: 'info',
			});
			expect(store.isReady()).toBe(false);
		});

		it('should read the environment layer', () => {
			const store = new ConfigStore({
				configPath,
				env: {
					API_KEY: 'test-secret',
					DASHBOARD_URL: 'http://dashboard.local:5000',
					HEARTBEAT_INTERVAL_SECONDS: '15',
					USE_REALTIME_TRANSPORT: 'false',
					LOG_LEVEL: 'debug',
				},
			});

			expect(store.isReady()).toBe(true);
			expect(store.getConfig()).toMatchObject({
				apiKey: 'test-secret',
				dashboardUrl: 'http://dashboard.local:5000',
				heartbeatIntervalSeconds: 15,
				useRealtimeTransport: false,
				logLevel: 'debug',
			});
		});

		it('should let the file override the environment', () => {
			writeConfig({ apiKey: 'file-key', heartbeatIntervalSeconds: 45 });

			const store = new ConfigStore({
				configPath,
				env: { API_KEY: 'env-key', DASHBOARD_URL: 'http://dashboard.local', HEARTBEAT_INTERVAL_SECONDS: '15' },
			});

			expect(store.getConfig()).toMatchObject({
				apiKey: 'file-key',
				dashboardUrl: 'http://dashboard.local',
				heartbeatIntervalSeconds: 45,
			});
		});

		it('should drop invalid values and keep the rest', () => {
			writeConfig({ apiKey: 'test-secret', heartbeatIntervalSeconds: -5, reconnectStrategy: 'random' });

			const config = new ConfigStore({ configPath, env: {} }).getConfig();

			expect(config.apiKey).toBe('test-secret');
			expect(config.heartbeatIntervalSeconds).toBe(30);
			expect(config.reconnectStrategy).toBe('fixed');
		});

		it('should fall back to defaults for a file that is not JSON', () => {
			writeConfig('{ not json');

			const store = new ConfigStore({ configPath, env: { API_KEY: 'test-secret' } });

			expect(store.getConfig().apiKey).toBe('test-secret');
			expect(store.getConfig().heartbeatIntervalSeconds).toBe(30);
		});

		it('should map the legacy useWebSocket switch', () => {
			writeConfig({ useWebSocket: false });

			expect(new ConfigStore({ configPath, env: {} }).getConfig().useRealtimeTransport).toBe(false);
		});

		it('should default the agent id to the hostname', () => {
			writeConfig({ apiKey: 'test-secret', dashboardUrl: 'http://dashboard.local' });

			expect(new ConfigStore({ configPath, env: {} }).getIdentity()).toEqual({
				agentId: os.hostname(),
				apiKey: 'test-secret',
				dashboardUrl: 'http://dashboard.local',
			});
		});
	});

	describe('reload', () => {
		it('should emit changed only when the configuration differs', () => {
			writeConfig({ apiKey: 'test-secret' });
			const store = new ConfigStore({ configPath, env: {} });
			const listener = jest.fn<(config: AgentConfig, previous: AgentConfig) => void>();
			store.on('changed', listener);

			store.reload();
			expect(listener).not.toHaveBeenCalled();

			writeConfig({ apiKey: 'test-secret', heartbeatIntervalSeconds: 60 });
			store.reload();

			expect(listener).toHaveBeenCalledTimes(1);
			expect(listener.mock.calls[0][0].heartbeatIntervalSeconds).toBe(60);
			expect(listener.mock.calls[0][1].heartbeatIntervalSeconds).toBe(30);
		});
	});

	describe('reconfigure', () => {
		it('should persist credentials, keep other keys and emit changed', async () => {
			writeConfig({ heartbeatIntervalSeconds: 45 });
			const store = new ConfigStore({ configPath, env: {} });
			const listener = jest.fn<(config: AgentConfig, previous: AgentConfig) => void>();
			store.on('changed', listener);

			const config = await store.reconfigure({ apiKey: ' test-secret ', dashboardUrl: 'https://dash.example.com/' });

			expect(readConfig()).toEqual({
				heartbeatIntervalSeconds: 45,
				apiKey: 'test-secret',
				dashboardUrl: 'https://dash.example.com',
			});
			expect(config).toMatchObject({ apiKey: 'test-secret', dashboardUrl: 'https://dash.example.com' });
			expect(store.isReady()).toBe(true);
			expect(listener).toHaveBeenCalledTimes(1);
			expect(fs.readdirSync(dir)).toEqual(['config.json']);
		});

		it('should create the config directory', async () => {
			configPath = path.join(dir, 'nested', 'config.json');
			const store = new ConfigStore({ configPath, env: {} });

			await store.reconfigure({ apiKey: 'test-secret', dashboardUrl: 'http://dashboard.local', agentId: 'agent-7' });

			expect(readConfig()).toEqual({ apiKey: 'test-secret', dashboardUrl: 'http://dashboard.local', agentId: 'agent-7' });
			expect(store.getIdentity().agentId).toBe('agent-7');
		});

		it('should reject an invalid dashboard URL without writing', async () => {
			const store = new ConfigStore({ configPath, env: {} });

			await expect(store.reconfigure({ apiKey: 'test-secret', dashboardUrl: 'dashboard' })).rejects.toThrow(
				new ConfigFault('Invalid dashboard URL: dashboard'),
			);
			expect(fs.existsSync(configPath)).toBe(false);
		});

		it('should reject an empty API key', async () => {
			const store = new ConfigStore({ configPath, env: {} });

			await expect(store.reconfigure({ apiKey: '  ', dashboardUrl: 'http://dashboard.local' })).rejects.toThrow(
				new ConfigFault('API key is required'),
			);
		});
	});
});

describe('resolveConfigPath', () => {
	it('should prefer AGENT_CONFIG_PATH', () => {
		expect(resolveConfigPath({ AGENT_CONFIG_PATH: '/tmp/agent.json', CONFIG_DIR: '/srv' })).toBe('/tmp/agent.json');
	});

	it('should look in CONFIG_DIR', () => {
		expect(resolveConfigPath({ CONFIG_DIR: '/srv/agent' })).toBe('/srv/agent/config.json');
	});

	it('should default to /etc/device-agent', () => {
		expect(resolveConfigPath({})).toBe('/etc/device-agent/config.json');
	});
});

describe('environment parsing', () => {
	it('should parse numbers and ignore blanks', () => {
		expect(parseNumber('15')).toBe(15);
		expect(parseNumber('0.5')).toBe(0.5);
		expect(parseNumber('  ')).toBeUndefined();
		expect(parseNumber('abc')).toBeUndefined();
	});

	it('should parse booleans', () => {
		expect(parseBoolean('TRUE')).toBe(true);
		expect(parseBoolean('1')).toBe(true);
		expect(parseBoolean('no')).toBe(false);
		expect(parseBoolean(undefined)).toBeUndefined();
	});
});
