/**
 * API UTILITIES - Dashboard Endpoint Handling
 * ===========================================
 *
 * Normalizes the configured dashboard URL and builds the HTTP and real-time
 * endpoints the agent talks to.
 *
 * Usage:
 * ```typescript
 * import { buildDashboardEndpoint, buildRealtimeUrl } from './utils/api-utils';
 *
 * buildDashboardEndpoint('https://dash.example.com/', '/agents/heartbeat');
 * // => 'https://dash.example.com/api/agents/heartbeat'
 *
 * buildRealtimeUrl('https://dash.example.com');
 * // => 'wss://dash.example.com/ws/agent'
 * ```
 */

export const REALTIME_PATH = '/ws/agent';

/**
 * Normalize dashboard base URL
 *
 * Removes surrounding whitespace, trailing slashes and a trailing /api segment,
 * so operators may configure either form.
 *
 * @example
 * normalizeDashboardUrl('http://localhost:5000/api/')
 * // => 'http://localhost:5000'
 */
export function normalizeDashboardUrl(dashboardUrl: string): string {
	const trimmed = dashboardUrl.trim().replace(/\/+$/, '');

	if (trimmed.endsWith('/api')) {
		return trimmed.slice(0, -'/api'.length);
	}

	return trimmed;
}

/**
 * Check that a dashboard URL is absolute http(s)
 */
export function isValidDashboardUrl(dashboardUrl: string): boolean {
	try {
		const parsed = new URL(dashboardUrl.trim());
		return parsed.protocol === 'http:' || parsed.protocol === 'https:';
	} catch {
		return false;
	}
}

/**
 * Build full HTTP API endpoint with path
 *
 * @example
 * buildDashboardEndpoint('http://localhost:5000', 'agents/command/42/result')
 * // => 'http://localhost:5000/api/agents/command/42/result'
 */
export function buildDashboardEndpoint(dashboardUrl: string, path: string): string {
	const normalizedPath = path.startsWith('/') ? path : `/${path}`;
	return `${normalizeDashboardUrl(dashboardUrl)}/api${normalizedPath}`;
}

/**
 * Build the real-time channel URL (http -> ws, https -> wss)
 */
export function buildRealtimeUrl(dashboardUrl: string): string {
	const base = normalizeDashboardUrl(dashboardUrl).replace(/^http(s?):\/\//i, (_match, secure: string) =>
		secure ? 'wss://' : 'ws://',
	);
	return `${base}${REALTIME_PATH}`;
}
