/**
 * Network error classification utilities
 * Used for log context on fallback and channel failures
 */

import axios from 'axios';

/**
 * Read a Node.js system error code from the error or its cause
 */
function errorCode(error: Error): string | undefined {
	if ('code' in error && typeof error.code === 'string') {
		return error.code;
	}
	const cause: unknown = error.cause;
	if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
		return cause.code;
	}
	return undefined;
}

/**
 * DNS resolution errors
 */
export function isDnsError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const code = errorCode(error);
	if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
		return true;
	}

	const msg = error.message.toLowerCase();
	return msg.includes('getaddrinfo') &&
		(msg.includes('enotfound') || msg.includes('eai_again'));
}

/**
 * Connection refused (dashboard down/unreachable)
 */
export function isConnectionRefused(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (errorCode(error) === 'ECONNREFUSED') {
		return true;
	}

	return error.message.toLowerCase().includes('econnrefused');
}

/**
 * Timeout errors
 */
export function isTimeout(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const code = errorCode(error);
	if (code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'ECONNABORTED') {
		return true;
	}

	return error.message.toLowerCase().includes('timeout');
}

/**
 * Network unreachable
 */
export function isNetworkUnreachable(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const code = errorCode(error);
	if (code === 'ENETUNREACH' || code === 'EHOSTUNREACH') {
		return true;
	}

	const msg = error.message.toLowerCase();
	return msg.includes('network unreachable') || msg.includes('host unreachable');
}

/**
 * HTTP status carried by an axios error, if the server answered
 */
export function getHttpStatus(error: unknown): number | undefined {
	if (axios.isAxiosError(error)) {
		return error.response?.status;
	}
	return undefined;
}

/**
 * Get human-readable error type
 */
export function getNetworkErrorType(error: unknown): string {
	const status = getHttpStatus(error);
	if (status !== undefined) return `HTTP_${status}`;
	if (isDnsError(error)) return 'DNS_ERROR';
	if (isConnectionRefused(error)) return 'CONNECTION_REFUSED';
	if (isTimeout(error)) return 'TIMEOUT';
	if (isNetworkUnreachable(error)) return 'NETWORK_UNREACHABLE';
	return 'UNKNOWN';
}
