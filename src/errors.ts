/**
 * Agent Error Taxonomy
 * ====================
 *
 * Every fault is contained by the activity that raised it:
 *   TransportFault  - handshake/frame/IO failure, channel reconnects after the delay
 *   ProtocolFault   - malformed or unrecognized frame/command, dropped
 *   ProviderFault   - device operation failed, surfaced as success=false
 *   ConfigFault     - missing or invalid configuration, agent idles until ready
 */

export class AgentError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class TransportFault extends AgentError {}

export class ProtocolFault extends AgentError {}

export class ProviderFault extends AgentError {}

export class ConfigFault extends AgentError {}

export class InternalInconsistencyError extends AgentError {}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message || error.name;
	}
	if (typeof error === 'string') {
		return error;
	}
	try {
		return JSON.stringify(error) ?? String(error);
	} catch {
		return String(error);
	}
}
