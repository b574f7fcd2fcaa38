/**
 * Cancellable delay.
 *
 * Resolves `true` once the delay elapses, or `false` as soon as the signal aborts
 * (immediately if it already has).
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) {
		return Promise.resolve(false);
	}

	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve(true);
		}, Math.max(0, ms));

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}
