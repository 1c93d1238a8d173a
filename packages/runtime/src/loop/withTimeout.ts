/**
 * Settle with `promise`, or reject with `onTimeout()` once `timeoutMs` passes.
 * The timer is cleared either way.
 */
export const withTimeout = <T>(
	promise: Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error
): Promise<T> => {
	let timer: ReturnType<typeof setTimeout> | null = null;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => reject(onTimeout()), timeoutMs);
	});
	return Promise.race([promise, timeout]).finally(() => {
		if (timer) {
			clearTimeout(timer);
		}
	});
};
