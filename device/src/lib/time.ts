/**
 * Seconds since the Unix epoch, rounded to the nearest integer.
 */
export function epochSeconds(now: number = Date.now()): number {
	return Math.round(now / 1000);
}

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date = new Date()): string {
	const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
	const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
	return `${day} ${time}`;
}

/**
 * Promise-based delay. Resolves early (never rejects) once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) return Promise.resolve();

	return new Promise(resolve => {
		const done = () => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", done);
			resolve();
		};
		const timer = setTimeout(done, ms);
		signal?.addEventListener("abort", done, { once: true });
	});
}
