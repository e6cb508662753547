import pLimit from "p-limit";

import { MIN_PUBLISH_INTERVAL_S } from "./lib/config";

export type IntervalChange =
	| { result: "changed"; previous: number; current: number }
	| { result: "unchanged"; current: number }
	| { result: "too-small"; current: number; requested: number };

/**
 * The mutable state shared by the supervising loop and the command handler:
 * the publish interval and the time of the last publish (epoch seconds).
 *
 * Callers that read, decide and write (the cadence check, publishTelemetry,
 * changeTelemetryInterval) do so inside `withExclusive` so the two flows never
 * interleave between the check and the write.
 */
export class AgentState {
	private interval: number;
	private lastPublishAt = 0;
	private readonly exclusive = pLimit(1);

	constructor(publishInterval: number) {
		if (!Number.isInteger(publishInterval) || publishInterval <= MIN_PUBLISH_INTERVAL_S) {
			throw new RangeError(`publishInterval must be an integer > ${MIN_PUBLISH_INTERVAL_S}, got ${publishInterval}`);
		}
		this.interval = publishInterval;
	}

	get publishInterval(): number {
		return this.interval;
	}

	get lastPublish(): number {
		return this.lastPublishAt;
	}

	/** Not re-entrant: `fn` must not call withExclusive itself. */
	withExclusive<T>(fn: () => Promise<T>): Promise<T> {
		return this.exclusive(fn);
	}

	isPublishDue(now: number): boolean {
		return now - this.interval > this.lastPublishAt;
	}

	markPublished(now: number): void {
		this.lastPublishAt = now;
	}

	changePublishInterval(requested: number): IntervalChange {
		if (requested === this.interval) {
			return { result: "unchanged", current: this.interval };
		}
		if (requested <= MIN_PUBLISH_INTERVAL_S) {
			return { result: "too-small", current: this.interval, requested };
		}

		const previous = this.interval;
		this.interval = requested;
		return { result: "changed", previous, current: requested };
	}
}
