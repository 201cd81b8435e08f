import { DateTime } from "luxon";

/**
 * Authoritative source of simulated time used by `SimClock.synchronize`.
 */
export interface TimeSource {
	/**
	 * @param address where to ask for the simulated time, e.g. an HTTP URL.
	 * @returns the simulated time the source reports right now.
	 */
	fetchSimulatedTime(address: string): Promise<DateTime>;
}

export class TimeSourceError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message);
		this.cause = cause;
	}
}

export class FetchError extends TimeSourceError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}

export class TimeFormatError extends TimeSourceError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}

export class ParseError extends TimeSourceError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}
