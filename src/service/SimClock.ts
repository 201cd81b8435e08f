import { DateTime, Duration } from "luxon";
import { ILogObj, Logger } from "tslog";
import { Clock, SystemClock } from "./Clock.js";
import { HttpTimeSource } from "./HttpTimeSource.js";
import { TimeSource } from "./TimeSource.js";
import { slimError, zoneFrom } from "../core.js";

const startLayout = "yyyy-MM-dd HH:mm";

// ECMAScript dates cover +-100,000,000 days around the Unix epoch
const maxInstantMs = 8.64e15;

export class SimClockError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message);
		this.cause = cause;
	}
}

export class InvalidLocationError extends SimClockError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}

export class InvalidTimestampError extends SimClockError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}

export class SimulatedTimeRangeError extends SimClockError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
	}
}

/**
 * Correspondence between real and simulated time from which `now()`
 * extrapolates. Replaced as a whole, never mutated in place.
 */
type Epoch = {
	readonly realAnchor: DateTime;
	readonly simAnchor: DateTime;
	readonly multiplier: number;
};

export type SimClockOptions = {
	realClock?: Clock;
	timeSource?: TimeSource;
	logger?: Logger<ILogObj>;
};

/**
 * Clock running on a simulated timeline that advances `multiplier` times
 * as fast as real time. A multiplier of zero freezes simulated time and a
 * negative one makes it run backwards.
 */
export class SimClock implements Clock {
	private epoch: Epoch;
	private origin: DateTime;
	private realClock: Clock;
	private timeSource: TimeSource;
	private logger: Logger<ILogObj>;

	constructor(
		simStart: DateTime,
		multiplier: number,
		options: SimClockOptions = {},
	) {
		this.realClock = options.realClock ?? new SystemClock();
		this.timeSource = options.timeSource ?? new HttpTimeSource();
		this.logger = options.logger ?? new Logger({ name: "SimClock" });
		this.origin = simStart;
		this.epoch = {
			realAnchor: this.realClock.getCurrentTime(),
			simAnchor: simStart,
			multiplier,
		};
		this.logger.info("Simulated clock started", {
			simStart: simStart.toISO(),
			multiplier,
		});
	}

	/**
	 * Creates a clock whose simulated time starts at the given wall time.
	 *
	 * @param startDate date in `YYYY-MM-DD` form.
	 * @param startTime 24-hour time in `HH:MM` form, without seconds.
	 * @param timeZone IANA zone name, "UTC" or "Local".
	 */
	static create(
		startDate: string,
		startTime: string,
		timeZone: string,
		multiplier: number,
		options: SimClockOptions = {},
	): SimClock {
		const zone = zoneFrom(timeZone);
		if (!zone) {
			throw new InvalidLocationError(`Unknown time zone "${timeZone}"`);
		}
		const rawStart = `${startDate} ${startTime}`;
		const simStart = DateTime.fromFormat(rawStart, startLayout, { zone });
		if (!simStart.isValid) {
			throw new InvalidTimestampError(
				`"${rawStart}" does not match ${startLayout}: ${simStart.invalidExplanation}`,
			);
		}
		return new SimClock(simStart, multiplier, options);
	}

	get multiplier(): number {
		return this.epoch.multiplier;
	}

	/**
	 * Returns the current simulated time, in the zone of the last anchor.
	 *
	 * @throws SimulatedTimeRangeError if the simulated time is past the
	 * range of representable dates.
	 */
	now(): DateTime {
		const epoch = this.epoch;
		const simulatedMs = simulatedMsAt(epoch, this.realClock.getCurrentTime());
		if (
			!Number.isFinite(simulatedMs) ||
			Math.abs(simulatedMs) > maxInstantMs
		) {
			throw new SimulatedTimeRangeError(
				`Simulated time is out of range at multiplier ${epoch.multiplier}`,
			);
		}
		return DateTime.fromMillis(simulatedMs, { zone: epoch.simAnchor.zone });
	}

	getCurrentTime(): DateTime {
		return this.now();
	}

	/**
	 * Scales a real interval to the simulated interval it corresponds to
	 * at the current multiplier. Negative when `to` is before `from`.
	 */
	duration(from: DateTime, to: DateTime): Duration {
		const realMs = to.toMillis() - from.toMillis();
		return Duration.fromMillis(realMs * this.epoch.multiplier);
	}

	/**
	 * Changes the speed from this instant on. Simulated time keeps its
	 * current value; only its rate changes.
	 */
	setMultiplier(multiplier: number): void {
		const realNow = this.realClock.getCurrentTime();
		this.epoch = {
			realAnchor: realNow,
			simAnchor: anchorAt(this.epoch, realNow),
			multiplier,
		};
		this.logger.info("Multiplier changed", { multiplier });
	}

	/**
	 * Re-anchors the extrapolation to the present. The simulated time and
	 * the multiplier are unchanged. Use `rewind()` to go back to the start.
	 */
	reset(): void {
		const realNow = this.realClock.getCurrentTime();
		const simNow = anchorAt(this.epoch, realNow);
		this.epoch = {
			realAnchor: realNow,
			simAnchor: simNow,
			multiplier: this.epoch.multiplier,
		};
		this.logger.info("Simulated clock re-anchored", {
			simNow: simNow.toISO(),
		});
	}

	/**
	 * Sets simulated time back to the start the clock was created with and
	 * lets it run again from there at the current multiplier.
	 */
	rewind(): void {
		this.epoch = {
			realAnchor: this.realClock.getCurrentTime(),
			simAnchor: this.origin,
			multiplier: this.epoch.multiplier,
		};
		this.logger.info("Simulated clock rewound", {
			simNow: this.origin.toISO(),
		});
	}

	/**
	 * Jumps simulated time to the value reported by the time source.
	 * On failure the clock is left as it was.
	 *
	 * @param address time source address, e.g. an HTTP URL.
	 */
	async synchronize(address: string): Promise<void> {
		this.logger.info("Synchronizing simulated time", { address });
		let simulatedTime: DateTime;
		try {
			simulatedTime = await this.timeSource.fetchSimulatedTime(address);
		} catch (error) {
			this.logger.error("Failed to synchronize simulated time", {
				address,
				error: slimError(error),
			});
			throw error;
		}
		// the multiplier may have changed while fetching, keep the latest one
		this.epoch = {
			realAnchor: this.realClock.getCurrentTime(),
			simAnchor: simulatedTime,
			multiplier: this.epoch.multiplier,
		};
		this.logger.info("Simulated time synchronized", {
			simulatedTime: simulatedTime.toISO(),
		});
	}
}

function simulatedMsAt(epoch: Epoch, realNow: DateTime): number {
	const elapsedRealMs = realNow.toMillis() - epoch.realAnchor.toMillis();
	// an infinite multiplier has not moved anything yet at zero elapsed time
	const elapsedSimMs =
		elapsedRealMs === 0 ? 0 : Math.trunc(elapsedRealMs * epoch.multiplier);
	return epoch.simAnchor.toMillis() + elapsedSimMs;
}

/**
 * Simulated time to re-anchor on. Unlike `now()` this never throws: past
 * the representable range it sticks to the nearest end, so the clock can
 * still be slowed down or reversed from there.
 */
function anchorAt(epoch: Epoch, realNow: DateTime): DateTime {
	const extrapolatedMs = simulatedMsAt(epoch, realNow);
	if (Number.isNaN(extrapolatedMs)) {
		// a NaN multiplier never moved simulated time
		return epoch.simAnchor;
	}
	const simulatedMs = Math.min(
		maxInstantMs,
		Math.max(-maxInstantMs, extrapolatedMs),
	);
	return DateTime.fromMillis(simulatedMs, { zone: epoch.simAnchor.zone });
}
