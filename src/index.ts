import axios from "axios";
import { ILogObj, Logger } from "tslog";
import { Config } from "./config.js";
import { SynchronizationPoll } from "./process/SynchronizationPoll.js";
import { HttpTimeSource } from "./service/HttpTimeSource.js";
import { SimClock } from "./service/SimClock.js";
import { Clock, SystemClock } from "./service/Clock.js";

export type { Config, SyncConfig } from "./config.js";
export { ConfigError, configFromProcessEnv, loadConfig } from "./config.js";
export { SynchronizationPoll } from "./process/SynchronizationPoll.js";
export type { Clock } from "./service/Clock.js";
export { SystemClock } from "./service/Clock.js";
export type { HttpClient } from "./service/HttpTimeSource.js";
export { HttpTimeSource } from "./service/HttpTimeSource.js";
export type { SimClockOptions } from "./service/SimClock.js";
export {
	InvalidLocationError,
	InvalidTimestampError,
	SimClock,
	SimClockError,
	SimulatedTimeRangeError,
} from "./service/SimClock.js";
export type { TimeSource } from "./service/TimeSource.js";
export {
	FetchError,
	ParseError,
	TimeFormatError,
	TimeSourceError,
} from "./service/TimeSource.js";

export type SimClockSetup = {
	simClock: SimClock;
	// null unless both a sync URL and an interval are configured
	synchronizationPoll: SynchronizationPoll | null;
};

/**
 * Builds a simulated clock from config. The synchronization poll, if any,
 * is returned unstarted.
 */
export function makeSimClock(
	config: Config,
	logger: Logger<ILogObj> = new Logger({ name: "simclock" }),
	realClock: Clock = new SystemClock(),
): SimClockSetup {
	function makeLogger(name: string) {
		return logger.getSubLogger({ name });
	}

	const http = axios.create({ timeout: config.sync?.timeoutMs ?? 0 });
	const timeSource = new HttpTimeSource(http, makeLogger("HttpTimeSource"));

	const simClock = SimClock.create(
		config.start.date,
		config.start.time,
		config.start.timeZone,
		config.multiplier,
		{ realClock, timeSource, logger: makeLogger("SimClock") },
	);

	const synchronizationPoll =
		config.sync && config.sync.intervalSeconds !== null
			? new SynchronizationPoll(
					simClock,
					config.sync.url,
					config.sync.intervalSeconds,
					makeLogger("SynchronizationPoll"),
				)
			: null;

	return { simClock, synchronizationPoll };
}
