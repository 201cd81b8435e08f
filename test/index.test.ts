import { DateTime } from "luxon";
import { ILogObj, Logger } from "tslog";
import {
	Clock,
	Config,
	InvalidLocationError,
	SynchronizationPoll,
	makeSimClock,
} from "../src/index.js";

class ClockMock implements Clock {
	getCurrentTime = jest.fn();
}

function makeConfig(required: Partial<Config> = {}): Config {
	return {
		start: {
			date: "2024-01-01",
			time: "06:00",
			timeZone: "UTC",
		},
		multiplier: 4,
		sync: null,
		...required,
	};
}

const hiddenLogger = new Logger<ILogObj>({ type: "hidden" });

describe("makeSimClock", () => {
	test("builds a clock from config", () => {
		const realClock = new ClockMock();
		const realStart = DateTime.fromISO("2030-05-05T12:00:00Z");
		realClock.getCurrentTime.mockReturnValue(realStart);

		const { simClock } = makeSimClock(makeConfig(), hiddenLogger, realClock);
		realClock.getCurrentTime.mockReturnValue(realStart.plus({ minutes: 1 }));

		expect(simClock.multiplier).toEqual(4);
		expect(simClock.now().toISO()).toEqual("2024-01-01T06:04:00.000Z");
	});

	test("builds no poll without a synchronization interval", () => {
		const { synchronizationPoll } = makeSimClock(
			makeConfig({
				sync: {
					url: "http://time.test/now",
					intervalSeconds: null,
					timeoutMs: 1000,
				},
			}),
			hiddenLogger,
		);

		expect(synchronizationPoll).toBeNull();
	});

	test("builds a poll with a synchronization interval", () => {
		const { synchronizationPoll } = makeSimClock(
			makeConfig({
				sync: {
					url: "http://time.test/now",
					intervalSeconds: 60,
					timeoutMs: null,
				},
			}),
			hiddenLogger,
		);

		expect(synchronizationPoll).toBeInstanceOf(SynchronizationPoll);
	});

	test("throws an error for an unknown zone", () => {
		expect(() =>
			makeSimClock(
				makeConfig({
					start: { date: "2024-01-01", time: "06:00", timeZone: "Atlantis" },
				}),
				hiddenLogger,
			),
		).toThrow(InvalidLocationError);
	});
});
