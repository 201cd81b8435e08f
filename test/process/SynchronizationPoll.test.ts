import { ILogObj, Logger } from "tslog";
import {
	Synchronizable,
	SynchronizationPoll,
} from "../../src/process/SynchronizationPoll.js";
import { FetchError } from "../../src/service/TimeSource.js";

class SimClockMock implements Synchronizable {
	synchronize = jest.fn();
}

type TestContext = {
	simClockMock: SimClockMock;
	poll: SynchronizationPoll;
};

const address = "http://time.test/now";

function testFixture(name: string, fn: (ctx: TestContext) => Promise<void>) {
	test(name, async () => {
		jest.useFakeTimers();
		// 10s interval, so the start jitter is 5s
		jest.spyOn(Math, "random").mockReturnValue(0.5);
		const simClockMock = new SimClockMock();
		simClockMock.synchronize.mockResolvedValue(undefined);
		const hiddenLogger = new Logger<ILogObj>({ type: "hidden" });
		const poll = new SynchronizationPoll(
			simClockMock,
			address,
			10,
			hiddenLogger,
		);
		try {
			await fn({ simClockMock, poll });
		} finally {
			poll.stop();
			jest.restoreAllMocks();
			jest.useRealTimers();
		}
	});
}

async function startPoll(ctx: TestContext) {
	const started = ctx.poll.start();
	await jest.advanceTimersByTimeAsync(5_000);
	await started;
}

describe("SynchronizationPoll", () => {
	testFixture("synchronizes only after the start jitter", async (ctx) => {
		const started = ctx.poll.start();

		await jest.advanceTimersByTimeAsync(4_999);
		expect(ctx.simClockMock.synchronize).not.toHaveBeenCalled();

		await jest.advanceTimersByTimeAsync(1);
		await started;
		expect(ctx.simClockMock.synchronize).toHaveBeenCalledWith(address);
	});

	testFixture("synchronizes every interval", async (ctx) => {
		await startPoll(ctx);

		await jest.advanceTimersByTimeAsync(20_000);

		expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(3);
	});

	testFixture("stops synchronizing when stopped", async (ctx) => {
		await startPoll(ctx);

		ctx.poll.stop();
		await jest.advanceTimersByTimeAsync(20_000);

		expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(1);
	});

	testFixture("stops during the start jitter", async (ctx) => {
		const started = ctx.poll.start();
		await jest.advanceTimersByTimeAsync(2_000);

		ctx.poll.stop();
		await started;
		await jest.advanceTimersByTimeAsync(60_000);

		expect(ctx.simClockMock.synchronize).not.toHaveBeenCalled();
		expect(jest.getTimerCount()).toEqual(0);
		expect(ctx.poll.isRunning).toEqual(false);
	});

	testFixture(
		"stops during the first synchronization",
		async (ctx) => {
			let finishSynchronize = () => {};
			ctx.simClockMock.synchronize.mockReturnValueOnce(
				new Promise<void>((resolve) => {
					finishSynchronize = () => resolve();
				}),
			);
			const started = ctx.poll.start();
			await jest.advanceTimersByTimeAsync(5_000);
			expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(1);

			ctx.poll.stop();
			finishSynchronize();
			await started;
			await jest.advanceTimersByTimeAsync(60_000);

			expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(1);
			expect(jest.getTimerCount()).toEqual(0);
		},
	);

	testFixture("ignores a start while already running", async (ctx) => {
		await startPoll(ctx);

		await ctx.poll.start();
		await jest.advanceTimersByTimeAsync(10_000);

		expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(2);
		expect(jest.getTimerCount()).toEqual(1);
	});

	testFixture("ignores a start during the start jitter", async (ctx) => {
		const started = ctx.poll.start();
		await ctx.poll.start();
		await jest.advanceTimersByTimeAsync(5_000);
		await started;

		expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(1);
		expect(jest.getTimerCount()).toEqual(1);
	});

	testFixture("restarts after being stopped", async (ctx) => {
		await startPoll(ctx);
		ctx.poll.stop();

		await startPoll(ctx);
		await jest.advanceTimersByTimeAsync(10_000);

		expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(3);
		expect(ctx.poll.isRunning).toEqual(true);
	});

	testFixture(
		"skips a tick while synchronization is still running",
		async (ctx) => {
			await startPoll(ctx);
			ctx.simClockMock.synchronize.mockReturnValue(new Promise(() => {}));

			await jest.advanceTimersByTimeAsync(20_000);

			expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(2);
		},
	);

	testFixture(
		"keeps polling after a failed synchronization",
		async (ctx) => {
			ctx.simClockMock.synchronize.mockRejectedValueOnce(
				new FetchError("Time source is down"),
			);

			await startPoll(ctx);
			await jest.advanceTimersByTimeAsync(10_000);

			expect(ctx.simClockMock.synchronize).toHaveBeenCalledTimes(2);
		},
	);
});
