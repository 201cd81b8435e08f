import { Logger, ILogObj } from "tslog";
import { SimClock } from "../service/SimClock.js";
import { slimError } from "../core.js";

export type Synchronizable = Pick<SimClock, "synchronize">;

/**
 * Keeps a simulated clock in step with its time source by synchronizing it
 * every interval. The first synchronization happens after a random delay
 * shorter than the interval.
 */
export class SynchronizationPoll {
	private simClock: Synchronizable;
	private address: string;
	private pollingIntervalMs: number;
	private logger: Logger<ILogObj>;
	private intervalHandle: NodeJS.Timeout | null = null;
	private cancelStartDelay: (() => void) | null = null;
	// bumped by every start and stop, so a start resumed after a stop gives up
	private run: number = 0;
	private running: boolean = false;
	private isPolling: boolean = false;

	constructor(
		simClock: Synchronizable,
		address: string,
		pollingIntervalSeconds: number,
		logger: Logger<ILogObj> = new Logger({ name: "SynchronizationPoll" }),
	) {
		this.simClock = simClock;
		this.address = address;
		this.pollingIntervalMs = pollingIntervalSeconds * 1000;
		this.logger = logger;
	}

	get isRunning(): boolean {
		return this.running;
	}

	/**
	 * Resolves once the first synchronization has been attempted, or as soon
	 * as the poll is stopped before that.
	 */
	async start(): Promise<void> {
		if (this.running) {
			this.logger.warn(
				`Synchronization poll of ${this.address} is already running`,
			);
			return;
		}
		this.running = true;
		const run = ++this.run;

		// to avoid stampede when several clocks poll the same time source
		const startDelayMs = Math.floor(Math.random() * this.pollingIntervalMs);
		this.logger.info(
			`Synchronizing with ${this.address} every ${this.pollingIntervalMs}ms, first in ${startDelayMs}ms`,
		);
		await this.startDelay(startDelayMs);
		if (run !== this.run) {
			return;
		}

		await this.poll();
		if (run !== this.run) {
			return;
		}
		this.intervalHandle = setInterval(
			() => void this.poll(),
			this.pollingIntervalMs,
		);
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.run++;
		this.cancelStartDelay?.();
		if (this.intervalHandle) {
			clearInterval(this.intervalHandle);
			this.intervalHandle = null;
		}
		this.logger.info(`Stopped synchronizing with ${this.address}`);
	}

	private startDelay(ms: number): Promise<void> {
		return new Promise((resolve) => {
			const timeoutHandle = setTimeout(() => {
				this.cancelStartDelay = null;
				resolve();
			}, ms);
			this.cancelStartDelay = () => {
				clearTimeout(timeoutHandle);
				this.cancelStartDelay = null;
				resolve();
			};
		});
	}

	private async poll(): Promise<void> {
		if (this.isPolling) {
			this.logger.warn(
				"Previous synchronization is still running, skipping",
			);
			return;
		}

		this.isPolling = true;
		try {
			await this.simClock.synchronize(this.address);
		} catch (error) {
			this.logger.error("Error synchronizing simulated time", {
				address: this.address,
				error: slimError(error),
			});
		} finally {
			this.isPolling = false;
		}
	}
}
