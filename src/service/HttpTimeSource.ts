import axios, { AxiosInstance, isAxiosError } from "axios";
import { DateTime } from "luxon";
import { ILogObj, Logger } from "tslog";
import { dateTimeFromRfc3339 } from "../core.js";
import {
	FetchError,
	ParseError,
	TimeFormatError,
	TimeSource,
} from "./TimeSource.js";

export type HttpClient = Pick<AxiosInstance, "get">;

/**
 * Asks an HTTP endpoint for the simulated time. The endpoint is expected
 * to answer a GET with a JSON object carrying an RFC3339 `simulated_time`.
 */
export class HttpTimeSource implements TimeSource {
	private http: HttpClient;
	private logger: Logger<ILogObj>;

	constructor(
		http: HttpClient = axios.create(),
		logger: Logger<ILogObj> = new Logger({ name: "HttpTimeSource" }),
	) {
		this.http = http;
		this.logger = logger;
	}

	async fetchSimulatedTime(address: string): Promise<DateTime> {
		const body = await this.getBody(address);
		const rawTime = this.simulatedTimeFrom(body);
		const simulatedTime = dateTimeFromRfc3339(rawTime);
		if (!simulatedTime) {
			throw new ParseError(
				`"simulated_time" is not an RFC3339 timestamp: ${rawTime}`,
			);
		}
		return simulatedTime;
	}

	private async getBody(address: string): Promise<string> {
		try {
			this.logger.debug("Requesting simulated time", { address });
			const response = await this.http.get<string>(address, {
				responseType: "text",
			});
			return response.data;
		} catch (error) {
			if (isAxiosError(error) && error.response) {
				throw new FetchError(
					`Time source ${address} responded with status code ${error.response.status}`,
					error,
				);
			}
			throw new FetchError(
				`Failed to reach time source ${address}`,
				error,
			);
		}
	}

	private simulatedTimeFrom(body: string): string {
		let data: unknown;
		try {
			data = JSON.parse(body);
		} catch (error) {
			throw new TimeFormatError("Time source response is not JSON", error);
		}
		if (typeof data !== "object" || data === null || Array.isArray(data)) {
			throw new TimeFormatError("Time source response is not a JSON object");
		}
		const rawTime =
			"simulated_time" in data ? data.simulated_time : undefined;
		if (typeof rawTime !== "string") {
			throw new TimeFormatError(
				`"simulated_time" field must be a string, got ${typeof rawTime}`,
			);
		}
		return rawTime;
	}
}
