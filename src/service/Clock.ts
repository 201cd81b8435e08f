import { DateTime } from "luxon";

export interface Clock {
	getCurrentTime(): DateTime;
}

export class SystemClock implements Clock {
	getCurrentTime(): DateTime {
		return DateTime.now();
	}
}
