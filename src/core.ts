import { isAxiosError } from "axios";
import {
	DateTime,
	FixedOffsetZone,
	IANAZone,
	SystemZone,
	Zone,
} from "luxon";

const rfc3339Pattern =
	/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Resolves a time zone name the way zone databases usually do:
 * empty string and "UTC" are UTC, "Local" is the host zone,
 * anything else must be an IANA identifier, spelled with its exact case.
 *
 * @returns the zone, or null if the name is unknown.
 */
export function zoneFrom(timeZone: string): Zone | null {
	if (timeZone === "" || timeZone === "UTC") {
		return FixedOffsetZone.utcInstance;
	}
	if (timeZone === "Local") {
		return SystemZone.instance;
	}
	const zone = IANAZone.create(timeZone);
	if (!zone.isValid) {
		return null;
	}
	// Intl matches zone names case-insensitively, zone databases do not.
	// Links such as Asia/Calcutta may resolve to another name, so only a
	// difference in case is rejected.
	const resolvedName = new Intl.DateTimeFormat("en-US", {
		timeZone,
	}).resolvedOptions().timeZone;
	if (
		resolvedName !== timeZone &&
		resolvedName.toLowerCase() === timeZone.toLowerCase()
	) {
		return null;
	}
	return zone;
}

/**
 * Parses an RFC3339 timestamp, keeping its offset as the zone.
 *
 * @returns the timestamp, or null if the string is not RFC3339.
 */
export function dateTimeFromRfc3339(raw: string): DateTime | null {
	if (!rfc3339Pattern.test(raw)) {
		return null;
	}
	const parsed = DateTime.fromISO(raw, { setZone: true });
	return parsed.isValid ? parsed : null;
}

/**
 * Returns slimmer error object for logging.
 */
export function slimError(
	error: unknown,
	maxDepth: number = 5,
	depth: number = 0,
): unknown {
	if (!error) return error;
	if (isAxiosError(error)) {
		// Axios errors are objects with a lot of properties
		return {
			status: error.response?.status,
			body: error.response?.data,
			message: error.message,
		};
	}
	if (error instanceof Error) {
		// This avoids infinite recursion for errors with circular references
		const newCause =
			depth < maxDepth
				? slimError(error.cause, maxDepth, depth + 1)
				: "...truncated...";
		return {
			message: error.message,
			cause: newCause,
		};
	}
	return error;
}
