import dotenv from "dotenv";

export type SyncConfig = {
	url: string;
	intervalSeconds: number | null;
	timeoutMs: number | null;
};

export type Config = {
	start: {
		date: string;
		time: string;
		timeZone: string;
	};
	multiplier: number;
	sync: SyncConfig | null;
};

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
	}
}

function fromProcessEnv(name: string): string {
	const value = process.env[name];
	if (!value) {
		throw new ConfigError(`Environment variable ${name} is not set`);
	}
	return value;
}

function optionalFromProcessEnv(name: string): string | null {
	return process.env[name] || null;
}

function numberFrom(name: string, value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed)) {
		throw new ConfigError(
			`Environment variable ${name} must be a number, got "${value}"`,
		);
	}
	return parsed;
}

function optionalNumberFromProcessEnv(name: string): number | null {
	const value = optionalFromProcessEnv(name);
	return value === null ? null : numberFrom(name, value);
}

export function configFromProcessEnv(): Config {
	const syncUrl = optionalFromProcessEnv("SIM_SYNC_URL");
	const config = {
		start: {
			date: fromProcessEnv("SIM_START_DATE"),
			time: fromProcessEnv("SIM_START_TIME"),
			timeZone: fromProcessEnv("SIM_TIME_ZONE"),
		},
		multiplier: numberFrom(
			"SIM_MULTIPLIER",
			fromProcessEnv("SIM_MULTIPLIER"),
		),
		sync: syncUrl
			? {
					url: syncUrl,
					intervalSeconds: optionalNumberFromProcessEnv(
						"SIM_SYNC_INTERVAL_SECONDS",
					),
					timeoutMs: optionalNumberFromProcessEnv("SIM_SYNC_TIMEOUT_MS"),
				}
			: null,
	};
	return config;
}

/**
 * Reads the `.env` file at `path` into the environment, then builds the
 * config from it. Variables already set in the environment win.
 */
export function loadConfig(path: string = ".env"): Config {
	dotenv.config({ path });
	return configFromProcessEnv();
}
