import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { refreshLoggerSettings } from "./utils/logger";

export type ExecutionMode = "paper" | "live";

export interface EnvConfig {
	executionMode: ExecutionMode;
	exchangeId: string;
	apiKey: string;
	apiSecret: string;
	sandbox: boolean;
	/** Instance ids whose routine log lines surface on the console. */
	consoleInstances: string[];
	/** Force-close applied to instances whose profile does not set one. */
	defaultForceClose: string;
	configDir?: string;
}

export const DEFAULT_FORCE_CLOSE = "21:45";

const loaded = new Set<string>();

export function loadEnvFiles(projectRoot: string): string[] {
	const candidates = filterUnique(
		[process.env.TICKLOOP_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => typeof value === "string" && value.length > 0
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	if (applied.length) {
		refreshLoggerSettings();
	}
	return applied;
}

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const parseList = (value?: string): string[] => {
	if (!value) {
		return [];
	}
	return value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
};

const normalizeExecutionMode = (value: string | undefined): ExecutionMode =>
	value?.toLowerCase() === "live" ? "live" : "paper";

export const loadEnvConfig = (projectRoot?: string): EnvConfig => {
	if (projectRoot) {
		loadEnvFiles(projectRoot);
	}
	return {
		executionMode: normalizeExecutionMode(readOptionalEnvVar("EXECUTION_MODE")),
		exchangeId: readOptionalEnvVar("EXCHANGE_ID") ?? "binance",
		apiKey: readOptionalEnvVar("EXCHANGE_API_KEY") ?? "",
		apiSecret: readOptionalEnvVar("EXCHANGE_API_SECRET") ?? "",
		sandbox: readOptionalEnvVar("EXCHANGE_SANDBOX") === "true",
		consoleInstances: parseList(readOptionalEnvVar("LOG_CONSOLE_INSTANCES")),
		defaultForceClose:
			readOptionalEnvVar("DEFAULT_FORCE_CLOSE") ?? DEFAULT_FORCE_CLOSE,
		configDir: readOptionalEnvVar("TICKLOOP_CONFIG_DIR"),
	};
};

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
