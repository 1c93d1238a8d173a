import fs from "node:fs";
import path from "node:path";

import { ConfigurationError, errorMessage } from "./errors";
import { parseScheduleConfig, type ScheduleConfig, type ScheduleConfigInput } from "./schedule";
import type { StrategyRegistryEntry } from "./strategies/definition";
import { getStrategyDefinition } from "./strategies/registry";
import type { StrategyId } from "./strategies/ids";
import type { BracketConfig, ContractSpec } from "./types";

/**
 * Fully resolved configuration of one strategy instance: the profile file
 * merged over the strategy's registered defaults.
 */
export interface StrategyInstanceConfig {
	id: StrategyId;
	instanceId: string;
	contract: ContractSpec;
	checkIntervalSeconds: number;
	/** Seeds every EMA when set; otherwise the first sample seeds them. */
	initialEma: number | null;
	classicCci: boolean;
	computeCci: boolean;
	emaFastSpan: number;
	emaSlowSpan: number;
	emaSingleSpan: number | null;
	/** Deduplicated, ascending. */
	emaSpans: number[];
	multiEmaDiagnostics: boolean;
	signalDelaySeconds: number;
	schedule: ScheduleConfig;
	bracket: BracketConfig;
	params: Record<string, unknown>;
	/** Emit an indicator snapshot every N ticks; 0 disables. */
	snapshotEveryTicks: number;
}

export type ConfigSourceType = "file" | "embedded";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

export interface StrategyConfigOptions {
	/** Force-close applied when the profile leaves `schedule.forceClose` unset. */
	defaultForceClose?: string | null;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, { ...configMetadata.get(config), ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

const WORKSPACE_SENTINELS = [path.join("configs", "strategies"), ".git"];

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (
		!WORKSPACE_SENTINELS.some((entry) => fs.existsSync(path.join(current, entry)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultStrategyDir = (): string =>
	path.join(findWorkspaceRoot(), "configs");

export const resolveStrategyConfigPath = (
	strategyDir: string,
	strategyProfile: string
): string => {
	const profileName = strategyProfile.endsWith(".json")
		? strategyProfile
		: `${strategyProfile}.json`;
	const candidates = [
		path.join(strategyDir, "strategies", profileName),
		path.join(strategyDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigurationError(
		`Strategy config not found. Looked for ${candidates.join(", ")}`,
		{ strategyProfile }
	);
};

export const listStrategyProfiles = (strategyDir: string): string[] => {
	const dir = path.join(strategyDir, "strategies");
	if (!fs.existsSync(dir)) {
		return [];
	}
	return fs
		.readdirSync(dir)
		.filter((file) => file.endsWith(".json"))
		.map((file) => file.slice(0, -".json".length))
		.sort();
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigurationError(
			`Strategy config at ${filePath} is not valid JSON: ${errorMessage(error)}`,
			{ path: filePath }
		);
	}
};

const fail = (field: string, expected: string, value: unknown): never => {
	throw new ConfigurationError(`${field} must be ${expected}`, { field, value });
};

const optionalNumber = (
	raw: Record<string, unknown>,
	key: string,
	fallback: number
): number => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	return typeof value === "number" && Number.isFinite(value)
		? value
		: fail(key, "a finite number", value);
};

const optionalBoolean = (
	raw: Record<string, unknown>,
	key: string,
	fallback: boolean
): boolean => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	return typeof value === "boolean" ? value : fail(key, "a boolean", value);
};

const optionalString = (
	raw: Record<string, unknown>,
	key: string
): string | undefined => {
	const value = raw[key];
	if (value === undefined) {
		return undefined;
	}
	return typeof value === "string" && value.trim().length
		? value.trim()
		: fail(key, "a non-empty string", value);
};

const requireSpan = (value: unknown, field: string): number =>
	typeof value === "number" && Number.isInteger(value) && value > 0
		? value
		: fail(field, "a positive integer", value);

const readContract = (raw: Record<string, unknown>): ContractSpec => {
	const contract = raw.contract;
	if (!isRecord(contract)) {
		return fail("contract", "an object with a symbol", contract);
	}
	const symbol = optionalString(contract, "symbol");
	if (!symbol) {
		return fail("contract.symbol", "a non-empty string", contract.symbol);
	}
	return {
		symbol,
		exchange: optionalString(contract, "exchange"),
		currency: optionalString(contract, "currency"),
		expiry: optionalString(contract, "expiry"),
	};
};

const readEmaSpans = (
	raw: Record<string, unknown>,
	fallback: number[]
): number[] => {
	const value = raw.emaSpans;
	if (value === undefined) {
		return [...new Set(fallback)].sort((a, b) => a - b);
	}
	if (!Array.isArray(value)) {
		return fail("emaSpans", "an array of positive integers", value);
	}
	const spans = value.map((span, index) => requireSpan(span, `emaSpans[${index}]`));
	return [...new Set(spans)].sort((a, b) => a - b);
};

const readClockField = (
	raw: Record<string, unknown>,
	key: string
): string | null | undefined => {
	const value = raw[key];
	if (value === undefined || value === null) {
		return value;
	}
	return typeof value === "string" ? value : fail(`schedule.${key}`, "an HH:MM string or null", value);
};

const readSchedule = (
	raw: Record<string, unknown>,
	defaults: ScheduleConfigInput,
	options: StrategyConfigOptions
): ScheduleConfig => {
	const value = raw.schedule ?? {};
	if (!isRecord(value)) {
		return fail("schedule", "an object", value);
	}
	const merged: ScheduleConfigInput = { ...defaults };
	const timezone = optionalString(value, "tradeTimezone");
	if (timezone) {
		merged.tradeTimezone = timezone;
	}
	for (const key of ["tradeStart", "newOrderCutoff", "shutdownAt", "forceClose"] as const) {
		const clock = readClockField(value, key);
		if (clock !== undefined) {
			merged[key] = clock;
		}
	}
	if (value.pauseWindow !== undefined) {
		const window = value.pauseWindow;
		if (window === null) {
			merged.pauseWindow = null;
		} else if (
			isRecord(window) &&
			typeof window.start === "string" &&
			typeof window.end === "string"
		) {
			merged.pauseWindow = { start: window.start, end: window.end };
		} else {
			return fail("schedule.pauseWindow", "{ start, end } HH:MM strings or null", window);
		}
	}
	if (merged.forceClose === undefined && options.defaultForceClose) {
		merged.forceClose = options.defaultForceClose;
	}
	return parseScheduleConfig(merged);
};

const readBracket = (
	raw: Record<string, unknown>,
	defaults: BracketConfig
): BracketConfig => {
	const value = raw.bracket ?? {};
	if (!isRecord(value)) {
		return fail("bracket", "an object", value);
	}
	const bracket: BracketConfig = {
		tickSize: optionalNumber(value, "tickSize", defaults.tickSize),
		slTicks: optionalNumber(value, "slTicks", defaults.slTicks),
		tpTicksLong: optionalNumber(value, "tpTicksLong", defaults.tpTicksLong),
		tpTicksShort: optionalNumber(value, "tpTicksShort", defaults.tpTicksShort),
		quantity: optionalNumber(value, "quantity", defaults.quantity),
	};
	for (const [key, amount] of Object.entries(bracket)) {
		if (amount <= 0) {
			fail(`bracket.${key}`, "positive", amount);
		}
	}
	return bracket;
};

/**
 * Validate a raw profile object against the strategy registry.
 * @throws ConfigurationError on the first invalid field
 */
export const buildStrategyInstanceConfig = (
	raw: unknown,
	options: StrategyConfigOptions = {}
): StrategyInstanceConfig => {
	if (!isRecord(raw)) {
		return fail("strategy config", "a JSON object", raw);
	}
	const id = optionalString(raw, "id");
	if (!id) {
		return fail("id", "a registered strategy id", raw.id);
	}
	const definition: StrategyRegistryEntry = getStrategyDefinition(id);
	const capabilities = definition.capabilities;

	const checkIntervalSeconds = optionalNumber(
		raw,
		"checkIntervalSeconds",
		definition.checkIntervalSeconds
	);
	if (checkIntervalSeconds <= 0) {
		fail("checkIntervalSeconds", "greater than zero", checkIntervalSeconds);
	}
	const signalDelaySeconds = optionalNumber(
		raw,
		"signalDelaySeconds",
		capabilities.signalDelaySeconds
	);
	if (signalDelaySeconds < 0) {
		fail("signalDelaySeconds", "zero or more", signalDelaySeconds);
	}
	const initialEmaRaw = raw.initialEma;
	const initialEma =
		initialEmaRaw === undefined || initialEmaRaw === null
			? null
			: typeof initialEmaRaw === "number" && Number.isFinite(initialEmaRaw) && initialEmaRaw > 0
				? initialEmaRaw
				: fail("initialEma", "a positive number or null", initialEmaRaw);
	const singleRaw = raw.emaSingleSpan;
	const emaSingleSpan =
		singleRaw === undefined
			? capabilities.emaSingleSpan
			: singleRaw === null
				? null
				: requireSpan(singleRaw, "emaSingleSpan");
	const emaFastSpan =
		raw.emaFastSpan === undefined
			? capabilities.emaFastSpan
			: requireSpan(raw.emaFastSpan, "emaFastSpan");
	const emaSlowSpan =
		raw.emaSlowSpan === undefined
			? capabilities.emaSlowSpan
			: requireSpan(raw.emaSlowSpan, "emaSlowSpan");
	const snapshotEveryTicks = optionalNumber(raw, "snapshotEveryTicks", 0);
	if (!Number.isInteger(snapshotEveryTicks) || snapshotEveryTicks < 0) {
		fail("snapshotEveryTicks", "a non-negative integer", snapshotEveryTicks);
	}
	const paramsRaw = raw.params ?? {};
	if (!isRecord(paramsRaw)) {
		return fail("params", "an object", paramsRaw);
	}
	definition.validateParams(paramsRaw);

	const contract = readContract(raw);
	return {
		id: definition.id,
		instanceId: optionalString(raw, "instanceId") ?? `${definition.id}:${contract.symbol}`,
		contract,
		checkIntervalSeconds,
		initialEma,
		classicCci: optionalBoolean(raw, "classicCci", false),
		computeCci: optionalBoolean(raw, "computeCci", capabilities.computeCci),
		emaFastSpan,
		emaSlowSpan,
		emaSingleSpan,
		emaSpans: readEmaSpans(raw, capabilities.emaSpans),
		multiEmaDiagnostics: optionalBoolean(
			raw,
			"multiEmaDiagnostics",
			capabilities.multiEmaDiagnostics
		),
		signalDelaySeconds,
		schedule: readSchedule(raw, definition.schedule, options),
		bracket: readBracket(raw, definition.bracket),
		params: paramsRaw,
		snapshotEveryTicks,
	};
};

export const loadStrategyConfig = (
	strategyDir: string,
	strategyProfile: string,
	options: StrategyConfigOptions = {}
): StrategyInstanceConfig => {
	const strategyPath = resolveStrategyConfigPath(strategyDir, strategyProfile);
	let config: StrategyInstanceConfig;
	try {
		config = buildStrategyInstanceConfig(readJsonFile(strategyPath), options);
	} catch (error) {
		if (error instanceof ConfigurationError) {
			throw new ConfigurationError(`${strategyPath}: ${error.message}`, {
				...error.details,
				path: strategyPath,
			});
		}
		throw error;
	}
	return withConfigMetadata(config, {
		source: "file",
		path: strategyPath,
		profile: strategyProfile,
	});
};

/**
 * Load several profiles at once; instance ids must be unique across them.
 */
export const loadStrategyConfigs = (
	strategyDir: string,
	profiles: readonly string[],
	options: StrategyConfigOptions = {}
): StrategyInstanceConfig[] => {
	const configs = profiles.map((profile) =>
		loadStrategyConfig(strategyDir, profile, options)
	);
	const seen = new Set<string>();
	for (const config of configs) {
		if (seen.has(config.instanceId)) {
			throw new ConfigurationError(
				`Duplicate instanceId "${config.instanceId}" across strategy profiles`,
				{ instanceId: config.instanceId }
			);
		}
		seen.add(config.instanceId);
	}
	return configs;
};
