export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	const normalized = value?.trim().toLowerCase();
	return normalized && isLogLevel(normalized) ? normalized : "info";
};

const parseList = (raw: string | undefined): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

interface LoggerSettings {
	minLevel: LogLevel;
	pretty: boolean;
	json: boolean;
	moduleFilter: Set<string> | null;
}

const readSettings = (): LoggerSettings => {
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
		moduleFilter: parseList(process.env.LOG_MODULE),
	};
};

let settings = readSettings();

/**
 * Re-read LOG_* variables. Called after .env files are loaded so that values
 * from them take effect.
 */
export const refreshLoggerSettings = (): void => {
	settings = readSettings();
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ...payload, ts };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data?: Record<string, unknown>
	): void => log({ ...(data ?? {}), level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
	};
};

const sanitize = (payload: BaseLogPayload): unknown =>
	sanitizeValue(payload, new WeakSet<object>());

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const fmtNumber = (value: unknown, digits = 2): string =>
	typeof value === "number" && Number.isFinite(value)
		? value.toFixed(digits)
		: "-";

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	switch (event) {
		case "phase_transition":
			printPhaseTransition(rest);
			break;
		case "tick_record":
			printTickRecord(rest);
			break;
		case "indicator_snapshot":
			printIndicatorSnapshot(rest);
			break;
		case "gate_action":
			console.log(
				`  ${fmtValue(rest.instanceId)} ${fmtValue(rest.action)} @ ${fmtValue(
					rest.localTime
				)}`
			);
			break;
		default:
			break;
	}
}

const printPhaseTransition = (rest: Record<string, unknown>): void => {
	const durationMs = typeof rest.durationMs === "number" ? rest.durationMs : null;
	console.log(
		`  ${fmtValue(rest.instanceId)} ${fmtValue(rest.from)} -> ${fmtValue(
			rest.to
		)} (${fmtValue(rest.reason)}) after ${
			durationMs === null ? "-" : `${(durationMs / 1000).toFixed(1)}s`
		}`
	);
};

const printTickRecord = (rest: Record<string, unknown>): void => {
	const annotations =
		rest.annotations && typeof rest.annotations === "object"
			? Object.entries(rest.annotations)
					.map(([key, value]) => `${key}=${fmtNumber(value, 4)}`)
					.join(" ")
			: "";
	console.log(
		[
			`  ${fmtValue(rest.instanceId)}`,
			`price=${fmtNumber(rest.price)}`,
			`cci=${fmtNumber(rest.cci)}`,
			`trend=${fmtValue(rest.cciTrend)}`,
			`phase=${fmtValue(rest.phase)}`,
			annotations,
		]
			.filter((part) => part.length > 0)
			.join(" | ")
	);
};

const printIndicatorSnapshot = (rest: Record<string, unknown>): void => {
	const multi =
		rest.multi && typeof rest.multi === "object" ? Object.entries(rest.multi) : [];
	if (!multi.length) {
		return;
	}
	console.table(
		multi.map(([span, value]) => ({ span: Number(span), ema: value }))
	);
};
