import { ConfigurationError } from "../errors";
import { DAY_MS, MINUTE_MS, SECOND_MS } from "./constants";

/**
 * Wall-clock helpers for schedules expressed in a trading timezone.
 * Instants are UTC epoch milliseconds; wall-clock values are resolved through
 * Intl so that DST transitions follow the IANA database.
 */

export interface ClockTime {
	hour: number;
	minute: number;
}

export interface ZonedParts {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	/** Local calendar day as YYYY-MM-DD */
	dayKey: string;
	/** Seconds elapsed since local midnight */
	secondOfDay: number;
}

const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
	const cached = formatterCache.get(timeZone);
	if (cached) {
		return cached;
	}
	const formatter = new Intl.DateTimeFormat("en-US", {
		timeZone,
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
		hourCycle: "h23",
	});
	formatterCache.set(timeZone, formatter);
	return formatter;
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Parse a "HH:MM" wall-clock label.
 * @throws ConfigurationError when the label is malformed
 */
export const parseClockTime = (label: string): ClockTime => {
	const match = typeof label === "string" ? label.trim().match(CLOCK_PATTERN) : null;
	if (!match) {
		throw new ConfigurationError(
			`Invalid clock time "${String(label)}". Expected format like "08:00" or "21:45"`,
			{ label }
		);
	}
	return { hour: Number(match[1]), minute: Number(match[2]) };
};

export const formatClockTime = (clock: ClockTime): string =>
	`${pad2(clock.hour)}:${pad2(clock.minute)}`;

export const clockSecondOfDay = (clock: ClockTime): number =>
	clock.hour * 3600 + clock.minute * 60;

export const assertTimeZone = (timeZone: string): string => {
	try {
		getFormatter(timeZone);
	} catch (error) {
		throw new ConfigurationError(`Unknown timezone "${timeZone}"`, {
			timeZone,
			cause: error instanceof Error ? error.message : String(error),
		});
	}
	return timeZone;
};

export const zonedParts = (tsMs: number, timeZone: string): ZonedParts => {
	const parts = getFormatter(timeZone).formatToParts(new Date(tsMs));
	const read = (type: Intl.DateTimeFormatPartTypes): number => {
		const raw = parts.find((part) => part.type === type)?.value;
		const value = Number(raw);
		return Number.isFinite(value) ? value : 0;
	};
	const year = read("year");
	const month = read("month");
	const day = read("day");
	const hour = read("hour") % 24;
	const minute = read("minute");
	const second = read("second");
	return {
		year,
		month,
		day,
		hour,
		minute,
		second,
		dayKey: `${year}-${pad2(month)}-${pad2(day)}`,
		secondOfDay: hour * 3600 + minute * 60 + second,
	};
};

const parseDayKey = (dayKey: string): { y: number; m: number; d: number } => {
	const match = dayKey.match(DAY_KEY_PATTERN);
	if (!match) {
		throw new Error(`Invalid day key: ${dayKey}`);
	}
	return { y: Number(match[1]), m: Number(match[2]), d: Number(match[3]) };
};

export const nextDayKey = (dayKey: string): string => {
	const { y, m, d } = parseDayKey(dayKey);
	const next = new Date(Date.UTC(y, m - 1, d) + DAY_MS);
	return `${next.getUTCFullYear()}-${pad2(next.getUTCMonth() + 1)}-${pad2(
		next.getUTCDate()
	)}`;
};

/**
 * Resolve a local calendar day and wall-clock time in `timeZone` to a UTC
 * instant by correcting the guess with the zone offset observed at it.
 */
export const zonedTimeToUtc = (
	dayKey: string,
	clock: ClockTime,
	timeZone: string
): number => {
	const { y, m, d } = parseDayKey(dayKey);
	const target = Date.UTC(y, m - 1, d, clock.hour, clock.minute, 0, 0);
	let guess = target;
	for (let i = 0; i < 4; i += 1) {
		const local = zonedParts(guess, timeZone);
		const localAsUtc = Date.UTC(
			local.year,
			local.month - 1,
			local.day,
			local.hour,
			local.minute,
			local.second,
			0
		);
		const delta = target - localAsUtc;
		if (delta === 0) {
			break;
		}
		guess += delta;
	}
	return guess;
};

export const secondsToMs = (seconds: number): number => seconds * SECOND_MS;

/**
 * Milliseconds until the next round minute, used to align the first tick.
 */
export const msUntilNextMinute = (nowMs: number): number => {
	const remainder = nowMs % MINUTE_MS;
	return remainder === 0 ? 0 : MINUTE_MS - remainder;
};
