import { ConfigurationError } from "./errors";
import {
	type ClockTime,
	assertTimeZone,
	clockSecondOfDay,
	formatClockTime,
	parseClockTime,
} from "./time";

export interface PauseWindow {
	start: ClockTime;
	end: ClockTime;
}

/**
 * When an instance may open brackets and when it must flatten. All clock
 * values are wall-clock times in `tradeTimezone`.
 */
export interface ScheduleConfig {
	tradeTimezone: string;
	pauseWindow: PauseWindow | null;
	tradeStart: ClockTime | null;
	newOrderCutoff: ClockTime | null;
	shutdownAt: ClockTime | null;
	forceClose: ClockTime | null;
}

/** Schedule as written in a strategy profile. */
export interface ScheduleConfigInput {
	tradeTimezone?: string;
	pauseWindow?: { start: string; end: string } | null;
	tradeStart?: string | null;
	newOrderCutoff?: string | null;
	shutdownAt?: string | null;
	forceClose?: string | null;
}

export const DEFAULT_TRADE_TIMEZONE = "Asia/Jerusalem";

const optionalClock = (
	value: string | null | undefined,
	field: string
): ClockTime | null => {
	if (value === undefined || value === null) {
		return null;
	}
	try {
		return parseClockTime(value);
	} catch (error) {
		throw new ConfigurationError(
			`schedule.${field}: ${error instanceof Error ? error.message : String(error)}`,
			{ field, value }
		);
	}
};

export const validatePauseWindow = (window: PauseWindow): PauseWindow => {
	if (clockSecondOfDay(window.start) >= clockSecondOfDay(window.end)) {
		throw new ConfigurationError(
			`schedule.pauseWindow must start before it ends (got ${formatClockTime(
				window.start
			)}-${formatClockTime(window.end)})`,
			{
				start: formatClockTime(window.start),
				end: formatClockTime(window.end),
			}
		);
	}
	return window;
};

export const validateScheduleConfig = (
	schedule: ScheduleConfig
): ScheduleConfig => {
	assertTimeZone(schedule.tradeTimezone);
	if (schedule.pauseWindow) {
		validatePauseWindow(schedule.pauseWindow);
	}
	return schedule;
};

export const parseScheduleConfig = (
	input: ScheduleConfigInput = {}
): ScheduleConfig => {
	const pauseWindow = input.pauseWindow
		? {
				start: optionalClock(input.pauseWindow.start, "pauseWindow.start"),
				end: optionalClock(input.pauseWindow.end, "pauseWindow.end"),
			}
		: null;
	if (pauseWindow && (!pauseWindow.start || !pauseWindow.end)) {
		throw new ConfigurationError(
			"schedule.pauseWindow needs both start and end"
		);
	}
	return validateScheduleConfig({
		tradeTimezone: input.tradeTimezone ?? DEFAULT_TRADE_TIMEZONE,
		pauseWindow:
			pauseWindow && pauseWindow.start && pauseWindow.end
				? { start: pauseWindow.start, end: pauseWindow.end }
				: null,
		tradeStart: optionalClock(input.tradeStart, "tradeStart"),
		newOrderCutoff: optionalClock(input.newOrderCutoff, "newOrderCutoff"),
		shutdownAt: optionalClock(input.shutdownAt, "shutdownAt"),
		forceClose: optionalClock(input.forceClose, "forceClose"),
	});
};
