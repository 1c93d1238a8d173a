import {
	type ClockTime,
	type ScheduleConfig,
	clockSecondOfDay,
	formatClockTime,
	nextDayKey,
	validateScheduleConfig,
	zonedParts,
	zonedTimeToUtc,
} from "@tickloop/core";

export type GateBlockReason =
	| "pause_window"
	| "before_trade_start"
	| "new_order_cutoff";

export interface GateDecision {
	/** New brackets may be submitted. */
	tradingAllowed: boolean;
	mustForceClose: boolean;
	mustShutdown: boolean;
	blockReason: GateBlockReason | null;
	/** HH:MM:SS in the trading timezone. */
	localTime: string;
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

const atOrAfter = (secondOfDay: number, clock: ClockTime | null): boolean =>
	clock !== null && secondOfDay >= clockSecondOfDay(clock);

/**
 * Evaluates the schedule of one instance against the current instant.
 *
 * Checks run in a fixed order: force-close, pause window, trading start,
 * new-order cutoff, shutdown. Force-close fires at most once per local day and
 * is re-armed for the same wall-clock time on the following day.
 */
export class TradingWindowGate {
	private readonly schedule: ScheduleConfig;
	private forceCloseArmedAt: number | null = null;

	constructor(schedule: ScheduleConfig) {
		this.schedule = validateScheduleConfig(schedule);
	}

	get timezone(): string {
		return this.schedule.tradeTimezone;
	}

	/** UTC instant of the armed force-close, once the first evaluation has run. */
	get nextForceCloseAt(): number | null {
		return this.forceCloseArmedAt;
	}

	evaluate(nowMs: number): GateDecision {
		const { tradeTimezone, forceClose, pauseWindow, tradeStart, newOrderCutoff, shutdownAt } =
			this.schedule;
		const local = zonedParts(nowMs, tradeTimezone);
		const decision: GateDecision = {
			tradingAllowed: true,
			mustForceClose: false,
			mustShutdown: false,
			blockReason: null,
			localTime: `${pad2(local.hour)}:${pad2(local.minute)}:${pad2(local.second)}`,
		};

		if (forceClose) {
			if (this.forceCloseArmedAt === null) {
				this.forceCloseArmedAt = zonedTimeToUtc(local.dayKey, forceClose, tradeTimezone);
			}
			if (this.forceCloseArmedAt <= nowMs) {
				decision.mustForceClose = true;
				this.forceCloseArmedAt = zonedTimeToUtc(
					nextDayKey(local.dayKey),
					forceClose,
					tradeTimezone
				);
			}
		}

		const second = local.secondOfDay;
		if (
			pauseWindow &&
			atOrAfter(second, pauseWindow.start) &&
			!atOrAfter(second, pauseWindow.end)
		) {
			decision.tradingAllowed = false;
			decision.blockReason = "pause_window";
		} else if (tradeStart && !atOrAfter(second, tradeStart)) {
			decision.tradingAllowed = false;
			decision.blockReason = "before_trade_start";
		} else if (atOrAfter(second, newOrderCutoff)) {
			decision.tradingAllowed = false;
			decision.blockReason = "new_order_cutoff";
		}

		if (atOrAfter(second, shutdownAt)) {
			decision.mustShutdown = true;
		}
		return decision;
	}

	describe(): Record<string, string | null> {
		const { tradeTimezone, forceClose, pauseWindow, tradeStart, newOrderCutoff, shutdownAt } =
			this.schedule;
		const label = (clock: ClockTime | null): string | null =>
			clock ? formatClockTime(clock) : null;
		return {
			tradeTimezone,
			pauseWindow: pauseWindow
				? `${formatClockTime(pauseWindow.start)}-${formatClockTime(pauseWindow.end)}`
				: null,
			tradeStart: label(tradeStart),
			newOrderCutoff: label(newOrderCutoff),
			shutdownAt: label(shutdownAt),
			forceClose: label(forceClose),
		};
	}
}
