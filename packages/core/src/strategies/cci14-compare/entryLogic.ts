import type { StrategySignal } from "../../types";
import type { PolicyContext } from "../types";
import type { Cci14CompareParams } from "./config";

/**
 * Signals on a CCI crossing of `crossLevel` between the last two readings,
 * confirmed by price against the fast EMA.
 */
export const selectCrossSignal = (
	ctx: PolicyContext,
	params: Cci14CompareParams
): StrategySignal | null => {
	if (!ctx.cci || ctx.cci.status !== "ok" || ctx.cciHistory.length < 2) {
		return null;
	}
	const fast = ctx.emas.fast;
	if (fast === null) {
		return null;
	}
	const previous = ctx.cciHistory[ctx.cciHistory.length - 2];
	const current = ctx.cciHistory[ctx.cciHistory.length - 1];
	const level = params.crossLevel;
	if (previous < level && current > level && ctx.price > fast) {
		return { action: "BUY", reason: "cci_cross_up_above_fast_ema" };
	}
	if (previous > level && current < level && ctx.price < fast) {
		return { action: "SELL", reason: "cci_cross_down_below_fast_ema" };
	}
	return null;
};
