import type { EmaValues, StrategySignal } from "../../types";
import type { Cci14ReversalParams } from "./config";

export const isLongReversal = (
	values: readonly number[],
	level: number
): boolean => {
	if (values.length < 3) {
		return false;
	}
	const [a, b, c] = values.slice(-3);
	return a < -level && b > -level && c > b;
};

export const isShortReversal = (
	values: readonly number[],
	level: number
): boolean => {
	if (values.length < 3) {
		return false;
	}
	const [a, b, c] = values.slice(-3);
	return a >= level && b < level && c < b;
};

export type ReversalOutcome =
	| { kind: "signal"; signal: StrategySignal }
	| { kind: "filtered"; side: "LONG" | "SHORT" }
	| { kind: "none" };

export const evaluateReversal = (
	values: readonly number[],
	emas: EmaValues,
	params: Cci14ReversalParams
): ReversalOutcome => {
	const trendUp = emas.fast !== null && emas.slow !== null && emas.fast > emas.slow;
	const trendDown =
		emas.fast !== null && emas.slow !== null && emas.fast < emas.slow;

	if (isLongReversal(values, params.level)) {
		if (params.requireEmaTrend && !trendUp) {
			return { kind: "filtered", side: "LONG" };
		}
		return {
			kind: "signal",
			signal: { action: "BUY", reason: `cci_reversal_from_-${params.level}` },
		};
	}
	if (isShortReversal(values, params.level)) {
		if (params.requireEmaTrend && !trendDown) {
			return { kind: "filtered", side: "SHORT" };
		}
		return {
			kind: "signal",
			signal: { action: "SELL", reason: `cci_reversal_from_${params.level}` },
		};
	}
	return { kind: "none" };
};
