import type { CciMode, CciUnavailableReason, PriceSample } from "@tickloop/core";
import { mean } from "./sma";

export const CCI_PERIOD = 14;
export const CCI_CONSTANT = 0.015;

export type CciComputation =
	| { ok: true; value: number; mean: number; dispersion: number }
	| { ok: false; reason: CciUnavailableReason };

/** (high + low + close) / 3 when all three are present, else the sample price. */
export const typicalPrice = (sample: PriceSample): number =>
	sample.high !== undefined && sample.low !== undefined && sample.close !== undefined
		? (sample.high + sample.low + sample.close) / 3
		: sample.price;

export function sampleStdev(values: readonly number[]): number {
	if (values.length < 2) {
		return 0;
	}
	const avg = mean(values);
	const squares = values.reduce((acc, value) => acc + (value - avg) ** 2, 0);
	return Math.sqrt(squares / (values.length - 1));
}

export function meanAbsoluteDeviation(values: readonly number[]): number {
	if (!values.length) {
		return 0;
	}
	const avg = mean(values);
	return values.reduce((acc, value) => acc + Math.abs(value - avg), 0) / values.length;
}

/**
 * CCI of the last `period` typical prices. `stdev` mode divides by the sample
 * standard deviation, `classic` by the mean absolute deviation.
 */
export function computeCci(
	typicalPrices: readonly number[],
	mode: CciMode,
	period = CCI_PERIOD
): CciComputation {
	if (typicalPrices.length < period) {
		return { ok: false, reason: "insufficient_history" };
	}
	const window = typicalPrices.slice(typicalPrices.length - period);
	const avg = mean(window);
	const dispersion =
		mode === "stdev" ? sampleStdev(window) : meanAbsoluteDeviation(window);
	if (dispersion === 0) {
		return { ok: false, reason: "zero_dispersion" };
	}
	const latest = window[window.length - 1];
	return {
		ok: true,
		value: (latest - avg) / (CCI_CONSTANT * dispersion),
		mean: avg,
		dispersion,
	};
}

export const cciStdev = (
	typicalPrices: readonly number[],
	period = CCI_PERIOD
): number | null => {
	const result = computeCci(typicalPrices, "stdev", period);
	return result.ok ? result.value : null;
};

export const cciClassic = (
	typicalPrices: readonly number[],
	period = CCI_PERIOD
): number | null => {
	const result = computeCci(typicalPrices, "classic", period);
	return result.ok ? result.value : null;
};
