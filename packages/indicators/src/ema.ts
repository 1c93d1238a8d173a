/** Smoothing factor for an EMA of the given span. */
export const emaAlpha = (span: number): number => 2 / (span + 1);

/**
 * One incremental EMA step. Spans must be positive.
 */
export function emaStep(previous: number, value: number, span: number): number {
	const alpha = emaAlpha(span);
	return value * alpha + previous * (1 - alpha);
}

/**
 * EMA of every prefix of `values`. The first value seeds the series unless
 * `seed` is given, in which case the first value is smoothed against it.
 */
export function emaSeries(
	values: readonly number[],
	span: number,
	seed: number | null = null
): number[] {
	if (span <= 0) {
		return [];
	}
	const series: number[] = [];
	let emaValue = seed;
	for (const value of values) {
		emaValue = emaValue === null ? value : emaStep(emaValue, value, span);
		series.push(emaValue);
	}
	return series;
}

export function ema(
	values: readonly number[],
	span: number,
	seed: number | null = null
): number | null {
	const series = emaSeries(values, span, seed);
	return series.length ? series[series.length - 1] : null;
}
