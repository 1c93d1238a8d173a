export function mean(values: readonly number[]): number {
	return values.reduce((acc, value) => acc + value, 0) / values.length;
}

export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	return mean(values.slice(values.length - period));
}
