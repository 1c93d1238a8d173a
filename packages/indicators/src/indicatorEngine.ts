import {
	InvalidSampleError,
	type CciMode,
	type CciReading,
	type CciTrend,
	type EmaValues,
	type PriceSample,
} from "@tickloop/core";
import { CCI_PERIOD, computeCci } from "./cci";
import { emaStep } from "./ema";
import { PriceHistory } from "./priceHistory";

export const CCI_HISTORY_LIMIT = 100;
export const EMA_DIAGNOSTIC_WINDOW = 10;

export interface IndicatorEngineOptions {
	emaFastSpan: number;
	emaSlowSpan: number;
	emaSingleSpan?: number | null;
	emaSpans?: readonly number[];
	initialEma?: number | null;
	cciMode?: CciMode;
	multiEmaDiagnostics?: boolean;
}

export interface EmaDiagnostic {
	span: number;
	value: number | null;
	/** Last minus first value of the diagnostic window; null below two values. */
	slope: number | null;
	history: number[];
}

export interface IndicatorSnapshot {
	samples: number;
	lastPrice: number | null;
	emas: EmaValues;
	cci: CciReading;
	diagnostics: EmaDiagnostic[];
}

const trendOf = (value: number, previous: number | null): CciTrend | null => {
	if (previous === null) {
		return null;
	}
	if (value > previous) {
		return "rising";
	}
	return value < previous ? "falling" : "flat";
};

const isPositiveFinite = (value: number): boolean =>
	Number.isFinite(value) && value > 0;

/**
 * Incremental EMA and CCI state for one instrument. Only `update` and `reset`
 * mutate it; reads never touch the clock.
 */
export class IndicatorEngine {
	readonly cciMode: CciMode;
	private readonly history: PriceHistory;
	private readonly spans: number[];
	private readonly emaBySpan = new Map<number, number>();
	private readonly diagnosticHistory = new Map<number, number[]>();
	private readonly recentCci: number[] = [];
	private lastNumericCci: number | null = null;
	private previousCci: number | null = null;
	private current: CciReading;

	constructor(private readonly options: IndicatorEngineOptions) {
		this.cciMode = options.cciMode ?? "stdev";
		const configured = [
			options.emaFastSpan,
			options.emaSlowSpan,
			...(options.emaSingleSpan ? [options.emaSingleSpan] : []),
			...(options.emaSpans ?? []),
		];
		for (const span of configured) {
			if (!Number.isInteger(span) || span <= 0) {
				throw new RangeError(`EMA span must be a positive integer, got ${span}`);
			}
		}
		this.spans = [...new Set(configured)].sort((a, b) => a - b);
		this.history = new PriceHistory(Math.max(CCI_PERIOD, ...this.spans));
		this.current = this.unavailable(this.cciMode, "insufficient_history");
	}

	get sampleCount(): number {
		return this.history.length;
	}

	get historyCapacity(): number {
		return this.history.capacity;
	}

	/**
	 * Accept one sample.
	 * @throws InvalidSampleError when a price field is not a positive finite number; state is left untouched
	 */
	update(sample: PriceSample): void {
		this.validate(sample);
		this.history.push(sample);

		for (const span of this.spans) {
			const previous = this.emaBySpan.get(span);
			const seed = previous ?? this.options.initialEma ?? null;
			const next = seed === null ? sample.price : emaStep(seed, sample.price, span);
			this.emaBySpan.set(span, next);
			if (this.options.multiEmaDiagnostics && this.isMultiSpan(span)) {
				const window = this.diagnosticHistory.get(span) ?? [];
				window.push(next);
				if (window.length > EMA_DIAGNOSTIC_WINDOW) {
					window.shift();
				}
				this.diagnosticHistory.set(span, window);
			}
		}

		this.previousCci = this.lastNumericCci;
		this.current = this.compute(this.cciMode);
		if (this.current.status === "ok") {
			this.lastNumericCci = this.current.value;
			this.recentCci.push(this.current.value);
			if (this.recentCci.length > CCI_HISTORY_LIMIT) {
				this.recentCci.shift();
			}
		}
	}

	emas(): EmaValues {
		const multi: Record<number, number | null> = {};
		for (const span of this.options.emaSpans ?? []) {
			multi[span] = this.emaValue(span);
		}
		return {
			single: this.options.emaSingleSpan ? this.emaValue(this.options.emaSingleSpan) : null,
			fast: this.emaValue(this.options.emaFastSpan),
			slow: this.emaValue(this.options.emaSlowSpan),
			multi,
		};
	}

	emaValue(span: number): number | null {
		return this.emaBySpan.get(span) ?? null;
	}

	/**
	 * Latest CCI reading. Asking for the mode the engine was not built with
	 * computes that formula over the same window without storing it.
	 */
	cci(mode: CciMode = this.cciMode): CciReading {
		return mode === this.cciMode ? this.current : this.compute(mode);
	}

	/** Numeric CCI values, oldest first, at most 100. */
	cciHistory(): readonly number[] {
		return this.recentCci;
	}

	multiEmaDiagnostics(): EmaDiagnostic[] {
		if (!this.options.multiEmaDiagnostics) {
			return [];
		}
		return [...new Set(this.options.emaSpans ?? [])]
			.sort((a, b) => a - b)
			.map((span) => {
				const history = [...(this.diagnosticHistory.get(span) ?? [])];
				return {
					span,
					value: this.emaValue(span),
					slope:
						history.length >= 2 ? history[history.length - 1] - history[0] : null,
					history,
				};
			});
	}

	snapshot(): IndicatorSnapshot {
		return {
			samples: this.history.length,
			lastPrice: this.history.last()?.price ?? null,
			emas: this.emas(),
			cci: this.current,
			diagnostics: this.multiEmaDiagnostics(),
		};
	}

	reset(): void {
		this.history.clear();
		this.emaBySpan.clear();
		this.diagnosticHistory.clear();
		this.recentCci.length = 0;
		this.lastNumericCci = null;
		this.previousCci = null;
		this.current = this.unavailable(this.cciMode, "insufficient_history");
	}

	private compute(mode: CciMode): CciReading {
		// Only the configured mode keeps a history to compare against.
		const previous = mode === this.cciMode ? this.previousCci : null;
		const result = computeCci(this.history.typicalPrices(), mode);
		if (!result.ok) {
			return { status: "unavailable", mode, reason: result.reason, previous };
		}
		return {
			status: "ok",
			mode,
			value: result.value,
			previous,
			mean: result.mean,
			dispersion: result.dispersion,
			trend: trendOf(result.value, previous),
		};
	}

	private unavailable(
		mode: CciMode,
		reason: "insufficient_history" | "zero_dispersion"
	): CciReading {
		return { status: "unavailable", mode, reason, previous: this.previousCci };
	}

	private isMultiSpan(span: number): boolean {
		return (this.options.emaSpans ?? []).includes(span);
	}

	private validate(sample: PriceSample): void {
		const fields: Array<[string, number | undefined]> = [
			["price", sample.price],
			["high", sample.high],
			["low", sample.low],
			["close", sample.close],
		];
		for (const [field, value] of fields) {
			if (field !== "price" && value === undefined) {
				continue;
			}
			if (typeof value !== "number" || !isPositiveFinite(value)) {
				throw new InvalidSampleError(
					`Rejected sample: ${field} must be a positive finite number`,
					{ field, value, timestamp: sample.timestamp }
				);
			}
		}
	}
}
