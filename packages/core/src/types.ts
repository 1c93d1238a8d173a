/**
 * Instrument the broker collaborator trades. Only `symbol` is required by the
 * engine; the remaining fields are passed through to the broker adapter.
 */
export interface ContractSpec {
	symbol: string;
	exchange?: string;
	currency?: string;
	expiry?: string;
}

/**
 * One price observation. When `high`, `low` and `close` are all present the
 * typical price is derived from them, otherwise `price` is used as-is.
 */
export interface PriceSample {
	timestamp: number;
	price: number;
	high?: number;
	low?: number;
	close?: number;
}

export type TradeAction = "BUY" | "SELL";
export type ActivePositionSide = "LONG" | "SHORT";

export type TradePhase =
	| "IDLE"
	| "SIGNAL_PENDING"
	| "BRACKET_SENT"
	| "ACTIVE"
	| "EXITING"
	| "CLOSED";

export type CciMode = "stdev" | "classic";

export type CciTrend = "rising" | "falling" | "flat";

export type CciUnavailableReason = "insufficient_history" | "zero_dispersion";

export type CciReading =
	| {
			status: "ok";
			mode: CciMode;
			value: number;
			previous: number | null;
			mean: number;
			dispersion: number;
			trend: CciTrend | null;
	  }
	| {
			status: "unavailable";
			mode: CciMode;
			reason: CciUnavailableReason;
			previous: number | null;
	  };

export interface EmaValues {
	single: number | null;
	fast: number | null;
	slow: number | null;
	multi: Record<number, number | null>;
}

export interface StrategySignal {
	action: TradeAction;
	reason: string;
	quantity?: number;
}

/** Tick-based bracket sizing. */
export interface BracketConfig {
	tickSize: number;
	slTicks: number;
	tpTicksLong: number;
	tpTicksShort: number;
	quantity: number;
}
