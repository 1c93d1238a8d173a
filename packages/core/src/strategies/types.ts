import type {
	CciReading,
	EmaValues,
	StrategySignal,
	TradePhase,
} from "../types";
import type { StrategyId } from "./ids";

/**
 * Everything a policy sees on a tick where a price was obtained.
 */
export interface PolicyContext {
	nowMs: number;
	instanceId: string;
	symbol: string;
	price: number;
	cci: CciReading | null;
	/** Most recent numeric CCI values, oldest first. */
	cciHistory: readonly number[];
	emas: EmaValues;
	phase: TradePhase;
	tradingAllowed: boolean;
}

export type TickAnnotations = Record<string, number | string | null>;

/**
 * Strategy-specific entry logic. Policies are plain objects: the runtime owns
 * the lifecycle, the indicators and the schedule.
 */
export interface StrategyPolicy {
	readonly id: StrategyId;
	evaluate(ctx: PolicyContext): StrategySignal | null;
	/** Extra values attached to the tick record. */
	annotate?(ctx: PolicyContext): TickAnnotations;
	reset?(): void;
}

/**
 * What a strategy asks of the shared engine.
 */
export interface StrategyCapabilities {
	computeCci: boolean;
	emaFastSpan: number;
	emaSlowSpan: number;
	emaSingleSpan: number | null;
	emaSpans: number[];
	multiEmaDiagnostics: boolean;
	signalDelaySeconds: number;
}

export interface StrategyManifest {
	strategyId: StrategyId;
	name: string;
	description: string;
}
