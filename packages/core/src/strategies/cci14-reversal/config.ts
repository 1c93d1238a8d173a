import { ConfigurationError } from "../../errors";
import type { StrategyDefinitionInput } from "../definition";
import type { StrategyId } from "../ids";
import { readBooleanParam, readNumberParam } from "../params";
import type { StrategyManifest } from "../types";

export const CCI14_REVERSAL_ID: StrategyId = "cci14_reversal";

export interface Cci14ReversalParams {
	level: number;
	requireEmaTrend: boolean;
}

export const cci14ReversalManifest: StrategyManifest = {
	strategyId: CCI14_REVERSAL_ID,
	name: "CCI14 ±120 reversal",
	description:
		"Trades CCI-14 turning back inside ±level after an excursion, filtered by the fast/slow EMA trend.",
};

export const parseCci14ReversalParams = (
	raw: Record<string, unknown>
): Cci14ReversalParams => {
	const level = readNumberParam(raw, "level", 120, CCI14_REVERSAL_ID);
	if (level <= 0) {
		throw new ConfigurationError(
			`${CCI14_REVERSAL_ID}: params.level must be positive`,
			{ level }
		);
	}
	return {
		level,
		requireEmaTrend: readBooleanParam(
			raw,
			"requireEmaTrend",
			true,
			CCI14_REVERSAL_ID
		),
	};
};

export const cci14ReversalDefaults: Omit<
	StrategyDefinitionInput<Cci14ReversalParams>,
	"parseParams" | "createPolicy"
> = {
	id: CCI14_REVERSAL_ID,
	manifest: cci14ReversalManifest,
	defaultProfile: "cci14-reversal",
	checkIntervalSeconds: 60,
	capabilities: {
		computeCci: true,
		emaFastSpan: 10,
		emaSlowSpan: 200,
		emaSingleSpan: null,
		emaSpans: [],
		multiEmaDiagnostics: false,
		signalDelaySeconds: 0,
	},
	schedule: {
		tradeTimezone: "Asia/Jerusalem",
		tradeStart: "07:00",
		newOrderCutoff: "22:30",
		shutdownAt: "22:50",
	},
	bracket: {
		tickSize: 0.01,
		slTicks: 7,
		tpTicksLong: 10,
		tpTicksShort: 10,
		quantity: 1,
	},
};
