import type { StrategyId } from "../ids";
import { readNumberParam } from "../params";
import type { StrategyDefinitionInput } from "../definition";
import type { StrategyManifest } from "../types";

export const CCI14_COMPARE_ID: StrategyId = "cci14_compare";

export interface Cci14CompareParams {
	/** CCI level whose crossing defines the signal; zero in the default profile. */
	crossLevel: number;
}

export const cci14CompareManifest: StrategyManifest = {
	strategyId: CCI14_COMPARE_ID,
	name: "CCI14 zero-cross with EMA confirmation",
	description:
		"Buys when CCI-14 crosses up through the level with price above the fast EMA, sells on the mirror; waits out a delay before sending the bracket.",
};

export const parseCci14CompareParams = (
	raw: Record<string, unknown>
): Cci14CompareParams => ({
	crossLevel: readNumberParam(raw, "crossLevel", 0, CCI14_COMPARE_ID),
});

export const cci14CompareDefaults: Omit<
	StrategyDefinitionInput<Cci14CompareParams>,
	"parseParams" | "createPolicy"
> = {
	id: CCI14_COMPARE_ID,
	manifest: cci14CompareManifest,
	defaultProfile: "cci14-compare",
	checkIntervalSeconds: 60,
	capabilities: {
		computeCci: true,
		emaFastSpan: 10,
		emaSlowSpan: 200,
		emaSingleSpan: null,
		emaSpans: [10, 20, 32, 50, 100, 200],
		multiEmaDiagnostics: true,
		signalDelaySeconds: 180,
	},
	schedule: {
		tradeTimezone: "Asia/Jerusalem",
		pauseWindow: null,
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
