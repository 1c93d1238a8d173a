import { ConfigurationError } from "../../errors";
import type { StrategyId } from "../ids";
import { readNumberParam } from "../params";
import type { StrategyDefinitionInput } from "../definition";
import type { StrategyManifest } from "../types";

export const CCI14_THRESHOLD_ID: StrategyId = "cci14_threshold";

export interface Cci14ThresholdParams {
	/** CCI above this opens a SELL. */
	upper: number;
	/** CCI below this opens a BUY. */
	lower: number;
}

export const cci14ThresholdManifest: StrategyManifest = {
	strategyId: CCI14_THRESHOLD_ID,
	name: "CCI14 ±200 threshold",
	description:
		"Fades CCI-14 extremes: sells above the upper band, buys below the lower band.",
};

export const parseCci14ThresholdParams = (
	raw: Record<string, unknown>
): Cci14ThresholdParams => {
	const upper = readNumberParam(raw, "upper", 200, CCI14_THRESHOLD_ID);
	const lower = readNumberParam(raw, "lower", -200, CCI14_THRESHOLD_ID);
	if (lower >= upper) {
		throw new ConfigurationError(
			`${CCI14_THRESHOLD_ID}: params.lower (${lower}) must be below params.upper (${upper})`
		);
	}
	return { upper, lower };
};

export const cci14ThresholdDefaults: Omit<
	StrategyDefinitionInput<Cci14ThresholdParams>,
	"parseParams" | "createPolicy"
> = {
	id: CCI14_THRESHOLD_ID,
	manifest: cci14ThresholdManifest,
	defaultProfile: "cci14-threshold",
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
		tradeStart: "08:00",
		newOrderCutoff: "23:00",
	},
	bracket: {
		tickSize: 0.01,
		slTicks: 20,
		tpTicksLong: 60,
		tpTicksShort: 60,
		quantity: 1,
	},
};
