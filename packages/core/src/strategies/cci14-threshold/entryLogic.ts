import type { CciReading, StrategySignal } from "../../types";
import type { Cci14ThresholdParams } from "./config";

export const selectThresholdSignal = (
	cci: CciReading | null,
	params: Cci14ThresholdParams
): StrategySignal | null => {
	if (!cci || cci.status !== "ok") {
		return null;
	}
	if (cci.value > params.upper) {
		return { action: "SELL", reason: `cci_above_${params.upper}` };
	}
	if (cci.value < params.lower) {
		return { action: "BUY", reason: `cci_below_${params.lower}` };
	}
	return null;
};
