import { defineStrategy } from "../definition";
import type { PolicyContext, StrategyPolicy } from "../types";
import type { StrategySignal } from "../../types";
import {
	CCI14_THRESHOLD_ID,
	Cci14ThresholdParams,
	cci14ThresholdDefaults,
	parseCci14ThresholdParams,
} from "./config";
import { selectThresholdSignal } from "./entryLogic";

/**
 * Enters immediately when CCI-14 leaves the ±threshold band.
 */
export class Cci14ThresholdStrategy implements StrategyPolicy {
	readonly id = CCI14_THRESHOLD_ID;

	constructor(private readonly params: Cci14ThresholdParams) {}

	evaluate(ctx: PolicyContext): StrategySignal | null {
		return selectThresholdSignal(ctx.cci, this.params);
	}
}

export const cci14ThresholdDefinition = defineStrategy({
	...cci14ThresholdDefaults,
	parseParams: parseCci14ThresholdParams,
	createPolicy: (params) => new Cci14ThresholdStrategy(params),
});

export * from "./config";
