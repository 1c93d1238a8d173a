import { defineStrategy } from "../definition";
import type { PolicyContext, StrategyPolicy, TickAnnotations } from "../types";
import type { StrategySignal } from "../../types";
import {
	CCI14_COMPARE_ID,
	Cci14CompareParams,
	cci14CompareDefaults,
	parseCci14CompareParams,
} from "./config";
import { selectCrossSignal } from "./entryLogic";

export class Cci14CompareStrategy implements StrategyPolicy {
	readonly id = CCI14_COMPARE_ID;

	constructor(private readonly params: Cci14CompareParams) {}

	evaluate(ctx: PolicyContext): StrategySignal | null {
		return selectCrossSignal(ctx, this.params);
	}

	annotate(ctx: PolicyContext): TickAnnotations {
		return { emaFast: ctx.emas.fast, emaSlow: ctx.emas.slow };
	}
}

export const cci14CompareDefinition = defineStrategy({
	...cci14CompareDefaults,
	parseParams: parseCci14CompareParams,
	createPolicy: (params) => new Cci14CompareStrategy(params),
});

export * from "./config";
