import { defineStrategy } from "../definition";
import type { PolicyContext, StrategyPolicy, TickAnnotations } from "../types";
import type { StrategySignal } from "../../types";
import {
	CCI14_REVERSAL_ID,
	Cci14ReversalParams,
	cci14ReversalDefaults,
	parseCci14ReversalParams,
} from "./config";
import { evaluateReversal } from "./entryLogic";

export class Cci14ReversalStrategy implements StrategyPolicy {
	readonly id = CCI14_REVERSAL_ID;
	private filteredCount = 0;

	constructor(private readonly params: Cci14ReversalParams) {}

	evaluate(ctx: PolicyContext): StrategySignal | null {
		if (!ctx.cci || ctx.cci.status !== "ok") {
			return null;
		}
		const outcome = evaluateReversal(ctx.cciHistory, ctx.emas, this.params);
		if (outcome.kind === "filtered") {
			this.filteredCount += 1;
			return null;
		}
		return outcome.kind === "signal" ? outcome.signal : null;
	}

	annotate(ctx: PolicyContext): TickAnnotations {
		return {
			emaFast: ctx.emas.fast,
			emaSlow: ctx.emas.slow,
			filteredSignals: this.filteredCount,
		};
	}

	reset(): void {
		this.filteredCount = 0;
	}
}

export const cci14ReversalDefinition = defineStrategy({
	...cci14ReversalDefaults,
	parseParams: parseCci14ReversalParams,
	createPolicy: (params) => new Cci14ReversalStrategy(params),
});

export * from "./config";
