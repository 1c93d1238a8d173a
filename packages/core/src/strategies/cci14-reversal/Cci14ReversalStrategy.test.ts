import { describe, expect, it } from "vitest";
import { buildContext, emptyEmas, okCci } from "../__tests__/policyContext";
import { isLongReversal, isShortReversal } from "./entryLogic";
import { Cci14ReversalStrategy, parseCci14ReversalParams } from "./index";

describe("reversal patterns", () => {
	it("detects a long reversal out of the lower band", () => {
		expect(isLongReversal([-150, -100, -80], 120)).toBe(true);
		expect(isLongReversal([-150, -100, -110], 120)).toBe(false);
		expect(isLongReversal([-100, -90, -80], 120)).toBe(false);
	});

	it("detects a short reversal out of the upper band", () => {
		expect(isShortReversal([120, 110, 90], 120)).toBe(true);
		expect(isShortReversal([119, 110, 90], 120)).toBe(false);
	});

	it("needs three values", () => {
		expect(isLongReversal([-150, -100], 120)).toBe(false);
	});
});

describe("Cci14ReversalStrategy", () => {
	it("buys a long reversal when the fast EMA is above the slow EMA", () => {
		const strategy = new Cci14ReversalStrategy(parseCci14ReversalParams({}));
		const signal = strategy.evaluate(
			buildContext({
				cci: okCci(-80, -100),
				cciHistory: [-150, -100, -80],
				emas: emptyEmas({ fast: 101, slow: 100 }),
			})
		);
		expect(signal).toEqual({ action: "BUY", reason: "cci_reversal_from_-120" });
	});

	it("filters a reversal against the EMA trend and counts it", () => {
		const strategy = new Cci14ReversalStrategy(parseCci14ReversalParams({}));
		const ctx = buildContext({
			cci: okCci(90, 110),
			cciHistory: [130, 110, 90],
			emas: emptyEmas({ fast: 101, slow: 100 }),
		});
		expect(strategy.evaluate(ctx)).toBeNull();
		expect(strategy.annotate(ctx)).toEqual({
			emaFast: 101,
			emaSlow: 100,
			filteredSignals: 1,
		});
		strategy.reset();
		expect(strategy.annotate(ctx).filteredSignals).toBe(0);
	});

	it("skips the trend filter when disabled", () => {
		const strategy = new Cci14ReversalStrategy(
			parseCci14ReversalParams({ requireEmaTrend: false })
		);
		const signal = strategy.evaluate(
			buildContext({ cci: okCci(90, 110), cciHistory: [130, 110, 90] })
		);
		expect(signal?.action).toBe("SELL");
	});
});
