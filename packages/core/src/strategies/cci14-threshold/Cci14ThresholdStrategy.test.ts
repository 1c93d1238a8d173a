import { describe, expect, it } from "vitest";
import { buildContext, okCci } from "../__tests__/policyContext";
import { Cci14ThresholdStrategy, parseCci14ThresholdParams } from "./index";

const strategy = new Cci14ThresholdStrategy(parseCci14ThresholdParams({}));

describe("Cci14ThresholdStrategy", () => {
	it("sells when CCI is above the upper band", () => {
		expect(strategy.evaluate(buildContext({ cci: okCci(215) }))).toEqual({
			action: "SELL",
			reason: "cci_above_200",
		});
	});

	it("buys when CCI is below the lower band", () => {
		expect(strategy.evaluate(buildContext({ cci: okCci(-201.5) }))).toEqual({
			action: "BUY",
			reason: "cci_below_-200",
		});
	});

	it("stays flat on the band edges and inside them", () => {
		expect(strategy.evaluate(buildContext({ cci: okCci(200) }))).toBeNull();
		expect(strategy.evaluate(buildContext({ cci: okCci(-200) }))).toBeNull();
		expect(strategy.evaluate(buildContext({ cci: okCci(12) }))).toBeNull();
	});

	it("ignores an unavailable reading", () => {
		expect(
			strategy.evaluate(
				buildContext({
					cci: {
						status: "unavailable",
						mode: "stdev",
						reason: "insufficient_history",
						previous: null,
					},
				})
			)
		).toBeNull();
	});

	it("honours custom bands", () => {
		const narrow = new Cci14ThresholdStrategy(
			parseCci14ThresholdParams({ upper: 100, lower: -100 })
		);
		expect(narrow.evaluate(buildContext({ cci: okCci(150) }))?.action).toBe("SELL");
	});
});
