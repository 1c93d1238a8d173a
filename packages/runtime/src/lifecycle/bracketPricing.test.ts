import { describe, expect, it } from "vitest";
import { buildBracketRequest, priceBracket } from "./bracketPricing";

const bracket = { tickSize: 0.01, slTicks: 20, tpTicksLong: 60, tpTicksShort: 40, quantity: 2 };

describe("priceBracket", () => {
	it("places a long take-profit above and the stop below the reference", () => {
		expect(priceBracket("BUY", 100, bracket)).toEqual({
			takeProfitPrice: 100.6,
			stopLossPrice: 99.8,
		});
	});

	it("mirrors the bracket for a short", () => {
		expect(priceBracket("SELL", 100, bracket)).toEqual({
			takeProfitPrice: 99.6,
			stopLossPrice: 100.2,
		});
	});

	it("rounds to cents", () => {
		expect(priceBracket("BUY", 70.123, { ...bracket, tickSize: 0.005, slTicks: 3 })).toEqual({
			takeProfitPrice: 70.42,
			stopLossPrice: 70.11,
		});
	});
});

describe("buildBracketRequest", () => {
	it("takes the quantity from the signal when it carries one", () => {
		const request = buildBracketRequest(
			{ symbol: "BTC/USDT" },
			{ action: "SELL", reason: "test", quantity: 5 },
			100,
			bracket
		);
		expect(request).toEqual({
			contract: { symbol: "BTC/USDT" },
			action: "SELL",
			quantity: 5,
			referencePrice: 100,
			takeProfitPrice: 99.6,
			stopLossPrice: 100.2,
		});
	});

	it("falls back to the configured quantity", () => {
		const request = buildBracketRequest(
			{ symbol: "BTC/USDT" },
			{ action: "BUY", reason: "test" },
			100,
			bracket
		);
		expect(request.quantity).toBe(2);
	});
});
