import type { BracketRequest, FillEvent, PriceSample } from "@tickloop/core";
import { describe, expect, it } from "vitest";
import { PaperAccount } from "./paperAccount";
import { PaperBroker } from "./paperBroker";

const contract = { symbol: "BTC/USDT" };

const scriptedFeed = (prices: number[]) => {
	const queue = [...prices];
	return {
		fetchPrice: async (): Promise<PriceSample> => ({
			timestamp: 0,
			price: queue.length > 1 ? queue.shift() ?? 0 : queue[0],
		}),
	};
};

const bracket = (overrides: Partial<BracketRequest> = {}): BracketRequest => ({
	contract,
	action: "BUY",
	quantity: 2,
	referencePrice: 100,
	takeProfitPrice: 101,
	stopLossPrice: 99,
	...overrides,
});

const setup = (prices: number[]) => {
	const broker = new PaperBroker({
		feed: scriptedFeed(prices),
		account: new PaperAccount(1_000),
		now: () => 42,
	});
	const fills: FillEvent[] = [];
	broker.onFill((fill) => fills.push(fill));
	return { broker, fills };
};

describe("PaperBroker", () => {
	it("fills the entry at the reference price on submission", async () => {
		const { broker, fills } = setup([100]);
		const handles = await broker.submitBracket(bracket());
		expect(handles).toEqual({
			entryId: "paper-1",
			takeProfitId: "paper-1-tp",
			stopLossId: "paper-1-sl",
		});
		expect(fills).toEqual([
			{ orderId: "paper-1", symbol: "BTC/USDT", price: 100, quantity: 2, timestamp: 42 },
		]);
		expect(broker.position("BTC/USDT")?.side).toBe("LONG");
	});

	it("rejects a second bracket while a position is open", async () => {
		const { broker } = setup([100]);
		await broker.submitBracket(bracket());
		await expect(broker.submitBracket(bracket())).rejects.toThrow(
			"Paper position already open on BTC/USDT"
		);
	});

	it("fills the take-profit of a long once the price reaches it", async () => {
		const { broker, fills } = setup([100.5, 101.2]);
		await broker.submitBracket(bracket());
		await broker.fetchPrice(contract);
		expect(fills).toHaveLength(1);
		await broker.fetchPrice(contract);
		expect(fills[1]).toEqual({
			orderId: "paper-1-tp",
			symbol: "BTC/USDT",
			price: 101,
			quantity: 2,
			timestamp: 42,
		});
		expect(broker.position("BTC/USDT")).toBeNull();
		expect(broker.account.snapshot(0).totalRealizedPnl).toBe(2);
	});

	it("fills the stop-loss of a short when the price rises to it", async () => {
		const { broker, fills } = setup([102]);
		await broker.submitBracket(
			bracket({ action: "SELL", quantity: 1, takeProfitPrice: 99, stopLossPrice: 101 })
		);
		await broker.fetchPrice(contract);
		expect(fills[1].orderId).toBe("paper-1-sl");
		expect(fills[1].price).toBe(101);
		expect(broker.account.snapshot(0).trades.losses).toBe(1);
	});

	it("leaves the position unprotected after cancelAll", async () => {
		const { broker, fills } = setup([90]);
		await broker.submitBracket(bracket());
		await broker.cancelAll(contract);
		await broker.fetchPrice(contract);
		expect(fills).toHaveLength(1);
		expect(broker.position("BTC/USDT")?.stopLoss).toBeNull();
	});

	it("flattens at the last fetched price", async () => {
		const { broker, fills } = setup([98]);
		await broker.submitBracket(bracket());
		await broker.cancelAll(contract);
		await broker.fetchPrice(contract);
		expect(await broker.flatten(contract)).toBe("paper-2-flat");
		expect(fills[1]).toMatchObject({ orderId: "paper-2-flat", price: 98 });
		expect(broker.account.snapshot(0).totalRealizedPnl).toBe(-4);
	});

	it("returns null when flattening a flat contract", async () => {
		const { broker, fills } = setup([100]);
		expect(await broker.flatten(contract)).toBeNull();
		expect(fills).toHaveLength(0);
	});

	it("marks open positions to the last price in the account snapshot", async () => {
		const { broker } = setup([100.5]);
		await broker.submitBracket(bracket());
		await broker.fetchPrice(contract);
		expect(broker.snapshotAccount().equity).toBe(1_001);
	});
});
