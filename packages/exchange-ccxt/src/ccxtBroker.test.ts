import type { FillEvent } from "@tickloop/core";
import { describe, expect, it } from "vitest";
import {
	CcxtBroker,
	type CcxtOrderView,
	type CcxtTickerView,
	type CcxtTradingClient,
	type OrderSide,
} from "./ccxtBroker";

interface CreatedOrder {
	symbol: string;
	type: string;
	side: OrderSide;
	amount: number;
	price?: number;
	params?: Record<string, unknown>;
}

class StubClient implements CcxtTradingClient {
	readonly created: CreatedOrder[] = [];
	readonly cancelled: string[] = [];
	readonly statuses = new Map<string, CcxtOrderView>();
	ticker: CcxtTickerView = { timestamp: 1_000, last: 100 };
	failOnOrder: number | null = null;
	fillMarketOrders = false;
	private seq = 0;

	async fetchTicker(): Promise<CcxtTickerView> {
		return this.ticker;
	}

	async createOrder(
		symbol: string,
		type: string,
		side: OrderSide,
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<CcxtOrderView> {
		this.seq += 1;
		if (this.failOnOrder === this.seq) {
			throw new Error("insufficient margin");
		}
		this.created.push({ symbol, type, side, amount, price, params });
		const id = `o-${this.seq}`;
		const order: CcxtOrderView =
			this.fillMarketOrders && type === "market" && params?.triggerPrice === undefined
				? { id, status: "closed", average: 100, filled: amount, timestamp: 5_000 }
				: { id, status: "open" };
		this.statuses.set(order.id, order);
		return order;
	}

	async cancelAllOrders(symbol: string): Promise<unknown> {
		this.cancelled.push(symbol);
		return [];
	}

	async fetchOrder(id: string): Promise<CcxtOrderView> {
		return this.statuses.get(id) ?? { id, status: "canceled" };
	}

	fill(id: string, average: number): void {
		this.statuses.set(id, { id, status: "closed", average, filled: 1, timestamp: 5_000 });
	}
}

const contract = { symbol: "BTC/USDT" };

const setup = () => {
	const client = new StubClient();
	const broker = new CcxtBroker(client, { venue: "stub", now: () => 9_000 });
	const fills: FillEvent[] = [];
	broker.onFill((fill) => fills.push(fill));
	return { client, broker, fills };
};

const request = {
	contract,
	action: "BUY" as const,
	quantity: 1,
	referencePrice: 100,
	takeProfitPrice: 100.6,
	stopLossPrice: 99.8,
};

describe("CcxtBroker", () => {
	it("maps the ticker's last price to a sample", async () => {
		const { broker } = setup();
		expect(await broker.fetchPrice(contract)).toEqual({ timestamp: 1_000, price: 100 });
	});

	it("falls back to the clock and the close price", async () => {
		const { client, broker } = setup();
		client.ticker = { close: 99.5 };
		expect(await broker.fetchPrice(contract)).toEqual({ timestamp: 9_000, price: 99.5 });
	});

	it("rejects a ticker without a price", async () => {
		const { client, broker } = setup();
		client.ticker = {};
		await expect(broker.fetchPrice(contract)).rejects.toThrow(
			"Ticker for BTC/USDT carries no last price"
		);
	});

	it("sends the bracket as entry, reduce-only limit and stop-market", async () => {
		const { client, broker } = setup();
		const handles = await broker.submitBracket(request);
		expect(handles).toEqual({ entryId: "o-1", takeProfitId: "o-2", stopLossId: "o-3" });
		expect(client.created).toEqual([
			{ symbol: "BTC/USDT", type: "market", side: "buy", amount: 1, price: undefined, params: undefined },
			{
				symbol: "BTC/USDT",
				type: "limit",
				side: "sell",
				amount: 1,
				price: 100.6,
				params: { reduceOnly: true },
			},
			{
				symbol: "BTC/USDT",
				type: "market",
				side: "sell",
				amount: 1,
				price: undefined,
				params: { triggerPrice: 99.8, reduceOnly: true },
			},
		]);
	});

	it("closes a filled entry when an exit leg is rejected", async () => {
		const { client, broker, fills } = setup();
		client.fillMarketOrders = true;
		client.failOnOrder = 2;
		await expect(broker.submitBracket(request)).rejects.toThrow("insufficient margin");
		expect(client.cancelled).toEqual(["BTC/USDT"]);
		expect(client.created).toEqual([
			{ symbol: "BTC/USDT", type: "market", side: "buy", amount: 1, price: undefined, params: undefined },
			{
				symbol: "BTC/USDT",
				type: "market",
				side: "sell",
				amount: 1,
				price: undefined,
				params: { reduceOnly: true },
			},
		]);

		client.failOnOrder = null;
		const handles = await broker.submitBracket(request);
		expect(handles.entryId).toBe("o-4");
		await broker.syncFills(contract);
		expect(fills.map((fill) => fill.orderId)).toEqual(["o-4"]);
		expect(broker.position("BTC/USDT")).toEqual({ side: "LONG", quantity: 1 });
	});

	it("cancels an unfilled entry when the stop-loss leg is rejected", async () => {
		const { client, broker, fills } = setup();
		client.failOnOrder = 3;
		await expect(broker.submitBracket(request)).rejects.toThrow("insufficient margin");
		expect(client.cancelled).toEqual(["BTC/USDT"]);
		expect(client.created.map((order) => order.type)).toEqual(["market", "limit"]);

		client.fill("o-1", 100);
		client.fill("o-2", 100.6);
		await broker.syncFills(contract);
		expect(fills).toEqual([]);
		expect(broker.position("BTC/USDT")).toBeNull();
	});

	it("reports closed orders on sync and cancels the sibling exit", async () => {
		const { client, broker, fills } = setup();
		await broker.submitBracket(request);
		client.fill("o-1", 100.1);
		await broker.syncFills(contract);
		expect(fills).toEqual([
			{ orderId: "o-1", symbol: "BTC/USDT", price: 100.1, quantity: 1, timestamp: 5_000 },
		]);
		expect(broker.position("BTC/USDT")).toEqual({ side: "LONG", quantity: 1 });

		client.fill("o-2", 100.6);
		await broker.syncFills(contract);
		expect(fills.map((fill) => fill.orderId)).toEqual(["o-1", "o-2"]);
		expect(client.cancelled).toEqual(["BTC/USDT"]);
		expect(broker.position("BTC/USDT")).toBeNull();

		client.fill("o-3", 99.8);
		await broker.syncFills(contract);
		expect(fills).toHaveLength(2);
	});

	it("flattens the synced position with a reduce-only market order", async () => {
		const { client, broker } = setup();
		await broker.submitBracket(request);
		client.fill("o-1", 100);
		await broker.syncFills(contract);
		await broker.cancelAll(contract);
		expect(await broker.flatten(contract)).toBe("o-4");
		expect(client.created[3]).toEqual({
			symbol: "BTC/USDT",
			type: "market",
			side: "sell",
			amount: 1,
			price: undefined,
			params: { reduceOnly: true },
		});
	});

	it("returns null when flattening without a position", async () => {
		const { broker } = setup();
		expect(await broker.flatten(contract)).toBeNull();
	});

	it("rejects exchanges it cannot build", () => {
		expect(() => CcxtBroker.create({ exchangeId: "kraken" })).toThrow(
			'Unsupported exchange "kraken" (expected one of binance, mexc)'
		);
	});
});
