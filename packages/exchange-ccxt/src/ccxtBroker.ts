import ccxt from "ccxt";
import type { Exchange, Order, Ticker } from "ccxt";
import {
	ConfigurationError,
	createLogger,
	errorMessage,
	type ActivePositionSide,
	type BracketHandles,
	type BracketRequest,
	type BrokerClient,
	type ContractSpec,
	type FillEvent,
	type FillListener,
	type PriceSample,
} from "@tickloop/core";

const ccxtLogger = createLogger("exchange:ccxt");

export type OrderSide = "buy" | "sell";

export interface CcxtTickerView {
	timestamp?: number;
	last?: number;
	close?: number;
}

export interface CcxtOrderView {
	id: string;
	status?: string;
	average?: number;
	price?: number;
	filled?: number;
	timestamp?: number;
}

/**
 * The slice of a ccxt exchange the broker uses.
 */
export interface CcxtTradingClient {
	fetchTicker(symbol: string): Promise<CcxtTickerView>;
	createOrder(
		symbol: string,
		type: string,
		side: OrderSide,
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<CcxtOrderView>;
	cancelAllOrders(symbol: string): Promise<unknown>;
	fetchOrder(id: string, symbol: string): Promise<CcxtOrderView>;
}

export const SUPPORTED_EXCHANGES = ["binance", "mexc"] as const;
export type SupportedExchange = (typeof SUPPORTED_EXCHANGES)[number];

export interface CcxtBrokerCreateOptions {
	exchangeId: string;
	apiKey?: string;
	secret?: string;
	sandbox?: boolean;
	/** ccxt `defaultType`, e.g. "spot" or "swap". */
	marketType?: string;
}

export interface CcxtBrokerOptions {
	venue?: string;
	now?: () => number;
}

type OrderRole = "entry" | "take_profit" | "stop_loss" | "flatten";

interface TrackedOrder {
	symbol: string;
	role: OrderRole;
	side: OrderSide;
	amount: number;
}

interface OpenPosition {
	side: ActivePositionSide;
	quantity: number;
}

const isSupportedExchange = (value: string): value is SupportedExchange =>
	SUPPORTED_EXCHANGES.some((id) => id === value);

const opposite = (side: OrderSide): OrderSide => (side === "buy" ? "sell" : "buy");

const toTickerView = (ticker: Ticker): CcxtTickerView => ({
	timestamp: ticker.timestamp,
	last: ticker.last,
	close: ticker.close,
});

const toOrderView = (order: Order): CcxtOrderView => ({
	id: order.id,
	status: order.status,
	average: order.average,
	price: order.price,
	filled: order.filled,
	timestamp: order.timestamp,
});

const instantiate = (
	exchangeId: SupportedExchange,
	settings: Record<string, unknown>
): Exchange => {
	switch (exchangeId) {
		case "binance":
			return new ccxt.binance(settings);
		case "mexc":
			return new ccxt.mexc(settings);
	}
};

/**
 * Live broker over a ccxt exchange. Brackets are sent as three orders: a
 * market entry, a reduce-only limit take-profit and a reduce-only stop-market
 * stop-loss. Fills are learned by polling the tracked orders in `syncFills`;
 * when one exit leg fills the other is cancelled. If an exit leg is rejected
 * the entry is unwound before the error propagates.
 */
export class CcxtBroker implements BrokerClient {
	readonly venue: string;
	private readonly listeners = new Set<FillListener>();
	private readonly tracked = new Map<string, TrackedOrder>();
	private readonly positions = new Map<string, OpenPosition>();
	private readonly now: () => number;

	constructor(
		private readonly client: CcxtTradingClient,
		options: CcxtBrokerOptions = {}
	) {
		this.venue = options.venue ?? "ccxt";
		this.now = options.now ?? Date.now;
	}

	/**
	 * @throws ConfigurationError for an exchange id other than binance or mexc
	 */
	static create(options: CcxtBrokerCreateOptions): CcxtBroker {
		const { exchangeId } = options;
		if (!isSupportedExchange(exchangeId)) {
			throw new ConfigurationError(
				`Unsupported exchange "${exchangeId}" (expected one of ${SUPPORTED_EXCHANGES.join(", ")})`,
				{ exchangeId }
			);
		}
		const exchange = instantiate(exchangeId, {
			apiKey: options.apiKey || undefined,
			secret: options.secret || undefined,
			enableRateLimit: true,
			options: {
				defaultType: options.marketType ?? "spot",
			},
		});
		if (options.sandbox) {
			exchange.setSandboxMode(true);
		}
		const client: CcxtTradingClient = {
			fetchTicker: async (symbol) => toTickerView(await exchange.fetchTicker(symbol)),
			createOrder: async (symbol, type, side, amount, price, params) =>
				toOrderView(await exchange.createOrder(symbol, type, side, amount, price, params)),
			cancelAllOrders: (symbol) => exchange.cancelAllOrders(symbol),
			fetchOrder: async (id, symbol) => toOrderView(await exchange.fetchOrder(id, symbol)),
		};
		return new CcxtBroker(client, { venue: exchangeId });
	}

	async fetchPrice(contract: ContractSpec): Promise<PriceSample> {
		const ticker = await this.client.fetchTicker(contract.symbol);
		const price = ticker.last ?? ticker.close;
		if (price === undefined) {
			throw new Error(`Ticker for ${contract.symbol} carries no last price`);
		}
		return { timestamp: ticker.timestamp ?? this.now(), price };
	}

	async submitBracket(request: BracketRequest): Promise<BracketHandles> {
		const { symbol } = request.contract;
		const side: OrderSide = request.action === "BUY" ? "buy" : "sell";
		const exitSide = opposite(side);
		const entry = await this.client.createOrder(symbol, "market", side, request.quantity);
		this.track(entry, { symbol, role: "entry", side, amount: request.quantity });

		try {
			const takeProfit = await this.client.createOrder(
				symbol,
				"limit",
				exitSide,
				request.quantity,
				request.takeProfitPrice,
				{ reduceOnly: true }
			);
			this.track(takeProfit, {
				symbol,
				role: "take_profit",
				side: exitSide,
				amount: request.quantity,
			});
			const stopLoss = await this.client.createOrder(
				symbol,
				"market",
				exitSide,
				request.quantity,
				undefined,
				{ triggerPrice: request.stopLossPrice, reduceOnly: true }
			);
			this.track(stopLoss, {
				symbol,
				role: "stop_loss",
				side: exitSide,
				amount: request.quantity,
			});
			return { entryId: entry.id, takeProfitId: takeProfit.id, stopLossId: stopLoss.id };
		} catch (error) {
			ccxtLogger.error("bracket_exit_legs_failed", {
				symbol,
				entryId: entry.id,
				error: errorMessage(error),
			});
			await this.unwindEntry(symbol, entry.id, exitSide, request.quantity);
			throw error;
		}
	}

	async cancelAll(contract: ContractSpec): Promise<void> {
		await this.client.cancelAllOrders(contract.symbol);
		for (const [id, order] of this.tracked) {
			if (order.symbol === contract.symbol && order.role !== "flatten") {
				this.tracked.delete(id);
			}
		}
	}

	async flatten(contract: ContractSpec): Promise<string | null> {
		const position = this.positions.get(contract.symbol);
		if (!position) {
			return null;
		}
		const side: OrderSide = position.side === "LONG" ? "sell" : "buy";
		const order = await this.client.createOrder(
			contract.symbol,
			"market",
			side,
			position.quantity,
			undefined,
			{ reduceOnly: true }
		);
		this.track(order, {
			symbol: contract.symbol,
			role: "flatten",
			side,
			amount: position.quantity,
		});
		return order.id;
	}

	onFill(listener: FillListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/** Poll every tracked order of the contract and report the ones that closed. */
	async syncFills(contract: ContractSpec): Promise<void> {
		for (const [id, order] of [...this.tracked]) {
			if (order.symbol !== contract.symbol || !this.tracked.has(id)) {
				continue;
			}
			const current = await this.client.fetchOrder(id, contract.symbol);
			if (current.status === "closed") {
				await this.settle(current, order);
			} else if (current.status === "canceled" || current.status === "expired") {
				this.tracked.delete(id);
			}
		}
	}

	/** Open position as this broker last saw it. */
	position(symbol: string): OpenPosition | null {
		const position = this.positions.get(symbol);
		return position ? { ...position } : null;
	}

	/**
	 * Undo the entry of a bracket whose exit legs could not all be placed:
	 * cancel whatever still rests, then close out any filled part with a
	 * reduce-only market order. The entry is no longer tracked either way.
	 */
	private async unwindEntry(
		symbol: string,
		entryId: string,
		exitSide: OrderSide,
		quantity: number
	): Promise<void> {
		this.tracked.delete(entryId);
		try {
			await this.cancelAll({ symbol });
			const entry = await this.client.fetchOrder(entryId, symbol);
			const filled = entry.filled ?? (entry.status === "closed" ? quantity : 0);
			if (filled <= 0) {
				ccxtLogger.warn("bracket_entry_cancelled", { symbol, entryId });
				return;
			}
			const order = await this.client.createOrder(symbol, "market", exitSide, filled, undefined, {
				reduceOnly: true,
			});
			ccxtLogger.warn("bracket_entry_unwound", {
				symbol,
				entryId,
				orderId: order.id,
				quantity: filled,
			});
		} catch (error) {
			ccxtLogger.error("bracket_unwind_failed", { symbol, entryId, error: errorMessage(error) });
		}
	}

	private track(order: CcxtOrderView, tracked: TrackedOrder): void {
		this.tracked.set(order.id, tracked);
		ccxtLogger.info("order_submitted", {
			orderId: order.id,
			symbol: tracked.symbol,
			role: tracked.role,
			side: tracked.side,
			amount: tracked.amount,
			status: order.status ?? null,
		});
	}

	private async settle(order: CcxtOrderView, tracked: TrackedOrder): Promise<void> {
		this.tracked.delete(order.id);
		if (tracked.role === "entry") {
			this.positions.set(tracked.symbol, {
				side: tracked.side === "buy" ? "LONG" : "SHORT",
				quantity: order.filled ?? tracked.amount,
			});
		} else {
			this.positions.delete(tracked.symbol);
			if (tracked.role !== "flatten") {
				await this.cancelAll({ symbol: tracked.symbol });
			}
		}
		const fill: FillEvent = {
			orderId: order.id,
			symbol: tracked.symbol,
			price: order.average ?? order.price ?? 0,
			quantity: order.filled ?? tracked.amount,
			timestamp: order.timestamp ?? this.now(),
		};
		ccxtLogger.info("order_filled", { ...fill, role: tracked.role });
		for (const listener of this.listeners) {
			listener(fill);
		}
	}
}
