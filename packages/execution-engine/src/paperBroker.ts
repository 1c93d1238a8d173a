import {
	createLogger,
	type ActivePositionSide,
	type BracketHandles,
	type BracketRequest,
	type BrokerClient,
	type ContractSpec,
	type FillEvent,
	type FillListener,
	type PriceSample,
} from "@tickloop/core";
import { PaperAccount, realizedPnl, type PaperAccountSnapshot } from "./paperAccount";

const paperLogger = createLogger("execution-engine:paper");

/** Where the paper broker gets its prices from. */
export interface PriceFeed {
	fetchPrice(contract: ContractSpec): Promise<PriceSample>;
}

export interface PaperBrokerOptions {
	feed: PriceFeed;
	account?: PaperAccount;
	now?: () => number;
}

interface RestingOrder {
	id: string;
	price: number;
}

export interface PaperPositionSnapshot {
	symbol: string;
	side: ActivePositionSide;
	quantity: number;
	entryPrice: number;
	takeProfit: RestingOrder | null;
	stopLoss: RestingOrder | null;
}

/**
 * In-process broker. Entries fill at the bracket's reference price as soon as
 * they are submitted; the resting take-profit and stop-loss fill at their own
 * price once a fetched price touches them.
 */
export class PaperBroker implements BrokerClient {
	readonly venue = "paper";
	readonly account: PaperAccount;
	private readonly listeners = new Set<FillListener>();
	private readonly positions = new Map<string, PaperPositionSnapshot>();
	private readonly lastPrices = new Map<string, number>();
	private readonly now: () => number;
	private orderSeq = 0;

	constructor(private readonly options: PaperBrokerOptions) {
		this.account = options.account ?? new PaperAccount(0);
		this.now = options.now ?? Date.now;
	}

	async fetchPrice(contract: ContractSpec): Promise<PriceSample> {
		const sample = await this.options.feed.fetchPrice(contract);
		this.lastPrices.set(contract.symbol, sample.price);
		this.matchRestingOrders(contract.symbol, sample.price);
		return sample;
	}

	async submitBracket(request: BracketRequest): Promise<BracketHandles> {
		const { symbol } = request.contract;
		if (this.positions.has(symbol)) {
			throw new Error(`Paper position already open on ${symbol}`);
		}
		this.orderSeq += 1;
		const entryId = `paper-${this.orderSeq}`;
		const handles: BracketHandles = {
			entryId,
			takeProfitId: `${entryId}-tp`,
			stopLossId: `${entryId}-sl`,
		};
		this.positions.set(symbol, {
			symbol,
			side: request.action === "BUY" ? "LONG" : "SHORT",
			quantity: request.quantity,
			entryPrice: request.referencePrice,
			takeProfit: { id: handles.takeProfitId, price: request.takeProfitPrice },
			stopLoss: { id: handles.stopLossId, price: request.stopLossPrice },
		});
		this.emit({
			orderId: entryId,
			symbol,
			price: request.referencePrice,
			quantity: request.quantity,
			timestamp: this.now(),
		});
		return handles;
	}

	async cancelAll(contract: ContractSpec): Promise<void> {
		const position = this.positions.get(contract.symbol);
		if (position) {
			position.takeProfit = null;
			position.stopLoss = null;
		}
	}

	async flatten(contract: ContractSpec): Promise<string | null> {
		const position = this.positions.get(contract.symbol);
		if (!position) {
			return null;
		}
		this.orderSeq += 1;
		const orderId = `paper-${this.orderSeq}-flat`;
		const exitPrice = this.lastPrices.get(contract.symbol) ?? position.entryPrice;
		this.close(position, orderId, exitPrice);
		return orderId;
	}

	onFill(listener: FillListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	position(symbol: string): PaperPositionSnapshot | null {
		const position = this.positions.get(symbol);
		return position ? { ...position } : null;
	}

	snapshotAccount(): PaperAccountSnapshot {
		let unrealized = 0;
		for (const position of this.positions.values()) {
			const mark = this.lastPrices.get(position.symbol) ?? position.entryPrice;
			unrealized += realizedPnl(position.side, position.entryPrice, mark, position.quantity);
		}
		return this.account.snapshot(unrealized);
	}

	private matchRestingOrders(symbol: string, price: number): void {
		const position = this.positions.get(symbol);
		if (!position) {
			return;
		}
		const long = position.side === "LONG";
		const { takeProfit, stopLoss } = position;
		if (takeProfit && (long ? price >= takeProfit.price : price <= takeProfit.price)) {
			this.close(position, takeProfit.id, takeProfit.price);
		} else if (stopLoss && (long ? price <= stopLoss.price : price >= stopLoss.price)) {
			this.close(position, stopLoss.id, stopLoss.price);
		}
	}

	private close(position: PaperPositionSnapshot, orderId: string, exitPrice: number): void {
		this.positions.delete(position.symbol);
		const timestamp = this.now();
		const snapshot = this.account.registerClosedTrade({
			symbol: position.symbol,
			side: position.side,
			quantity: position.quantity,
			entryPrice: position.entryPrice,
			exitPrice,
			realizedPnl: realizedPnl(position.side, position.entryPrice, exitPrice, position.quantity),
			exitOrderId: orderId,
			timestamp,
		});
		paperLogger.info("paper_account_update", { symbol: position.symbol, snapshot });
		this.emit({
			orderId,
			symbol: position.symbol,
			price: exitPrice,
			quantity: position.quantity,
			timestamp,
		});
	}

	private emit(fill: FillEvent): void {
		paperLogger.debug("paper_fill", { ...fill });
		for (const listener of this.listeners) {
			listener(fill);
		}
	}
}
