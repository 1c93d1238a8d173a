import type { ContractSpec, PriceSample, TradeAction } from "../types";

/**
 * Bracket submitted as one unit: an entry market order with a take-profit
 * limit and a stop-loss stop attached to it.
 */
export interface BracketRequest {
	contract: ContractSpec;
	action: TradeAction;
	quantity: number;
	referencePrice: number;
	takeProfitPrice: number;
	stopLossPrice: number;
}

export interface BracketHandles {
	entryId: string;
	takeProfitId: string;
	stopLossId: string;
}

export interface FillEvent {
	orderId: string;
	symbol: string;
	price: number;
	quantity: number;
	timestamp: number;
}

export type FillListener = (fill: FillEvent) => void;

/**
 * Broker collaborator the engine drives. Transport is up to the adapter; the
 * engine depends only on these signatures.
 */
export interface BrokerClient {
	readonly venue: string;

	fetchPrice(contract: ContractSpec): Promise<PriceSample>;

	submitBracket(request: BracketRequest): Promise<BracketHandles>;

	cancelAll(contract: ContractSpec): Promise<void>;

	/**
	 * Close any open position on the contract at market.
	 * @returns the id of the closing order, or null when already flat
	 */
	flatten(contract: ContractSpec): Promise<string | null>;

	/**
	 * Subscribe to fills. Returns an unsubscribe function.
	 */
	onFill(listener: FillListener): () => void;

	/**
	 * Adapters that learn about fills by polling do it here; the engine calls
	 * it at the start of every tick.
	 */
	syncFills?(contract: ContractSpec): Promise<void>;
}
