import type {
	BracketConfig,
	BracketRequest,
	ContractSpec,
	StrategySignal,
	TradeAction,
} from "@tickloop/core";

export interface BracketPrices {
	takeProfitPrice: number;
	stopLossPrice: number;
}

const roundPrice = (value: number): number => Math.round(value * 100) / 100;

/**
 * Take-profit and stop-loss around the reference price, in ticks, rounded to
 * cents.
 */
export const priceBracket = (
	action: TradeAction,
	referencePrice: number,
	bracket: BracketConfig
): BracketPrices => {
	const stopDistance = bracket.tickSize * bracket.slTicks;
	if (action === "BUY") {
		return {
			takeProfitPrice: roundPrice(referencePrice + bracket.tickSize * bracket.tpTicksLong),
			stopLossPrice: roundPrice(referencePrice - stopDistance),
		};
	}
	return {
		takeProfitPrice: roundPrice(referencePrice - bracket.tickSize * bracket.tpTicksShort),
		stopLossPrice: roundPrice(referencePrice + stopDistance),
	};
};

export const buildBracketRequest = (
	contract: ContractSpec,
	signal: StrategySignal,
	referencePrice: number,
	bracket: BracketConfig
): BracketRequest => ({
	contract,
	action: signal.action,
	quantity: signal.quantity ?? bracket.quantity,
	referencePrice,
	...priceBracket(signal.action, referencePrice, bracket),
});
