import type { ActivePositionSide } from "@tickloop/core";

export interface ClosedTrade {
	symbol: string;
	side: ActivePositionSide;
	quantity: number;
	entryPrice: number;
	exitPrice: number;
	realizedPnl: number;
	/** Order id that closed the position. */
	exitOrderId: string;
	timestamp: number;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastTrade?: ClosedTrade;
}

export const realizedPnl = (
	side: ActivePositionSide,
	entryPrice: number,
	exitPrice: number,
	quantity: number
): number =>
	side === "LONG"
		? (exitPrice - entryPrice) * quantity
		: (entryPrice - exitPrice) * quantity;

/**
 * Balance and win/loss tally of the paper broker. Equity only moves on closed
 * trades plus whatever unrealized PnL the caller passes to `snapshot`.
 */
export class PaperAccount {
	private balance: number;
	private equity: number;
	private maxEquity: number;
	private readonly trades = {
		total: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
	};
	private lastTrade?: ClosedTrade;

	constructor(private readonly startingBalance: number) {
		this.balance = startingBalance;
		this.equity = startingBalance;
		this.maxEquity = startingBalance;
	}

	registerClosedTrade(trade: ClosedTrade): PaperAccountSnapshot {
		this.balance += trade.realizedPnl;
		this.trades.total += 1;
		if (trade.realizedPnl > 0) {
			this.trades.wins += 1;
		} else if (trade.realizedPnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}
		this.lastTrade = trade;
		return this.snapshot(0);
	}

	snapshot(unrealizedPnl: number): PaperAccountSnapshot {
		this.equity = this.balance + unrealizedPnl;
		if (this.equity > this.maxEquity) {
			this.maxEquity = this.equity;
		}
		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity: this.equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			maxEquity: this.maxEquity,
			maxDrawdown: this.maxEquity - this.equity,
			trades: { ...this.trades },
			lastTrade: this.lastTrade,
		};
	}
}
