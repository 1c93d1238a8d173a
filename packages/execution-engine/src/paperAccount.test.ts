import { describe, expect, it } from "vitest";
import { PaperAccount, realizedPnl, type ClosedTrade } from "./paperAccount";

const trade = (pnl: number): ClosedTrade => ({
	symbol: "BTC/USDT",
	side: "LONG",
	quantity: 1,
	entryPrice: 100,
	exitPrice: 100 + pnl,
	realizedPnl: pnl,
	exitOrderId: "x",
	timestamp: 0,
});

describe("PaperAccount", () => {
	it("tallies wins, losses and breakeven trades", () => {
		const account = new PaperAccount(1_000);
		account.registerClosedTrade(trade(5));
		account.registerClosedTrade(trade(-2));
		const snapshot = account.registerClosedTrade(trade(0));
		expect(snapshot.trades).toEqual({ total: 3, wins: 1, losses: 1, breakeven: 1 });
		expect(snapshot.balance).toBe(1_003);
		expect(snapshot.totalRealizedPnl).toBe(3);
	});

	it("tracks drawdown from the equity peak", () => {
		const account = new PaperAccount(1_000);
		account.registerClosedTrade(trade(10));
		const snapshot = account.snapshot(-4);
		expect(snapshot.maxEquity).toBe(1_010);
		expect(snapshot.equity).toBe(1_006);
		expect(snapshot.maxDrawdown).toBe(4);
	});

	it("flips the sign of pnl for shorts", () => {
		expect(realizedPnl("LONG", 100, 103, 2)).toBe(6);
		expect(realizedPnl("SHORT", 100, 103, 2)).toBe(-6);
	});
});
