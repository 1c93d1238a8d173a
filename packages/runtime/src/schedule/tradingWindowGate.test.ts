import { ConfigurationError, parseScheduleConfig } from "@tickloop/core";
import { describe, expect, it } from "vitest";
import { TradingWindowGate } from "./tradingWindowGate";

// Asia/Jerusalem is UTC+2 in January and UTC+3 in July.
const jan = (day: number, hour: number, minute: number, second = 0): number =>
	Date.UTC(2025, 0, day, hour - 2, minute, second);

const buildGate = (): TradingWindowGate =>
	new TradingWindowGate(
		parseScheduleConfig({
			tradeTimezone: "Asia/Jerusalem",
			pauseWindow: { start: "15:25", end: "16:35" },
			tradeStart: "08:00",
			newOrderCutoff: "22:30",
			shutdownAt: "22:50",
			forceClose: "21:45",
		})
	);

describe("TradingWindowGate", () => {
	it("allows trading inside the session", () => {
		expect(buildGate().evaluate(jan(15, 10, 0))).toEqual({
			tradingAllowed: true,
			mustForceClose: false,
			mustShutdown: false,
			blockReason: null,
			localTime: "10:00:00",
		});
	});

	it("arms the force-close for the local day of the first evaluation", () => {
		const gate = buildGate();
		expect(gate.nextForceCloseAt).toBeNull();
		gate.evaluate(jan(15, 10, 0));
		expect(gate.nextForceCloseAt).toBe(Date.UTC(2025, 0, 15, 19, 45));
	});

	it("fires the force-close alone at 21:45", () => {
		const decision = buildGate().evaluate(jan(15, 21, 45));
		expect(decision.mustForceClose).toBe(true);
		expect(decision.mustShutdown).toBe(false);
		expect(decision.tradingAllowed).toBe(true);
		expect(decision.localTime).toBe("21:45:00");
	});

	it("fires once per local day and again on the next day", () => {
		const gate = buildGate();
		gate.evaluate(jan(15, 10, 0));
		expect(gate.evaluate(jan(15, 21, 45)).mustForceClose).toBe(true);
		expect(gate.evaluate(jan(15, 21, 46)).mustForceClose).toBe(false);
		expect(gate.evaluate(jan(15, 22, 10)).mustForceClose).toBe(false);
		expect(gate.nextForceCloseAt).toBe(Date.UTC(2025, 0, 16, 19, 45));
		expect(gate.evaluate(jan(16, 21, 44)).mustForceClose).toBe(false);
		expect(gate.evaluate(jan(16, 21, 45)).mustForceClose).toBe(true);
	});

	it("reports force-close and shutdown together when first evaluated after both", () => {
		const decision = buildGate().evaluate(jan(15, 22, 50));
		expect(decision).toEqual({
			tradingAllowed: false,
			mustForceClose: true,
			mustShutdown: true,
			blockReason: "new_order_cutoff",
			localTime: "22:50:00",
		});
	});

	it("blocks new orders inside the pause window with an exclusive end", () => {
		const gate = buildGate();
		expect(gate.evaluate(jan(15, 15, 24, 59)).tradingAllowed).toBe(true);
		expect(gate.evaluate(jan(15, 15, 25)).blockReason).toBe("pause_window");
		expect(gate.evaluate(jan(15, 16, 34, 59)).blockReason).toBe("pause_window");
		expect(gate.evaluate(jan(15, 16, 35)).tradingAllowed).toBe(true);
	});

	it("blocks new orders before the trading start and after the cutoff", () => {
		const gate = buildGate();
		expect(gate.evaluate(jan(15, 7, 59)).blockReason).toBe("before_trade_start");
		expect(gate.evaluate(jan(15, 8, 0)).tradingAllowed).toBe(true);
		expect(gate.evaluate(jan(15, 22, 29, 59)).tradingAllowed).toBe(true);
		expect(gate.evaluate(jan(15, 22, 30)).blockReason).toBe("new_order_cutoff");
	});

	it("follows daylight saving time through the timezone database", () => {
		const decision = buildGate().evaluate(Date.UTC(2025, 6, 15, 18, 45));
		expect(decision.localTime).toBe("21:45:00");
		expect(decision.mustForceClose).toBe(true);
	});

	it("never forces anything without the corresponding clock values", () => {
		const gate = new TradingWindowGate(parseScheduleConfig({ tradeTimezone: "UTC" }));
		expect(gate.evaluate(Date.UTC(2025, 0, 15, 23, 59))).toEqual({
			tradingAllowed: true,
			mustForceClose: false,
			mustShutdown: false,
			blockReason: null,
			localTime: "23:59:00",
		});
	});

	it("rejects a pause window that does not start before it ends", () => {
		expect(
			() =>
				new TradingWindowGate({
					tradeTimezone: "UTC",
					pauseWindow: { start: { hour: 13, minute: 0 }, end: { hour: 13, minute: 0 } },
					tradeStart: null,
					newOrderCutoff: null,
					shutdownAt: null,
					forceClose: null,
				})
		).toThrowError(ConfigurationError);
	});

	it("rejects an unknown timezone", () => {
		expect(
			() =>
				new TradingWindowGate({
					tradeTimezone: "Mars/Olympus",
					pauseWindow: null,
					tradeStart: null,
					newOrderCutoff: null,
					shutdownAt: null,
					forceClose: null,
				})
		).toThrowError(ConfigurationError);
	});
});
