import type { BracketRequest, TradePhase } from "@tickloop/core";
import { describe, expect, it } from "vitest";
import { type PhaseTransitionEvent, TradeLifecycle } from "./tradeLifecycle";

const T0 = Date.UTC(2025, 0, 15, 10, 0);

const request: BracketRequest = {
	contract: { symbol: "BTC/USDT" },
	action: "BUY",
	quantity: 1,
	referencePrice: 100,
	takeProfitPrice: 100.6,
	stopLossPrice: 99.8,
};
const handles = { entryId: "e-1", takeProfitId: "tp-1", stopLossId: "sl-1" };

const setup = (signalDelayMs = 0) => {
	const events: PhaseTransitionEvent[] = [];
	const lifecycle = new TradeLifecycle({
		instanceId: "cci-200",
		symbol: "BTC/USDT",
		signalDelayMs,
		startedAt: T0,
		onTransition: (event) => events.push(event),
	});
	const path = (): string[] => events.map((event) => `${event.from}->${event.to}`);
	return { lifecycle, events, path };
};

const fill = (orderId: string, price = 100) => ({
	orderId,
	symbol: "BTC/USDT",
	price,
	quantity: 1,
	timestamp: T0,
});

const toActive = (lifecycle: TradeLifecycle): void => {
	lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0);
	lifecycle.markBracketSent(handles, request, T0 + 1_000);
	lifecycle.onFill(fill("e-1"), T0 + 2_000);
};

describe("TradeLifecycle", () => {
	it("runs a full take-profit cycle and resets to IDLE", () => {
		const { lifecycle, events, path } = setup();
		toActive(lifecycle);
		expect(lifecycle.phase).toBe("ACTIVE");
		expect(lifecycle.bracket?.entryFillPrice).toBe(100);
		expect(lifecycle.onFill(fill("tp-1", 100.6), T0 + 62_000)).toBe("take_profit");
		expect(path()).toEqual([
			"IDLE->SIGNAL_PENDING",
			"SIGNAL_PENDING->BRACKET_SENT",
			"BRACKET_SENT->ACTIVE",
			"ACTIVE->CLOSED",
			"CLOSED->IDLE",
		]);
		expect(events[3]).toMatchObject({ reason: "take_profit_filled", durationMs: 60_000 });
		expect(events[4]).toMatchObject({ reason: "reset", durationMs: 0, at: T0 + 62_000 });
		expect(lifecycle.phase).toBe("IDLE");
		expect(lifecycle.bracket).toBeNull();
	});

	it("carries instance, symbol and timing on every event", () => {
		const { lifecycle, events } = setup();
		lifecycle.detectSignal({ action: "SELL", reason: "cci_above_200" }, T0 + 5_000);
		expect(events[0]).toEqual({
			instanceId: "cci-200",
			symbol: "BTC/USDT",
			from: "IDLE",
			to: "SIGNAL_PENDING",
			reason: "signal_sell",
			durationMs: 5_000,
			at: T0 + 5_000,
			annotations: { signalReason: "cci_above_200", delayMs: 0 },
		});
	});

	it("ignores signals outside IDLE", () => {
		const { lifecycle } = setup();
		toActive(lifecycle);
		expect(lifecycle.detectSignal({ action: "SELL", reason: "again" }, T0 + 3_000)).toBe(false);
		expect(lifecycle.phase).toBe("ACTIVE");
	});

	it("holds a signal until its delay elapses", () => {
		const { lifecycle } = setup(180_000);
		lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0);
		expect(lifecycle.pendingReady(T0 + 179_999)).toBe(false);
		expect(lifecycle.pendingReady(T0 + 180_000)).toBe(true);
	});

	it("keeps the signal pending after a failed submission and counts failures", () => {
		const { lifecycle } = setup();
		lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0);
		expect(lifecycle.recordSubmissionFailure()).toBe(1);
		expect(lifecycle.recordSubmissionFailure()).toBe(2);
		expect(lifecycle.phase).toBe("SIGNAL_PENDING");
		lifecycle.markBracketSent(handles, request, T0 + 1_000);
		expect(lifecycle.submissionFailures).toBe(0);
	});

	it("discards a pending signal back to IDLE", () => {
		const { lifecycle, path } = setup();
		lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0);
		expect(lifecycle.discardSignal("new_order_cutoff", T0 + 1)).toBe(true);
		expect(path()).toEqual(["IDLE->SIGNAL_PENDING", "SIGNAL_PENDING->IDLE"]);
		expect(lifecycle.pendingSignal).toBeNull();
	});

	it("ignores fills for unknown orders", () => {
		const { lifecycle } = setup();
		toActive(lifecycle);
		expect(lifecycle.onFill(fill("other"), T0 + 3_000)).toBe("ignored");
		expect(lifecycle.phase).toBe("ACTIVE");
	});

	it("detects a stop breach on either side", () => {
		const { lifecycle } = setup();
		toActive(lifecycle);
		expect(lifecycle.stopLossBreached(99.81)).toBe(false);
		expect(lifecycle.stopLossBreached(99.8)).toBe(true);

		const short = setup();
		short.lifecycle.detectSignal({ action: "SELL", reason: "test" }, T0);
		short.lifecycle.markBracketSent(
			handles,
			{ ...request, action: "SELL", takeProfitPrice: 99.4, stopLossPrice: 100.2 },
			T0
		);
		short.lifecycle.onFill(fill("e-1"), T0);
		expect(short.lifecycle.stopLossBreached(100.2)).toBe(true);
		expect(short.lifecycle.stopLossBreached(100.1)).toBe(false);
	});

	it("exits through the flatten fill after a manual stop", () => {
		const { lifecycle, path } = setup();
		toActive(lifecycle);
		lifecycle.beginExit("flat-1", "manual_stop_breach", T0 + 3_000);
		expect(lifecycle.phase).toBe("EXITING");
		expect(lifecycle.flattenOrderId).toBe("flat-1");
		expect(lifecycle.onFill(fill("flat-1", 99.7), T0 + 4_000)).toBe("flatten");
		expect(path().slice(-3)).toEqual(["ACTIVE->EXITING", "EXITING->CLOSED", "CLOSED->IDLE"]);
	});

	it("closes at once when the broker is already flat", () => {
		const { lifecycle, path } = setup();
		toActive(lifecycle);
		lifecycle.beginExit(null, "manual_stop_breach", T0 + 3_000);
		expect(lifecycle.phase).toBe("IDLE");
		expect(path().slice(-3)).toEqual(["ACTIVE->EXITING", "EXITING->CLOSED", "CLOSED->IDLE"]);
	});

	it.each<[string, (lifecycle: TradeLifecycle) => void, string[]]>([
		["IDLE", () => undefined, []],
		[
			"SIGNAL_PENDING",
			(lifecycle) => lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0),
			["SIGNAL_PENDING->IDLE"],
		],
		[
			"BRACKET_SENT",
			(lifecycle) => {
				lifecycle.detectSignal({ action: "BUY", reason: "test" }, T0);
				lifecycle.markBracketSent(handles, request, T0);
			},
			["BRACKET_SENT->IDLE"],
		],
		["ACTIVE", toActive, ["ACTIVE->CLOSED", "CLOSED->IDLE"]],
		[
			"EXITING",
			(lifecycle) => {
				toActive(lifecycle);
				lifecycle.beginExit("flat-1", "manual_stop_breach", T0 + 3_000);
			},
			["EXITING->CLOSED", "CLOSED->IDLE"],
		],
	])("force-closes from %s", (_phase, arrange, expected) => {
		const { lifecycle, events, path } = setup();
		arrange(lifecycle);
		const before = events.length;
		lifecycle.forceClose(T0 + 10_000);
		expect(path().slice(before)).toEqual(expected);
		expect(lifecycle.phase).toBe<TradePhase>("IDLE");
	});

	it("passes through CLOSED on shutdown even from IDLE", () => {
		const { lifecycle, events, path } = setup();
		lifecycle.shutdown(T0 + 1_000);
		expect(path()).toEqual(["IDLE->CLOSED", "CLOSED->IDLE"]);
		expect(events[0].reason).toBe("shutdown");
	});
});
