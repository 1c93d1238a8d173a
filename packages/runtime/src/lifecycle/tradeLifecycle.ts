import type {
	BracketHandles,
	BracketRequest,
	FillEvent,
	StrategySignal,
	TradeAction,
	TradePhase,
} from "@tickloop/core";

export type TransitionAnnotations = Record<string, string | number | boolean | null>;

export interface PhaseTransitionEvent {
	instanceId: string;
	symbol: string;
	from: TradePhase;
	to: TradePhase;
	reason: string;
	/** Time spent in `from`. */
	durationMs: number;
	at: number;
	annotations?: TransitionAnnotations;
}

export interface PendingSignal {
	signal: StrategySignal;
	detectedAt: number;
	readyAt: number;
}

export interface OpenBracket {
	handles: BracketHandles;
	action: TradeAction;
	quantity: number;
	referencePrice: number;
	takeProfitPrice: number;
	stopLossPrice: number;
	entryFillPrice: number | null;
}

export type FillOutcome =
	| "entry"
	| "take_profit"
	| "stop_loss"
	| "flatten"
	| "ignored";

export interface TradeLifecycleOptions {
	instanceId: string;
	symbol: string;
	signalDelayMs: number;
	startedAt: number;
	onTransition: (event: PhaseTransitionEvent) => void;
}

/**
 * Phase machine of one instance. It performs no I/O: the orchestrator talks to
 * the broker and reports the outcome here. CLOSED is transient and is always
 * followed by CLOSED -> IDLE within the same call.
 */
export class TradeLifecycle {
	private currentPhase: TradePhase = "IDLE";
	private enteredAt: number;
	private pending: PendingSignal | null = null;
	private open: OpenBracket | null = null;
	private flattenId: string | null = null;
	private failures = 0;

	constructor(private readonly options: TradeLifecycleOptions) {
		this.enteredAt = options.startedAt;
	}

	get phase(): TradePhase {
		return this.currentPhase;
	}

	get phaseEnteredAt(): number {
		return this.enteredAt;
	}

	get pendingSignal(): PendingSignal | null {
		return this.pending;
	}

	get bracket(): OpenBracket | null {
		return this.open;
	}

	get flattenOrderId(): string | null {
		return this.flattenId;
	}

	get submissionFailures(): number {
		return this.failures;
	}

	/** ACTIVE or EXITING: the broker holds a position for this instance. */
	get positionOpen(): boolean {
		return this.currentPhase === "ACTIVE" || this.currentPhase === "EXITING";
	}

	/**
	 * IDLE -> SIGNAL_PENDING. Ignored in any other phase.
	 */
	detectSignal(signal: StrategySignal, nowMs: number): boolean {
		if (this.currentPhase !== "IDLE") {
			return false;
		}
		this.pending = {
			signal,
			detectedAt: nowMs,
			readyAt: nowMs + this.options.signalDelayMs,
		};
		this.transition("SIGNAL_PENDING", `signal_${signal.action.toLowerCase()}`, nowMs, {
			signalReason: signal.reason,
			delayMs: this.options.signalDelayMs,
		});
		return true;
	}

	pendingReady(nowMs: number): boolean {
		return (
			this.currentPhase === "SIGNAL_PENDING" &&
			this.pending !== null &&
			nowMs >= this.pending.readyAt
		);
	}

	/** SIGNAL_PENDING -> BRACKET_SENT after the broker accepted the bracket. */
	markBracketSent(handles: BracketHandles, request: BracketRequest, nowMs: number): void {
		if (this.currentPhase !== "SIGNAL_PENDING") {
			return;
		}
		this.failures = 0;
		this.open = {
			handles,
			action: request.action,
			quantity: request.quantity,
			referencePrice: request.referencePrice,
			takeProfitPrice: request.takeProfitPrice,
			stopLossPrice: request.stopLossPrice,
			entryFillPrice: null,
		};
		this.pending = null;
		this.transition("BRACKET_SENT", "bracket_submitted", nowMs, {
			entryId: handles.entryId,
			takeProfitPrice: request.takeProfitPrice,
			stopLossPrice: request.stopLossPrice,
		});
	}

	/**
	 * A failed submission leaves the signal pending; the next tick retries.
	 * @returns consecutive failures for the pending signal
	 */
	recordSubmissionFailure(): number {
		this.failures += 1;
		return this.failures;
	}

	/** SIGNAL_PENDING -> IDLE. */
	discardSignal(reason: string, nowMs: number): boolean {
		if (this.currentPhase !== "SIGNAL_PENDING") {
			return false;
		}
		this.transition("IDLE", reason, nowMs);
		return true;
	}

	onFill(fill: FillEvent, nowMs: number): FillOutcome {
		const bracket = this.open;
		if (!bracket) {
			return "ignored";
		}
		const { entryId, takeProfitId, stopLossId } = bracket.handles;
		if (this.currentPhase === "BRACKET_SENT" && fill.orderId === entryId) {
			bracket.entryFillPrice = fill.price;
			this.transition("ACTIVE", "entry_filled", nowMs, { fillPrice: fill.price });
			return "entry";
		}
		if (!this.positionOpen) {
			return "ignored";
		}
		if (fill.orderId === takeProfitId || fill.orderId === stopLossId) {
			const outcome = fill.orderId === takeProfitId ? "take_profit" : "stop_loss";
			this.close(`${outcome}_filled`, nowMs, { fillPrice: fill.price });
			return outcome;
		}
		if (this.currentPhase === "EXITING" && fill.orderId === this.flattenId) {
			this.close("flatten_filled", nowMs, { fillPrice: fill.price });
			return "flatten";
		}
		return "ignored";
	}

	/**
	 * Price crossed the stop while the stop order has not filled.
	 */
	stopLossBreached(price: number): boolean {
		if (this.currentPhase !== "ACTIVE" || !this.open) {
			return false;
		}
		return this.open.action === "BUY"
			? price <= this.open.stopLossPrice
			: price >= this.open.stopLossPrice;
	}

	/**
	 * ACTIVE -> EXITING once the flatten order is out. A null id means the
	 * broker was already flat, so the position closes at once.
	 */
	beginExit(flattenOrderId: string | null, reason: string, nowMs: number): void {
		if (this.currentPhase !== "ACTIVE") {
			return;
		}
		this.flattenId = flattenOrderId;
		this.transition("EXITING", reason, nowMs, { flattenOrderId });
		if (flattenOrderId === null) {
			this.close("already_flat", nowMs);
		}
	}

	forceClose(nowMs: number): void {
		if (this.currentPhase === "IDLE") {
			return;
		}
		if (this.positionOpen) {
			this.close("force_close", nowMs);
			return;
		}
		this.transition("IDLE", "force_close", nowMs);
	}

	shutdown(nowMs: number): void {
		this.close("shutdown", nowMs);
	}

	private close(reason: string, nowMs: number, annotations?: TransitionAnnotations): void {
		this.transition("CLOSED", reason, nowMs, annotations);
		this.transition("IDLE", "reset", nowMs);
	}

	private transition(
		to: TradePhase,
		reason: string,
		nowMs: number,
		annotations?: TransitionAnnotations
	): void {
		const from = this.currentPhase;
		const event: PhaseTransitionEvent = {
			instanceId: this.options.instanceId,
			symbol: this.options.symbol,
			from,
			to,
			reason,
			durationMs: Math.max(0, nowMs - this.enteredAt),
			at: nowMs,
			...(annotations ? { annotations } : {}),
		};
		this.currentPhase = to;
		this.enteredAt = nowMs;
		if (to === "IDLE") {
			this.pending = null;
			this.open = null;
			this.flattenId = null;
			this.failures = 0;
		}
		this.options.onTransition(event);
	}
}
