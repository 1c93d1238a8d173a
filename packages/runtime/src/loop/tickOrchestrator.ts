import {
	FetchTimeoutError,
	IndicatorUnavailableError,
	InvalidSampleError,
	OrderSubmissionError,
	errorMessage,
	type BracketConfig,
	type BrokerClient,
	type CciReading,
	type ContractSpec,
	type FillEvent,
	type LogLevel,
	type PolicyContext,
	type PriceSample,
	type StrategySignal,
	type TickAnnotations,
	type TradePhase,
} from "@tickloop/core";
import type { IndicatorEngine } from "@tickloop/indicators";
import { buildBracketRequest } from "../lifecycle/bracketPricing";
import { TradeLifecycle } from "../lifecycle/tradeLifecycle";
import type { GateActionKind, ObservabilitySink } from "../observability/types";
import type { GateDecision, TradingWindowGate } from "../schedule/tradingWindowGate";
import { withTimeout } from "./withTimeout";

export interface TickContext {
	/** Undefined when the tick did not obtain a usable price. */
	price: number | undefined;
	cci: CciReading | null;
	phase: TradePhase;
	gate: GateDecision;
	terminate: boolean;
	/** What the policy sees; null when no price was obtained. */
	policyContext: PolicyContext | null;
}

export interface TickOrchestratorOptions {
	instanceId: string;
	contract: ContractSpec;
	broker: BrokerClient;
	gate: TradingWindowGate;
	indicators: IndicatorEngine;
	sink: ObservabilitySink;
	bracket: BracketConfig;
	signalDelayMs: number;
	fetchTimeoutMs: number;
	computeCci: boolean;
	/** Indicator snapshot cadence in priced ticks; 0 disables. */
	snapshotEveryTicks?: number;
	annotate?: (ctx: PolicyContext) => TickAnnotations;
	startedAt: number;
}

interface LiquidationResult {
	ok: boolean;
	flattenOrderId: string | null;
}

/**
 * Sequences one tick of one instance: gate, fills, force-close, shutdown,
 * fetch, indicators, phase maintenance, tick record. All broker I/O for the
 * instance happens here.
 */
export class TickOrchestrator {
	readonly lifecycle: TradeLifecycle;
	private readonly pendingFills: FillEvent[] = [];
	private readonly unsubscribe: () => void;
	private blockedNoticeShown = false;
	private pricedTicks = 0;
	private lastGate: GateDecision | null = null;
	private lastPrice: number | null = null;

	constructor(private readonly options: TickOrchestratorOptions) {
		this.lifecycle = new TradeLifecycle({
			instanceId: options.instanceId,
			symbol: options.contract.symbol,
			signalDelayMs: options.signalDelayMs,
			startedAt: options.startedAt,
			onTransition: (event) => options.sink.phaseTransition(event),
		});
		this.unsubscribe = options.broker.onFill((fill) => {
			if (fill.symbol === options.contract.symbol) {
				this.pendingFills.push(fill);
			}
		});
	}

	get instanceId(): string {
		return this.options.instanceId;
	}

	get indicators(): IndicatorEngine {
		return this.options.indicators;
	}

	async tick(nowMs: number): Promise<TickContext> {
		const { broker, contract, gate, indicators } = this.options;
		const decision = gate.evaluate(nowMs);
		this.lastGate = decision;
		this.lastPrice = null;

		if (broker.syncFills) {
			try {
				await broker.syncFills(contract);
			} catch (error) {
				this.diagnose("warn", "fill_sync_failed", nowMs, errorMessage(error));
			}
		}
		this.drainFills(nowMs);

		if (decision.mustForceClose) {
			this.recordGateAction("force_close", decision, nowMs);
			await this.liquidate(nowMs);
			this.lifecycle.forceClose(nowMs);
		}

		if (decision.mustShutdown) {
			this.recordGateAction("shutdown", decision, nowMs);
			await this.liquidate(nowMs);
			this.lifecycle.shutdown(nowMs);
			return this.context(nowMs, decision, undefined, null, true);
		}

		if (!decision.tradingAllowed) {
			this.lifecycle.discardSignal(decision.blockReason ?? "trading_blocked", nowMs);
			if (!this.blockedNoticeShown) {
				this.blockedNoticeShown = true;
				this.recordGateAction("new_orders_blocked", decision, nowMs);
			}
			if (!this.lifecycle.positionOpen) {
				return this.context(nowMs, decision, undefined, null, false);
			}
		} else if (this.blockedNoticeShown) {
			this.blockedNoticeShown = false;
			this.recordGateAction("new_orders_resumed", decision, nowMs);
		}

		let sample: PriceSample;
		try {
			sample = await withTimeout(
				broker.fetchPrice(contract),
				this.options.fetchTimeoutMs,
				() => new FetchTimeoutError(this.options.fetchTimeoutMs, contract.symbol)
			);
		} catch (error) {
			this.diagnose("warn", "price_fetch_failed", nowMs, errorMessage(error), {
				timeout: error instanceof FetchTimeoutError,
			});
			return this.context(nowMs, decision, undefined, null, false);
		}
		this.drainFills(nowMs);

		try {
			indicators.update(sample);
		} catch (error) {
			if (error instanceof InvalidSampleError) {
				this.diagnose("warn", "invalid_sample", nowMs, error.message, error.details);
				return this.context(nowMs, decision, undefined, null, false);
			}
			throw error;
		}
		const price = sample.price;
		this.lastPrice = price;

		const cci = this.options.computeCci ? indicators.cci() : null;
		if (cci && cci.status === "unavailable") {
			const unavailable = new IndicatorUnavailableError("cci14", cci.reason);
			this.diagnose("debug", "indicator_unavailable", nowMs, unavailable.message);
		}

		if (this.lifecycle.phase === "ACTIVE" && this.lifecycle.stopLossBreached(price)) {
			await this.exitOnStopBreach(price, nowMs);
		} else if (this.lifecycle.phase === "SIGNAL_PENDING" && decision.tradingAllowed) {
			await this.advancePending(nowMs, price);
		}

		const context = this.context(nowMs, decision, price, cci, false);
		this.pricedTicks += 1;
		this.recordTick(context, nowMs);
		const every = this.options.snapshotEveryTicks ?? 0;
		if (every > 0 && this.pricedTicks % every === 0) {
			this.options.sink.indicatorSnapshot({
				instanceId: this.options.instanceId,
				symbol: contract.symbol,
				at: nowMs,
				...indicators.snapshot(),
			});
		}
		return context;
	}

	/**
	 * IDLE -> SIGNAL_PENDING, then try to send the bracket right away so a zero
	 * delay submits within the same tick.
	 */
	async acceptSignal(signal: StrategySignal, nowMs: number): Promise<boolean> {
		if (!this.lastGate?.tradingAllowed || this.lastPrice === null) {
			return false;
		}
		if (!this.lifecycle.detectSignal(signal, nowMs)) {
			return false;
		}
		await this.advancePending(nowMs, this.lastPrice);
		return true;
	}

	resetIndicators(): void {
		this.options.indicators.reset();
	}

	dispose(): void {
		this.unsubscribe();
	}

	private async advancePending(nowMs: number, price: number): Promise<void> {
		const pending = this.lifecycle.pendingSignal;
		if (!pending || !this.lifecycle.pendingReady(nowMs)) {
			return;
		}
		const request = buildBracketRequest(
			this.options.contract,
			pending.signal,
			price,
			this.options.bracket
		);
		try {
			const handles = await this.options.broker.submitBracket(request);
			this.lifecycle.markBracketSent(handles, request, nowMs);
		} catch (error) {
			const failures = this.lifecycle.recordSubmissionFailure();
			const failure = new OrderSubmissionError(errorMessage(error), {
				action: request.action,
				referencePrice: request.referencePrice,
			});
			this.diagnose("warn", "bracket_submission_failed", nowMs, failure.message, {
				...failure.details,
				failures,
			});
			return;
		}
		this.drainFills(nowMs);
	}

	private async exitOnStopBreach(price: number, nowMs: number): Promise<void> {
		this.diagnose("warn", "manual_stop_breach", nowMs, undefined, {
			price,
			stopLossPrice: this.lifecycle.bracket?.stopLossPrice ?? null,
		});
		const result = await this.liquidate(nowMs);
		if (result.ok) {
			this.lifecycle.beginExit(result.flattenOrderId, "manual_stop_breach", nowMs);
			this.drainFills(nowMs);
		}
	}

	private async liquidate(nowMs: number): Promise<LiquidationResult> {
		const { broker, contract } = this.options;
		try {
			await broker.cancelAll(contract);
			return { ok: true, flattenOrderId: await broker.flatten(contract) };
		} catch (error) {
			this.diagnose("error", "liquidation_failed", nowMs, errorMessage(error));
			return { ok: false, flattenOrderId: null };
		}
	}

	private drainFills(nowMs: number): void {
		for (const fill of this.pendingFills.splice(0)) {
			const outcome = this.lifecycle.onFill(fill, nowMs);
			if (outcome === "ignored") {
				this.diagnose("debug", "fill_ignored", nowMs, undefined, { orderId: fill.orderId });
			}
		}
	}

	private context(
		nowMs: number,
		gate: GateDecision,
		price: number | undefined,
		cci: CciReading | null,
		terminate: boolean
	): TickContext {
		const { indicators } = this.options;
		return {
			price,
			cci,
			phase: this.lifecycle.phase,
			gate,
			terminate,
			policyContext:
				price === undefined
					? null
					: {
							nowMs,
							instanceId: this.options.instanceId,
							symbol: this.options.contract.symbol,
							price,
							cci,
							cciHistory: indicators.cciHistory(),
							emas: indicators.emas(),
							phase: this.lifecycle.phase,
							tradingAllowed: gate.tradingAllowed,
						},
		};
	}

	private recordTick(context: TickContext, nowMs: number): void {
		const { cci, policyContext } = context;
		if (context.price === undefined || !policyContext) {
			return;
		}
		this.options.sink.tickRecord({
			instanceId: this.options.instanceId,
			symbol: this.options.contract.symbol,
			at: nowMs,
			localTime: context.gate.localTime,
			price: context.price,
			cci: cci?.status === "ok" ? cci.value : null,
			cciStatus: cci ? cci.status : "disabled",
			cciTrend: cci?.status === "ok" ? cci.trend : null,
			phase: context.phase,
			tradingAllowed: context.gate.tradingAllowed,
			annotations: this.options.annotate?.(policyContext) ?? {},
		});
	}

	private recordGateAction(action: GateActionKind, decision: GateDecision, nowMs: number): void {
		this.options.sink.gateAction({
			instanceId: this.options.instanceId,
			symbol: this.options.contract.symbol,
			action,
			at: nowMs,
			localTime: decision.localTime,
			phase: this.lifecycle.phase,
			blockReason: decision.blockReason,
		});
	}

	private diagnose(
		level: LogLevel,
		event: string,
		nowMs: number,
		message?: string,
		details?: Record<string, unknown>
	): void {
		this.options.sink.diagnostic({
			instanceId: this.options.instanceId,
			level,
			event,
			at: nowMs,
			...(message === undefined ? {} : { message }),
			...(details ? { details } : {}),
		});
	}
}
