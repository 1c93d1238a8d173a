import {
	getStrategyDefinition,
	secondsToMs,
	type BrokerClient,
	type StrategyInstanceConfig,
	type StrategyPolicy,
} from "@tickloop/core";
import { IndicatorEngine } from "@tickloop/indicators";
import { StrategyInstance } from "./loop/strategyInstance";
import { TickOrchestrator } from "./loop/tickOrchestrator";
import type { ObservabilitySink } from "./observability/types";
import { TradingWindowGate } from "./schedule/tradingWindowGate";
import { runtimeLogger } from "./runtimeShared";

export interface CreateStrategyInstanceOptions {
	config: StrategyInstanceConfig;
	broker: BrokerClient;
	sink: ObservabilitySink;
	/** Replaces the registered policy, e.g. in tests. */
	policyOverride?: StrategyPolicy;
	/** Defaults to the check interval. */
	fetchTimeoutMs?: number;
	now?: () => number;
}

/**
 * Wire a validated instance config to its policy, indicators, gate and broker.
 * @throws ConfigurationError when the schedule or params are invalid
 */
export const createStrategyInstance = (
	options: CreateStrategyInstanceOptions
): StrategyInstance => {
	const { config, broker, sink } = options;
	const policy =
		options.policyOverride ?? getStrategyDefinition(config.id).createPolicy(config.params);
	const indicators = new IndicatorEngine({
		emaFastSpan: config.emaFastSpan,
		emaSlowSpan: config.emaSlowSpan,
		emaSingleSpan: config.emaSingleSpan,
		emaSpans: config.emaSpans,
		initialEma: config.initialEma,
		cciMode: config.classicCci ? "classic" : "stdev",
		multiEmaDiagnostics: config.multiEmaDiagnostics,
	});
	const gate = new TradingWindowGate(config.schedule);
	const intervalMs = secondsToMs(config.checkIntervalSeconds);
	const orchestrator = new TickOrchestrator({
		instanceId: config.instanceId,
		contract: config.contract,
		broker,
		gate,
		indicators,
		sink,
		bracket: config.bracket,
		signalDelayMs: secondsToMs(config.signalDelaySeconds),
		fetchTimeoutMs: options.fetchTimeoutMs ?? intervalMs,
		computeCci: config.computeCci,
		snapshotEveryTicks: config.snapshotEveryTicks,
		annotate: policy.annotate ? (ctx) => policy.annotate?.(ctx) ?? {} : undefined,
		startedAt: (options.now ?? Date.now)(),
	});

	runtimeLogger.info("strategy_instance_created", {
		instanceId: config.instanceId,
		strategyId: config.id,
		symbol: config.contract.symbol,
		venue: broker.venue,
		historyCapacity: indicators.historyCapacity,
		schedule: gate.describe(),
	});
	return new StrategyInstance(config, policy, orchestrator, sink);
};
