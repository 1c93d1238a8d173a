import {
	errorMessage,
	type StrategyInstanceConfig,
	type StrategyPolicy,
} from "@tickloop/core";
import type { ObservabilitySink } from "../observability/types";
import type { TickContext, TickOrchestrator } from "./tickOrchestrator";

/**
 * One configured strategy on one contract: its policy on top of an
 * orchestrator.
 */
export class StrategyInstance {
	constructor(
		readonly config: StrategyInstanceConfig,
		readonly policy: StrategyPolicy,
		readonly orchestrator: TickOrchestrator,
		private readonly sink: ObservabilitySink
	) {}

	get instanceId(): string {
		return this.config.instanceId;
	}

	/**
	 * One tick, then the policy when the instance is idle and may trade.
	 */
	async runOnce(nowMs: number): Promise<TickContext> {
		const tick = await this.orchestrator.tick(nowMs);
		if (
			tick.terminate ||
			!tick.policyContext ||
			tick.phase !== "IDLE" ||
			!tick.gate.tradingAllowed
		) {
			return tick;
		}
		const signal = this.policy.evaluate(tick.policyContext);
		if (!signal) {
			return tick;
		}
		await this.orchestrator.acceptSignal(signal, nowMs);
		return { ...tick, phase: this.orchestrator.lifecycle.phase };
	}

	/**
	 * Contain an unexpected tick failure. Indicator state is rebuilt only while
	 * nothing is held at the broker.
	 */
	recover(error: unknown, nowMs: number): void {
		const phase = this.orchestrator.lifecycle.phase;
		const resetIndicators = phase === "IDLE" || phase === "SIGNAL_PENDING";
		if (resetIndicators) {
			this.orchestrator.resetIndicators();
			this.policy.reset?.();
		}
		this.sink.diagnostic({
			instanceId: this.instanceId,
			level: "error",
			event: "tick_failed",
			at: nowMs,
			message: errorMessage(error),
			details: { phase, resetIndicators },
		});
	}

	dispose(): void {
		this.orchestrator.dispose();
	}
}
