import { msUntilNextMinute, secondsToMs } from "@tickloop/core";
import { runtimeLogger } from "../runtimeShared";
import type { StrategyInstance } from "./strategyInstance";

export interface StrategyLoopOptions {
	now?: () => number;
	/** Run the first tick on the next round minute instead of immediately. */
	alignToMinute?: boolean;
}

export interface StrategyLoopHandle {
	/** Prevents further ticks; a tick in flight runs to completion. */
	stop(): void;
	/** Resolves once the loop has exited. */
	done: Promise<void>;
}

/**
 * Drive an instance with one tick at a time, `checkIntervalSeconds` apart.
 * Exits after a terminating tick or `stop()`.
 */
export const startStrategyLoop = (
	instance: StrategyInstance,
	options: StrategyLoopOptions = {}
): StrategyLoopHandle => {
	const now = options.now ?? Date.now;
	const intervalMs = secondsToMs(instance.config.checkIntervalSeconds);
	let timer: ReturnType<typeof setTimeout> | null = null;
	let stopped = false;
	let finished = false;
	let ticking = false;
	let resolveDone: () => void = () => undefined;
	const done = new Promise<void>((resolve) => {
		resolveDone = resolve;
	});

	const finish = (reason: string): void => {
		if (finished) {
			return;
		}
		finished = true;
		if (timer) {
			clearTimeout(timer);
			timer = null;
		}
		instance.dispose();
		runtimeLogger.info("strategy_loop_stopped", {
			instanceId: instance.instanceId,
			reason,
		});
		resolveDone();
	};

	const runTick = async (): Promise<boolean> => {
		const tickAt = now();
		try {
			return (await instance.runOnce(tickAt)).terminate;
		} catch (error) {
			instance.recover(error, tickAt);
			return false;
		}
	};

	const schedule = (delayMs: number): void => {
		timer = setTimeout(() => {
			timer = null;
			ticking = true;
			void runTick().then((terminate) => {
				ticking = false;
				if (terminate) {
					finish("shutdown");
				} else if (stopped) {
					finish("stopped");
				} else {
					schedule(intervalMs);
				}
			});
		}, delayMs);
	};

	runtimeLogger.info("strategy_loop_started", {
		instanceId: instance.instanceId,
		strategyId: instance.config.id,
		symbol: instance.config.contract.symbol,
		intervalMs,
	});
	schedule(options.alignToMinute ? msUntilNextMinute(now()) : 0);

	return {
		stop: () => {
			stopped = true;
			if (!ticking) {
				finish("stopped");
			}
		},
		done,
	};
};
