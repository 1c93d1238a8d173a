import type { ScheduleConfigInput } from "../schedule";
import type { BracketConfig } from "../types";
import type { StrategyId } from "./ids";
import type {
	StrategyCapabilities,
	StrategyManifest,
	StrategyPolicy,
} from "./types";

/**
 * What a strategy module declares: its defaults plus how to turn raw profile
 * params into a policy.
 */
export interface StrategyDefinitionInput<TParams> {
	id: StrategyId;
	manifest: StrategyManifest;
	defaultProfile: string;
	checkIntervalSeconds: number;
	capabilities: StrategyCapabilities;
	schedule: ScheduleConfigInput;
	bracket: BracketConfig;
	parseParams: (raw: Record<string, unknown>) => TParams;
	createPolicy: (params: TParams) => StrategyPolicy;
}

/**
 * Registry entry with the params type erased behind `createPolicy`.
 */
export interface StrategyRegistryEntry {
	id: StrategyId;
	manifest: StrategyManifest;
	defaultProfile: string;
	checkIntervalSeconds: number;
	capabilities: StrategyCapabilities;
	schedule: ScheduleConfigInput;
	bracket: BracketConfig;
	/** Validates params eagerly; throws ConfigurationError when they are bad. */
	validateParams: (raw: Record<string, unknown>) => void;
	createPolicy: (raw: Record<string, unknown>) => StrategyPolicy;
}

export const defineStrategy = <TParams>(
	input: StrategyDefinitionInput<TParams>
): StrategyRegistryEntry => {
	const { parseParams, createPolicy, ...rest } = input;
	return {
		...rest,
		validateParams: (raw) => {
			parseParams(raw);
		},
		createPolicy: (raw) => createPolicy(parseParams(raw)),
	};
};
