import { ConfigurationError } from "../errors";
import type { StrategyRegistryEntry } from "./definition";
import { isStrategyId, type StrategyId } from "./ids";
import type { StrategyManifest } from "./types";
import { cci14ThresholdDefinition } from "./cci14-threshold";
import { cci14CompareDefinition } from "./cci14-compare";
import { cci14ReversalDefinition } from "./cci14-reversal";

const registryEntries: readonly StrategyRegistryEntry[] = [
	cci14ThresholdDefinition,
	cci14CompareDefinition,
	cci14ReversalDefinition,
];

export const strategyRegistry: ReadonlyMap<StrategyId, StrategyRegistryEntry> =
	new Map(registryEntries.map((entry) => [entry.id, entry]));

export const getStrategyDefinition = (id: string): StrategyRegistryEntry => {
	const entry = isStrategyId(id) ? strategyRegistry.get(id) : undefined;
	if (!entry) {
		throw new ConfigurationError(
			`Unknown strategy id "${id}". Known ids: ${[...strategyRegistry.keys()].join(", ")}`,
			{ id }
		);
	}
	return entry;
};

export const listStrategies = (): StrategyManifest[] =>
	registryEntries.map((entry) => entry.manifest);
