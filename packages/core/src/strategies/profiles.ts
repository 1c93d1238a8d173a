import { ConfigurationError } from "../errors";
import { getStrategyDefinition } from "./registry";

/**
 * Profile to load for a strategy id: the explicit override, else the
 * strategy's registered default.
 */
export const resolveStrategyProfileName = (
	strategyId: string,
	overrideProfile?: string
): string => {
	if (overrideProfile) {
		return overrideProfile;
	}
	const definition = getStrategyDefinition(strategyId);
	if (!definition.defaultProfile) {
		throw new ConfigurationError(
			`Strategy ${strategyId} does not define a default profile. Set override explicitly.`,
			{ strategyId }
		);
	}
	return definition.defaultProfile;
};
