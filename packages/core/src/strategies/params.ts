import { ConfigurationError } from "../errors";

/**
 * Read a finite number from a raw params object, falling back when absent.
 */
export const readNumberParam = (
	raw: Record<string, unknown>,
	key: string,
	fallback: number,
	strategyId: string
): number => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigurationError(
			`${strategyId}: params.${key} must be a finite number`,
			{ strategyId, key, value }
		);
	}
	return value;
};

export const readBooleanParam = (
	raw: Record<string, unknown>,
	key: string,
	fallback: boolean,
	strategyId: string
): boolean => {
	const value = raw[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new ConfigurationError(
			`${strategyId}: params.${key} must be a boolean`,
			{ strategyId, key, value }
		);
	}
	return value;
};
