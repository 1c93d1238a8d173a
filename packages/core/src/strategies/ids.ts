export const STRATEGY_IDS = [
	"cci14_threshold",
	"cci14_compare",
	"cci14_reversal",
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const isStrategyId = (value: unknown): value is StrategyId => {
	return typeof value === "string" && STRATEGY_IDS.some((id) => id === value);
};
