export * from "./ema";
export * from "./sma";
export * from "./cci";
export * from "./priceHistory";
export * from "./indicatorEngine";
