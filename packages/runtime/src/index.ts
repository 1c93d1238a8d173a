export * from "./schedule/tradingWindowGate";
export * from "./lifecycle/bracketPricing";
export * from "./lifecycle/tradeLifecycle";
export * from "./observability";
export * from "./loop/withTimeout";
export * from "./loop/tickOrchestrator";
export * from "./loop/strategyInstance";
export * from "./loop/startStrategyLoop";
export * from "./runtimeFactory";
