export { PaperAccount, realizedPnl } from "./paperAccount";
export type { ClosedTrade, PaperAccountSnapshot } from "./paperAccount";
export { PaperBroker } from "./paperBroker";
export type { PaperBrokerOptions, PaperPositionSnapshot, PriceFeed } from "./paperBroker";
