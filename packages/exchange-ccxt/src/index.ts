export * from "./ccxtBroker";
