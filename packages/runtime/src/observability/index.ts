export * from "./types";
export * from "./consoleAllowlist";
export * from "./loggerSink";
export * from "./memorySink";
