import { createLogger } from "@tickloop/core";

export const runtimeLogger = createLogger("runtime");
