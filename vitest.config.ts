import path from "node:path";
import { defineConfig } from "vitest/config";

const workspacePackage = (name: string): string =>
	path.resolve(__dirname, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@tickloop/core": workspacePackage("core"),
			"@tickloop/indicators": workspacePackage("indicators"),
			"@tickloop/runtime": workspacePackage("runtime"),
			"@tickloop/execution-engine": workspacePackage("execution-engine"),
			"@tickloop/exchange-ccxt": workspacePackage("exchange-ccxt"),
		},
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
	},
});
