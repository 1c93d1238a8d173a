import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

const FORBIDDEN = /@tickloop\/exchange-ccxt|from "ccxt"/;
const PACKAGES = ["runtime", "execution-engine", "indicators"];
const packageRoot = (name: string): string =>
	path.join(__dirname, "../../..", name);

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	while (stack.length) {
		const current = stack.pop();
		if (current === undefined) break;
		if (fs.statSync(current).isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (current.endsWith(".ts")) {
			results.push(current);
		}
	}
	return results;
};

const readDependencyNames = (pkgPath: string): string[] => {
	const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
	if (typeof pkg !== "object" || pkg === null) {
		return [];
	}
	const names: string[] = [];
	for (const field of ["dependencies", "devDependencies"]) {
		const deps: unknown = Reflect.get(pkg, field);
		if (typeof deps === "object" && deps !== null) {
			names.push(...Object.keys(deps));
		}
	}
	return names;
};

describe("exchange import boundaries", () => {
	it("runtime, execution-engine and indicators do not import the live broker", () => {
		const offenders: string[] = [];
		for (const name of PACKAGES) {
			const srcDir = path.join(packageRoot(name), "src");
			for (const file of walkFiles(srcDir)) {
				if (FORBIDDEN.test(fs.readFileSync(file, "utf8"))) {
					offenders.push(`${name}:${path.relative(srcDir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("their package.json files declare no exchange dependency", () => {
		const offenders = PACKAGES.filter((name) =>
			readDependencyNames(path.join(packageRoot(name), "package.json")).some(
				(dep) => dep === "ccxt" || dep === "@tickloop/exchange-ccxt"
			)
		);
		expect(offenders).toEqual([]);
	});
});
