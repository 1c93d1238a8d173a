import { resolveStrategyProfileName, type ExecutionMode } from "@tickloop/core";

export type ArgValue = string | boolean;

export interface ParsedArgs {
	flags: Record<string, ArgValue>;
	positionals: string[];
}

export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { flags, positionals };
};

export const getStringArg = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getListArg = (flags: Record<string, ArgValue>, key: string): string[] => {
	const raw = getStringArg(flags, key);
	if (!raw) {
		return [];
	}
	return raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
};

const isTrue = (value: ArgValue | undefined): boolean => value === true || value === "true";

export interface TraderOptions {
	help: boolean;
	/** Profile names to load; empty together with `all` means every profile. */
	profiles: string[];
	all: boolean;
	configDir?: string;
	mode?: ExecutionMode;
	alignToMinute: boolean;
}

/**
 * Profiles come from positionals, `--profile a,b` and `--strategy <id>` (its
 * default profile), in that order, without duplicates.
 */
export const resolveTraderOptions = (argv: string[]): TraderOptions => {
	const { flags, positionals } = parseCliArgs(argv);
	const strategies = getListArg(flags, "strategy").map((id) => resolveStrategyProfileName(id));
	const profiles = [...positionals, ...getListArg(flags, "profile"), ...strategies];
	const mode = getStringArg(flags, "mode");
	if (mode !== undefined && mode !== "paper" && mode !== "live") {
		throw new Error(`Invalid --mode ${mode} (expected paper or live)`);
	}
	return {
		help: isTrue(flags.help),
		profiles: [...new Set(profiles)],
		all: isTrue(flags.all),
		configDir: getStringArg(flags, "configDir"),
		mode,
		alignToMinute: isTrue(flags.align),
	};
};
