#!/usr/bin/env node

import {
	createLogger,
	errorMessage,
	getDefaultStrategyDir,
	getWorkspaceRoot,
	listStrategies,
	listStrategyProfiles,
	loadEnvConfig,
	loadStrategyConfigs,
	type BrokerClient,
	type EnvConfig,
} from "@tickloop/core";
import { PaperAccount, PaperBroker, type PriceFeed } from "@tickloop/execution-engine";
import { CcxtBroker } from "@tickloop/exchange-ccxt";
import {
	ConsoleAllowlist,
	LoggerSink,
	createStrategyInstance,
	startStrategyLoop,
	type StrategyLoopHandle,
} from "@tickloop/runtime";
import { resolveTraderOptions } from "./cliArgs";

const logger = createLogger("trader-cli");

const PAPER_STARTING_BALANCE = 10_000;

const USAGE = `Usage:
  npm run trader -- [profile...] [options]

Options:
  --profile <a,b>     Strategy profiles under configs/strategies
  --strategy <id,..>  Load the default profile of each strategy id
  --all               Load every profile
  --mode <paper|live> Overrides EXECUTION_MODE
  --configDir <path>  Directory holding strategies/*.json
  --align             Start each loop on the next round minute
  --help              Show this message
`;

const createBroker = (env: EnvConfig, paperFeed: PriceFeed | null): BrokerClient => {
	if (paperFeed) {
		return new PaperBroker({
			feed: paperFeed,
			account: new PaperAccount(PAPER_STARTING_BALANCE),
		});
	}
	return CcxtBroker.create({
		exchangeId: env.exchangeId,
		apiKey: env.apiKey,
		secret: env.apiSecret,
		sandbox: env.sandbox,
	});
};

const main = async (): Promise<void> => {
	const options = resolveTraderOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const env = loadEnvConfig(getWorkspaceRoot());
	const strategyDir = options.configDir ?? env.configDir ?? getDefaultStrategyDir();
	const profiles = options.all ? listStrategyProfiles(strategyDir) : options.profiles;
	if (!profiles.length) {
		console.log(USAGE);
		logger.warn("cli_no_profiles", {
			strategyDir,
			available: listStrategyProfiles(strategyDir),
			strategies: listStrategies().map((manifest) => manifest.strategyId),
		});
		return;
	}

	const configs = loadStrategyConfigs(strategyDir, profiles, {
		defaultForceClose: env.defaultForceClose,
	});
	const mode = options.mode ?? env.executionMode;
	if (mode === "live" && !(env.apiKey && env.apiSecret)) {
		throw new Error("Live mode needs EXCHANGE_API_KEY and EXCHANGE_API_SECRET");
	}
	const paperFeed =
		mode === "paper"
			? CcxtBroker.create({ exchangeId: env.exchangeId, sandbox: env.sandbox })
			: null;
	const sink = new LoggerSink(new ConsoleAllowlist(env.consoleInstances));

	logger.info("cli_starting", {
		mode,
		exchangeId: env.exchangeId,
		strategyDir,
		profiles,
		instances: configs.map((config) => config.instanceId),
		consoleInstances: env.consoleInstances,
	});

	const handles: StrategyLoopHandle[] = configs.map((config) =>
		startStrategyLoop(
			createStrategyInstance({ config, broker: createBroker(env, paperFeed), sink }),
			{ alignToMinute: options.alignToMinute }
		)
	);

	const stopAll = (signal: string): void => {
		logger.info("cli_stopping", { signal });
		handles.forEach((handle) => handle.stop());
	};
	process.once("SIGINT", () => stopAll("SIGINT"));
	process.once("SIGTERM", () => stopAll("SIGTERM"));

	await Promise.all(handles.map((handle) => handle.done));
	logger.info("cli_finished", { instances: configs.length });
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
