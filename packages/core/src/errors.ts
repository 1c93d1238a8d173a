export type TickloopErrorCode =
	| "configuration"
	| "invalid_sample"
	| "indicator_unavailable"
	| "order_submission"
	| "fetch_timeout";

export class TickloopError extends Error {
	constructor(
		readonly code: TickloopErrorCode,
		message: string,
		readonly details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Raised while building an instance from its configuration. These are the
 * only fatal errors: they surface before the first tick runs.
 */
export class ConfigurationError extends TickloopError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("configuration", message, details);
	}
}

export class InvalidSampleError extends TickloopError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("invalid_sample", message, details);
	}
}

export class IndicatorUnavailableError extends TickloopError {
	constructor(indicator: string, reason: string) {
		super("indicator_unavailable", `${indicator} unavailable: ${reason}`, {
			indicator,
			reason,
		});
	}
}

export class OrderSubmissionError extends TickloopError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("order_submission", message, details);
	}
}

export class FetchTimeoutError extends TickloopError {
	constructor(readonly timeoutMs: number, symbol: string) {
		super(
			"fetch_timeout",
			`Price fetch for ${symbol} did not complete within ${timeoutMs}ms`,
			{ timeoutMs, symbol }
		);
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
