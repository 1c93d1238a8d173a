import { createLogger, type LogLevel, type ModuleLogger } from "@tickloop/core";
import type { PhaseTransitionEvent } from "../lifecycle/tradeLifecycle";
import { ConsoleAllowlist } from "./consoleAllowlist";
import type {
	DiagnosticRecord,
	GateActionRecord,
	IndicatorSnapshotRecord,
	ObservabilitySink,
	TickRecord,
} from "./types";

const ALWAYS_SURFACED: ReadonlySet<LogLevel> = new Set(["warn", "error"]);

/**
 * Writes every record through the structured logger. Routine lines are
 * limited to allowlisted instances; warnings and errors always go out.
 */
export class LoggerSink implements ObservabilitySink {
	constructor(
		private readonly allowlist: ConsoleAllowlist = new ConsoleAllowlist(),
		private readonly logger: ModuleLogger = createLogger("runtime")
	) {}

	phaseTransition(event: PhaseTransitionEvent): void {
		this.emit("info", event.instanceId, "phase_transition", { ...event });
	}

	gateAction(record: GateActionRecord): void {
		this.emit("info", record.instanceId, "gate_action", { ...record });
	}

	indicatorSnapshot(record: IndicatorSnapshotRecord): void {
		this.emit("info", record.instanceId, "indicator_snapshot", {
			...record,
			multi: record.emas.multi,
		});
	}

	tickRecord(record: TickRecord): void {
		this.emit("info", record.instanceId, "tick_record", { ...record });
	}

	diagnostic(record: DiagnosticRecord): void {
		const { level, event, ...rest } = record;
		this.emit(level, record.instanceId, event, { ...rest });
	}

	private emit(
		level: LogLevel,
		instanceId: string,
		event: string,
		data: Record<string, unknown>
	): void {
		if (!ALWAYS_SURFACED.has(level) && !this.allowlist.allows(instanceId)) {
			return;
		}
		this.logger.log(level, event, data);
	}
}
