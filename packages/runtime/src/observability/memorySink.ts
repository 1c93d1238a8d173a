import type { PhaseTransitionEvent } from "../lifecycle/tradeLifecycle";
import type {
	DiagnosticRecord,
	GateActionRecord,
	IndicatorSnapshotRecord,
	ObservabilitySink,
	TickRecord,
} from "./types";

export class MemorySink implements ObservabilitySink {
	readonly transitions: PhaseTransitionEvent[] = [];
	readonly gateActions: GateActionRecord[] = [];
	readonly snapshots: IndicatorSnapshotRecord[] = [];
	readonly ticks: TickRecord[] = [];
	readonly diagnostics: DiagnosticRecord[] = [];

	phaseTransition(event: PhaseTransitionEvent): void {
		this.transitions.push(event);
	}

	gateAction(record: GateActionRecord): void {
		this.gateActions.push(record);
	}

	indicatorSnapshot(record: IndicatorSnapshotRecord): void {
		this.snapshots.push(record);
	}

	tickRecord(record: TickRecord): void {
		this.ticks.push(record);
	}

	diagnostic(record: DiagnosticRecord): void {
		this.diagnostics.push(record);
	}

	/** `from->to` of every transition, in order. */
	transitionPath(): string[] {
		return this.transitions.map((event) => `${event.from}->${event.to}`);
	}
}
