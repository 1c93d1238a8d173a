import type {
	CciReading,
	CciTrend,
	EmaValues,
	LogLevel,
	TickAnnotations,
	TradePhase,
} from "@tickloop/core";
import type { EmaDiagnostic } from "@tickloop/indicators";
import type { PhaseTransitionEvent } from "../lifecycle/tradeLifecycle";
import type { GateBlockReason } from "../schedule/tradingWindowGate";

export type GateActionKind = "force_close" | "shutdown" | "new_orders_blocked" | "new_orders_resumed";

export interface GateActionRecord {
	instanceId: string;
	symbol: string;
	action: GateActionKind;
	at: number;
	localTime: string;
	phase: TradePhase;
	blockReason?: GateBlockReason | null;
}

export interface TickRecord {
	instanceId: string;
	symbol: string;
	at: number;
	localTime: string;
	price: number;
	cci: number | null;
	cciStatus: CciReading["status"] | "disabled";
	cciTrend: CciTrend | null;
	phase: TradePhase;
	tradingAllowed: boolean;
	annotations: TickAnnotations;
}

export interface IndicatorSnapshotRecord {
	instanceId: string;
	symbol: string;
	at: number;
	samples: number;
	lastPrice: number | null;
	emas: EmaValues;
	cci: CciReading;
	diagnostics: EmaDiagnostic[];
}

export interface DiagnosticRecord {
	instanceId: string;
	level: LogLevel;
	event: string;
	at: number;
	message?: string;
	details?: Record<string, unknown>;
}

/**
 * Where an instance reports what it does. Implementations must not throw.
 */
export interface ObservabilitySink {
	phaseTransition(event: PhaseTransitionEvent): void;
	gateAction(record: GateActionRecord): void;
	indicatorSnapshot(record: IndicatorSnapshotRecord): void;
	tickRecord(record: TickRecord): void;
	diagnostic(record: DiagnosticRecord): void;
}
