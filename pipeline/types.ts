import type { JudgeUnit } from "./judgeUnit.js";

export type InputRecord = Readonly<Record<string, string>>;

export type ResultField = "choice" | "explanation";

export type UnitFailureKind =
  | "generation"
  | "timeout"
  | "invalid_label"
  | "invalid_output"
  | "missing_input";

export interface UnitSuccess {
  readonly status: "success";
  readonly label: string;
  readonly explanation: string;
  readonly attempts: number;
}

export interface UnitFailure {
  readonly status: "failure";
  readonly kind: UnitFailureKind;
  readonly reason: string;
  readonly attempts: number;
}

export type UnitOutcome = UnitSuccess | UnitFailure;

/**
 * What a unit may read: the original record plus the explanation of the stage
 * immediately before it. `previousExplanation` is null for the first stage and
 * when no member of the previous stage produced one.
 */
export interface StageContext {
  readonly source: InputRecord;
  readonly previousExplanation: string | null;
}

export interface UnitStage {
  readonly kind: "unit";
  readonly unit: JudgeUnit;
}

export interface LayerStage {
  readonly kind: "layer";
  readonly units: readonly JudgeUnit[];
}

export type Stage = UnitStage | LayerStage;

export interface Pipeline {
  readonly name: string;
  readonly stages: readonly Stage[];
}

export interface UnitAddress {
  readonly pipeline: string;
  readonly stageIndex: number;
  readonly inLayer: boolean;
  readonly unitKind: string;
  readonly unitName: string;
}

export interface RunOptions {
  readonly graceful?: boolean;
  readonly maxWorkers?: number;
  readonly retries?: number;
  readonly timeoutMs?: number;
  readonly runId?: string;
}

export interface UnitDiagnostic {
  readonly unitName: string;
  readonly stageIndex: number;
  readonly status: UnitOutcome["status"];
  readonly attempts: number;
  readonly durationMs: number;
  readonly failureKind?: UnitFailureKind;
  readonly failureReason?: string;
}

export interface RunDiagnostics {
  readonly runId: string;
  readonly pipeline: string;
  readonly durationMs: number;
  readonly units: readonly UnitDiagnostic[];
}
