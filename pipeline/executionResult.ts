import { MissingResultError } from "./errors.js";
import { resultKey, unitPath } from "./resultKeys.js";
import type { ResultField, UnitAddress, UnitFailure, UnitOutcome } from "./types.js";

export interface RecordedOutcome {
  readonly address: UnitAddress;
  readonly outcome: UnitOutcome;
}

export interface RecordedFailure {
  readonly address: UnitAddress;
  readonly failure: UnitFailure;
}

/**
 * Flat, immutable map of `<unit path>_choice` / `<unit path>_explanation`
 * values, plus the tagged outcome of every unit that was scheduled. Failed
 * units contribute an outcome but no values.
 */
export class ExecutionResult {
  private readonly values: ReadonlyMap<string, string>;
  private readonly outcomesByUnit: ReadonlyMap<string, RecordedOutcome>;

  constructor(recorded: readonly RecordedOutcome[]) {
    const values = new Map<string, string>();
    const outcomesByUnit = new Map<string, RecordedOutcome>();

    for (const entry of recorded) {
      const { address, outcome } = entry;
      if (outcomesByUnit.has(address.unitName)) {
        throw new Error(`Outcome for unit "${address.unitName}" recorded twice`);
      }
      outcomesByUnit.set(address.unitName, entry);

      if (outcome.status === "success") {
        values.set(resultKey(address, "choice"), outcome.label);
        values.set(resultKey(address, "explanation"), outcome.explanation);
      }
    }

    this.values = values;
    this.outcomesByUnit = outcomesByUnit;
    Object.freeze(this);
  }

  static empty(): ExecutionResult {
    return new ExecutionResult([]);
  }

  get size(): number {
    return this.values.size;
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  require(key: string): string {
    const value = this.values.get(key);
    if (value === undefined) {
      throw new MissingResultError(key);
    }
    return value;
  }

  read(address: UnitAddress, field: ResultField): string {
    return this.require(resultKey(address, field));
  }

  outcomeOf(unitName: string): UnitOutcome | undefined {
    return this.outcomesByUnit.get(unitName)?.outcome;
  }

  outcomeAt(path: string): UnitOutcome | undefined {
    for (const entry of this.outcomesByUnit.values()) {
      if (unitPath(entry.address) === path) return entry.outcome;
    }
    return undefined;
  }

  succeeded(): string[] {
    return [...this.outcomesByUnit.values()]
      .filter((entry) => entry.outcome.status === "success")
      .map((entry) => entry.address.unitName);
  }

  failures(): RecordedFailure[] {
    const failures: RecordedFailure[] = [];
    for (const { address, outcome } of this.outcomesByUnit.values()) {
      if (outcome.status === "failure") failures.push({ address, failure: outcome });
    }
    return failures;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
