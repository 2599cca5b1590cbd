/**
 * @presign/authorization — Unit of work with an undo log.
 *
 * A commit runs in two synchronous phases:
 * 1. prepare — every step checks its preconditions; nothing is written
 * 2. apply — steps write in order; each applied step is logged
 *
 * If any apply throws, logged steps are undone in reverse order and the
 * original error is rethrown. No await happens between the first write
 * and the last, so no other operation can observe a half-applied unit.
 */

import { AuthorizationError } from "./types.js";

export interface WorkStep {
  /** Name used in rollback diagnostics */
  readonly label: string;

  /** Precondition check. Must not write. */
  prepare?(): void;

  apply(): void;

  /** Reverts `apply`. Omit only for a step that must be last. */
  undo?(): void;
}

export class UnitOfWork {
  private readonly _steps: WorkStep[] = [];
  private _committed = false;

  /**
   * Queue a step. Steps apply in the order they are added.
   */
  add(step: WorkStep): this {
    this._assertOpen();
    this._steps.push(step);
    return this;
  }

  get size(): number {
    return this._steps.length;
  }

  commit(): void {
    this._assertOpen();
    this._committed = true;

    for (const step of this._steps) {
      step.prepare?.();
    }

    const applied: WorkStep[] = [];
    try {
      for (const step of this._steps) {
        step.apply();
        applied.push(step);
      }
    } catch (err) {
      this._rollback(applied, err);
      throw err;
    }
  }

  private _rollback(applied: readonly WorkStep[], cause: unknown): void {
    const failures: unknown[] = [];
    for (const step of [...applied].reverse()) {
      try {
        step.undo?.();
      } catch (undoErr) {
        failures.push(undoErr);
      }
    }

    if (failures.length > 0) {
      const labels = applied.map((s) => s.label).join(", ");
      throw new AuthorizationError(
        "ROLLBACK_FAILED",
        `Rollback of [${labels}] failed after an apply error`,
        { cause: new AggregateError([cause, ...failures]) },
      );
    }
  }

  private _assertOpen(): void {
    if (this._committed) {
      throw new AuthorizationError("UNIT_ALREADY_COMMITTED", "Unit of work was already committed");
    }
  }
}
