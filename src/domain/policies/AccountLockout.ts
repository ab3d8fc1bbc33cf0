import { ValidationError } from "../../shared/errors";

export interface LockoutSnapshot {
  failedLoginCount: number;
  lockedUntil: Date | null;
}

export interface LockoutPolicy {
  maxAttempts: number;
  lockoutDurationMinutes: number;
}

export type LockoutState =
  | { status: "Active" }
  | { status: "Locked"; until: Date };

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicy = {
  maxAttempts: 5,
  lockoutDurationMinutes: 30,
};

/**
 * Active / Locked(until) state machine over a principal's lockout fields.
 *
 * The lock is derived: a principal is locked while `lockedUntil > now`.
 * Transitions are pure; the persistence gateway applies them atomically.
 */
export class AccountLockoutStateMachine {
  constructor(private readonly policy: LockoutPolicy = DEFAULT_LOCKOUT_POLICY) {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
      throw new ValidationError("Lockout threshold must be a positive integer");
    }
    if (
      !Number.isInteger(policy.lockoutDurationMinutes) ||
      policy.lockoutDurationMinutes < 1
    ) {
      throw new ValidationError(
        "Lockout duration must be a positive number of minutes",
      );
    }
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  get lockoutDurationMs(): number {
    return this.policy.lockoutDurationMinutes * 60_000;
  }

  stateAt(snapshot: LockoutSnapshot, now: Date): LockoutState {
    if (
      snapshot.lockedUntil !== null &&
      snapshot.lockedUntil.getTime() > now.getTime()
    ) {
      return { status: "Locked", until: snapshot.lockedUntil };
    }
    return { status: "Active" };
  }

  /**
   * Count one failed authentication. An expired lock restarts the count.
   */
  onFailure(snapshot: LockoutSnapshot, now: Date): LockoutSnapshot {
    const current = this.stateAt(snapshot, now);
    if (current.status === "Locked") {
      return {
        failedLoginCount: snapshot.failedLoginCount + 1,
        lockedUntil: current.until,
      };
    }

    const lockExpired = snapshot.lockedUntil !== null;
    const failedLoginCount = (lockExpired ? 0 : snapshot.failedLoginCount) + 1;
    if (failedLoginCount >= this.policy.maxAttempts) {
      return {
        failedLoginCount,
        lockedUntil: new Date(now.getTime() + this.lockoutDurationMs),
      };
    }
    return { failedLoginCount, lockedUntil: null };
  }

  onSuccess(): LockoutSnapshot {
    return { failedLoginCount: 0, lockedUntil: null };
  }
}
