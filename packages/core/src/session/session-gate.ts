/**
 * SessionGate: sole owner of the process-wide Session record.
 *
 * The cooldown check and the write of the new start time run as one
 * critical section. Callers never see separate check/write operations, so
 * two invocations racing inside the same cooldown window cannot both be
 * admitted.
 */

export interface Session {
  active: boolean;
  /** Last admitted start, ms since epoch. */
  start: number;
}

export type Admission =
  | { kind: 'Admitted'; start: number }
  | { kind: 'Busy'; since: number; thresholdMs: number };

/**
 * Pure cooldown rule: admitted iff `now - session.start >= thresholdMs`.
 */
export function tryAdmit(session: Readonly<Session>, now: number, thresholdMs: number): Admission {
  if (now - session.start >= thresholdMs) {
    return { kind: 'Admitted', start: now };
  }
  return { kind: 'Busy', since: session.start, thresholdMs };
}

export class SessionGate {
  private session: Session = { active: false, start: 0 };
  private lock: Promise<void> = Promise.resolve();

  constructor(readonly thresholdMs: number) {
    if (!Number.isFinite(thresholdMs) || thresholdMs < 0) {
      throw new Error(`Invalid cooldown threshold: ${thresholdMs}ms`);
    }
  }

  /**
   * Run a function while holding the session lock.
   * Calls are chained; no two run concurrently.
   */
  private async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const prev = this.lock;
    let release!: () => void;
    this.lock = new Promise<void>(r => { release = r; });

    try {
      await prev;
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Admit a start request at `now` and commit the new session in the same
   * step, or report Busy and leave the session untouched.
   */
  async tryAdmitAndCommit(now: number): Promise<Admission> {
    return this.withLock(() => {
      const admission = tryAdmit(this.session, now, this.thresholdMs);
      if (admission.kind === 'Admitted') {
        this.session = { active: true, start: now };
        console.log(`[SessionGate] Session admitted at ${new Date(now).toISOString()}`);
      } else {
        console.log(
          `[SessionGate] Start rejected, last session began ${new Date(admission.since).toISOString()}, ` +
          `cooldown ${Math.round(this.thresholdMs / 1000)}s`,
        );
      }
      return admission;
    });
  }

  snapshot(): Readonly<Session> {
    return { ...this.session };
  }
}
