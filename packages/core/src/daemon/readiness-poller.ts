/**
 * DaemonReadinessPoller: makes sure the container daemon answers before a
 * launch is attempted.
 *
 * First call: fire the daemon start command once, then probe up to
 * `maxChecks` times with `pollIntervalMs` between probes. The first
 * successful probe is cached for the life of the process. Concurrent callers
 * share the poll already in flight.
 */

export type Readiness =
  | { kind: 'Ready'; attempts: number }
  | { kind: 'DaemonUnavailable'; attempts: number };

export interface DaemonReadinessPollerConfig {
  /** Returns true when the daemon answers. A throw counts as a failed probe. */
  probe: () => Promise<boolean>;
  /** Fire-and-forget daemon start. */
  launchDaemon: () => void;
  maxChecks: number;
  pollIntervalMs: number;
  /** Overridable for tests. */
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class DaemonReadinessPoller {
  private ready = false;
  private inFlight: Promise<Readiness> | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly config: DaemonReadinessPollerConfig) {
    if (!Number.isInteger(config.maxChecks) || config.maxChecks < 1) {
      throw new Error(`maxChecks must be a positive integer, got ${config.maxChecks}`);
    }
    this.sleep = config.sleep ?? sleep;
  }

  get isReady(): boolean {
    return this.ready;
  }

  async ensureReady(): Promise<Readiness> {
    if (this.ready) return { kind: 'Ready', attempts: 0 };

    if (!this.inFlight) {
      this.inFlight = this.poll().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async poll(): Promise<Readiness> {
    const { maxChecks, pollIntervalMs } = this.config;

    console.log('[DaemonPoller] Daemon not confirmed ready, starting it');
    this.config.launchDaemon();

    for (let attempt = 1; attempt <= maxChecks; attempt++) {
      if (await this.runProbe(attempt)) {
        this.ready = true;
        console.log(`[DaemonPoller] Daemon ready after ${attempt} check(s)`);
        return { kind: 'Ready', attempts: attempt };
      }
      if (attempt < maxChecks) {
        await this.sleep(pollIntervalMs);
      }
    }

    console.error(`[DaemonPoller] Daemon still unreachable after ${maxChecks} checks`);
    return { kind: 'DaemonUnavailable', attempts: maxChecks };
  }

  private async runProbe(attempt: number): Promise<boolean> {
    try {
      return await this.config.probe();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.debug(`[DaemonPoller] Check ${attempt} failed: ${message}`);
      return false;
    }
  }
}
