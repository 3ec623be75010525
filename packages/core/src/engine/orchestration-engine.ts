/**
 * OrchestrationEngine: runs one `start` invocation end to end:
 *
 *   idle → validating → gate-checking → (daemon-polling)?
 *        → (locating | provisioning) → launching → idle
 *
 * Every modeled failure comes back as a StartOutcome; only unexpected faults
 * (Docker listing errors, filesystem errors) are thrown, after being logged
 * with the invocation's state.
 *
 * Admission commits the session before anything external runs. A later
 * daemon, lookup or launch failure leaves the session active.
 */

import { validate, type ParsedCommand, type ValidationError } from '../args/validator.js';
import { hasOption } from '../args/schema.js';
import { findLatest, instanceName } from '../container/locator.js';
import { createNextSlot, type VolumeSlot } from '../container/volume-provisioner.js';
import type { ContainerRuntime, LaunchResult } from '../container/runtime.js';
import type { DaemonReadinessPoller } from '../daemon/readiness-poller.js';
import type { SessionGate } from '../session/session-gate.js';
import { START_SCHEMA } from './start-command.js';
import { formatStartOutcome, formatStatus, rateLimitedReply } from './replies.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type EngineState =
  | 'idle'
  | 'validating'
  | 'gate-checking'
  | 'daemon-polling'
  | 'locating'
  | 'provisioning'
  | 'launching';

export interface ServerTarget {
  /** Dotted release, `1.19.3` */
  version: string;
  /** Dots stripped, `1193` */
  versionTag: string;
  image: string;
  port: number;
  containerPort: number;
  dataPath: string;
}

export interface StartInvocation {
  tokens: string[];
  /** When the request was made, ms since epoch */
  requestedAt: number;
  requester: string;
}

export type StartOutcome =
  | {
      kind: 'Started';
      instance: string;
      fresh: boolean;
      quiet: boolean;
      startedAt: number;
      thresholdMs: number;
      hostPort: number;
      requester: string;
    }
  | { kind: 'ValidationError'; error: ValidationError; tokens: string[] }
  | { kind: 'InvalidOption'; message: string }
  | { kind: 'SessionBusy'; since: number; thresholdMs: number }
  | { kind: 'DaemonUnavailable'; attempts: number }
  | { kind: 'ContainerNotFound'; version: string }
  | { kind: 'LaunchFailure'; instance: string; reason: string };

export interface OrchestrationEngineConfig {
  runtime: ContainerRuntime;
  gate: SessionGate;
  /** When omitted the daemon is assumed to be up. */
  poller?: DaemonReadinessPoller;
  server: ServerTarget;
  volumeRoot: string;
  /** Defaults to createNextSlot; overridable for tests. */
  createSlot?: (root: string) => Promise<VolumeSlot>;
  onTransition?: (invocationId: number, from: EngineState, to: EngineState) => void;
}

interface FreshOptions {
  hostPort: number;
  seed?: string;
  difficulty?: string;
  memoryGiB?: number;
}

const GIB = 1024 * 1024 * 1024;

const FRESH_ONLY_FLAGS = ['p', 'g', 'd'] as const;

// ─── Engine ───────────────────────────────────────────────────────────────────

export class OrchestrationEngine {
  private nextInvocationId = 1;
  private readonly createSlot: (root: string) => Promise<VolumeSlot>;

  constructor(private readonly config: OrchestrationEngineConfig) {
    this.createSlot = config.createSlot ?? createNextSlot;
  }

  /** Run a start invocation and render the single reply for it. */
  async handleStart(invocation: StartInvocation): Promise<string> {
    return formatStartOutcome(await this.start(invocation), this.config.server.version);
  }

  /** Reply for a requester the chat layer has rate limited. Never fails. */
  handleRateLimited(retryAfterMs: number): string {
    return rateLimitedReply(retryAfterMs);
  }

  handleStatus(): string {
    return formatStatus(this.config.gate.snapshot(), this.config.gate.thresholdMs);
  }

  async start(invocation: StartInvocation): Promise<StartOutcome> {
    const id = this.nextInvocationId++;
    let state: EngineState = 'idle';
    const enter = (next: EngineState): void => {
      console.debug(`[Engine] #${id} ${state} → ${next}`);
      this.config.onTransition?.(id, state, next);
      state = next;
    };

    console.log(`[Engine] #${id} start requested by ${invocation.requester}: "${invocation.tokens.join(' ')}"`);

    try {
      enter('validating');
      const validation = validate(START_SCHEMA, invocation.tokens);
      if (!validation.ok) {
        console.log(`[Engine] #${id} rejected: ${validation.error.kind}`);
        return { kind: 'ValidationError', error: validation.error, tokens: invocation.tokens };
      }
      const command = validation.value;
      const fresh = hasOption(command.options, START_SCHEMA, 'fresh');
      const quiet = hasOption(command.options, START_SCHEMA, 'quiet');

      const freshOptions = this.freshOptions(command, fresh);
      if (typeof freshOptions === 'string') {
        return { kind: 'InvalidOption', message: freshOptions };
      }

      enter('gate-checking');
      const admission = await this.config.gate.tryAdmitAndCommit(invocation.requestedAt);
      if (admission.kind === 'Busy') {
        return { kind: 'SessionBusy', since: admission.since, thresholdMs: admission.thresholdMs };
      }

      if (this.config.poller) {
        enter('daemon-polling');
        const readiness = await this.config.poller.ensureReady();
        if (readiness.kind === 'DaemonUnavailable') {
          console.error(`[Engine] #${id} daemon unavailable after ${readiness.attempts} checks`);
          return { kind: 'DaemonUnavailable', attempts: readiness.attempts };
        }
      }

      let launch: LaunchResult;
      if (fresh) {
        enter('provisioning');
        const name = await this.nextInstanceName();
        const slot = await this.createSlot(this.config.volumeRoot);
        enter('launching');
        launch = await this.launchFresh(name, slot, freshOptions);
      } else {
        enter('locating');
        const listing = await this.config.runtime.listInstances(this.config.server.versionTag);
        const latest = findLatest(listing, this.config.server.versionTag);
        if (!latest.ok) {
          console.log(`[Engine] #${id} no container for ${this.config.server.versionTag}`);
          return { kind: 'ContainerNotFound', version: this.config.server.version };
        }
        enter('launching');
        launch = await this.config.runtime.startExisting(latest.value.name);
      }

      if (!launch.ok) {
        console.error(`[Engine] #${id} launch of ${launch.error.instance} failed; session stays active`);
        return { kind: 'LaunchFailure', instance: launch.error.instance, reason: launch.error.reason };
      }

      console.log(`[Engine] #${id} ${launch.value.instance} is up`);
      return {
        kind: 'Started',
        instance: launch.value.instance,
        fresh,
        quiet,
        startedAt: admission.start,
        thresholdMs: this.config.gate.thresholdMs,
        hostPort: fresh ? freshOptions.hostPort : this.config.server.port,
        requester: invocation.requester,
      };
    } catch (e) {
      console.error(`[Engine] #${id} unexpected failure while ${state}:`, e);
      throw e;
    } finally {
      enter('idle');
    }
  }

  /**
   * Semantic checks on the valued flags. Returns a message for the user when
   * one is out of range, or is given without `--fresh`.
   */
  private freshOptions(command: ParsedCommand, fresh: boolean): FreshOptions | string {
    const { p, g, d } = command.flags;
    const options: FreshOptions = { hostPort: this.config.server.port };

    if (!fresh) {
      const stray = FRESH_ONLY_FLAGS.find((name) => command.flags[name] !== undefined);
      if (stray) return `-${stray} only applies to fresh worlds; add --fresh`;
    }

    if (typeof p === 'number') {
      if (p < 1 || p > 65535) return `Port ${p} is outside 1-65535`;
      options.hostPort = p;
    }
    if (typeof g === 'number') {
      if (g <= 0) return `Memory must be positive, got ${g} GiB`;
      options.memoryGiB = g;
    }
    if (typeof d === 'string') {
      options.difficulty = d.toLowerCase();
    }
    // Raw text: seeds are 64-bit and would lose digits as a number
    const seed = command.positionalText[0];
    if (seed !== undefined) {
      options.seed = seed;
    }
    return options;
  }

  private async nextInstanceName(): Promise<string> {
    const { versionTag } = this.config.server;
    const latest = findLatest(await this.config.runtime.listInstances(versionTag), versionTag);
    return instanceName(versionTag, latest.ok ? latest.value.subversion + 1 : 1);
  }

  private launchFresh(name: string, slot: VolumeSlot, options: FreshOptions): Promise<LaunchResult> {
    const { server } = this.config;
    const env: Record<string, string> = {
      EULA: 'TRUE',
      VERSION: server.version,
    };
    if (options.seed !== undefined) env.SEED = options.seed;
    if (options.difficulty !== undefined) env.DIFFICULTY = options.difficulty;
    if (options.memoryGiB !== undefined) env.MEMORY = `${Math.round(options.memoryGiB * 1024)}M`;

    return this.config.runtime.launchFresh({
      name,
      image: server.image,
      volumePath: slot.path,
      dataPath: server.dataPath,
      hostPort: options.hostPort,
      containerPort: server.containerPort,
      env,
      memoryBytes: options.memoryGiB !== undefined ? Math.round(options.memoryGiB * GIB) : undefined,
    });
  }
}
