import { describe, it, expect, beforeEach } from 'vitest';
import { OrchestrationEngine, type EngineState, type ServerTarget } from './orchestration-engine.js';
import { SessionGate } from '../session/session-gate.js';
import { DaemonReadinessPoller } from '../daemon/readiness-poller.js';
import { err, ok } from '../types/result.js';
import type { ContainerRuntime, FreshInstanceSpec, LaunchResult } from '../container/runtime.js';
import type { VolumeSlot } from '../container/volume-provisioner.js';

class FakeRuntime implements ContainerRuntime {
  listing = '';
  pingResult = true;
  launchError: string | undefined;
  listError: Error | undefined;
  started: string[] = [];
  launched: FreshInstanceSpec[] = [];
  daemonStarts = 0;

  async listInstances(_versionTag: string): Promise<string> {
    if (this.listError) throw this.listError;
    return this.listing;
  }

  async startExisting(name: string): Promise<LaunchResult> {
    this.started.push(name);
    return this.result(name);
  }

  async launchFresh(spec: FreshInstanceSpec): Promise<LaunchResult> {
    this.launched.push(spec);
    return this.result(spec.name);
  }

  startDaemon(): void {
    this.daemonStarts++;
  }

  async ping(): Promise<boolean> {
    return this.pingResult;
  }

  private result(instance: string): LaunchResult {
    return this.launchError
      ? err({ kind: 'LaunchFailure', instance, reason: this.launchError })
      : ok({ instance, containerId: `id-${instance}` });
  }
}

const SERVER: ServerTarget = {
  version: '1.19.3',
  versionTag: '1193',
  image: 'itzg/minecraft-server',
  port: 25565,
  containerPort: 25565,
  dataPath: '/data',
};

const THRESHOLD_MS = 60_000;

describe('OrchestrationEngine', () => {
  let runtime: FakeRuntime;
  let gate: SessionGate;
  let slots: string[];
  let transitions: Array<[EngineState, EngineState]>;
  let engine: OrchestrationEngine;

  function build(maxChecks = 2): OrchestrationEngine {
    const poller = new DaemonReadinessPoller({
      probe: () => runtime.ping(),
      launchDaemon: () => runtime.startDaemon(),
      maxChecks,
      pollIntervalMs: 10,
      sleep: async () => {},
    });
    return new OrchestrationEngine({
      runtime,
      gate,
      poller,
      server: SERVER,
      volumeRoot: '/vol',
      createSlot: async (root: string): Promise<VolumeSlot> => {
        const version = slots.length + 3;
        const slot = { version, name: `tmp-mc-${version}`, path: `${root}/tmp-mc-${version}` };
        slots.push(slot.name);
        return slot;
      },
      onTransition: (_id, from, to) => transitions.push([from, to]),
    });
  }

  beforeEach(() => {
    runtime = new FakeRuntime();
    gate = new SessionGate(THRESHOLD_MS);
    slots = [];
    transitions = [];
    engine = build();
  });

  it('resumes the newest existing container', async () => {
    runtime.listing = '1193-mc-2\n1193-mc-10';

    const outcome = await engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    expect(outcome).toEqual({
      kind: 'Started',
      instance: '1193-mc-10',
      fresh: false,
      quiet: false,
      startedAt: 1_000_000,
      thresholdMs: THRESHOLD_MS,
      hostPort: 25565,
      requester: 'alice',
    });
    expect(runtime.started).toEqual(['1193-mc-10']);
    expect(runtime.launched).toEqual([]);
    expect(gate.snapshot()).toEqual({ active: true, start: 1_000_000 });
  });

  it('walks the states in order', async () => {
    runtime.listing = '1193-mc-1';
    await engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    expect(transitions).toEqual([
      ['idle', 'validating'],
      ['validating', 'gate-checking'],
      ['gate-checking', 'daemon-polling'],
      ['daemon-polling', 'locating'],
      ['locating', 'launching'],
      ['launching', 'idle'],
    ]);
  });

  it('provisions a fresh world with the requested options', async () => {
    runtime.listing = '1193-mc-2';

    const outcome = await engine.start({
      tokens: ['12345', '--fresh', '-p', '25570', '-g', '1.5', '-d', 'Hard'],
      requestedAt: 1_000_000,
      requester: 'bob',
    });

    expect(outcome).toMatchObject({ kind: 'Started', instance: '1193-mc-3', fresh: true, hostPort: 25570 });
    expect(runtime.launched).toEqual([
      {
        name: '1193-mc-3',
        image: 'itzg/minecraft-server',
        volumePath: '/vol/tmp-mc-3',
        dataPath: '/data',
        hostPort: 25570,
        containerPort: 25565,
        env: { EULA: 'TRUE', VERSION: '1.19.3', SEED: '12345', DIFFICULTY: 'hard', MEMORY: '1536M' },
        memoryBytes: 1610612736,
      },
    ]);
    expect(transitions.map(([, to]) => to)).toEqual([
      'validating',
      'gate-checking',
      'daemon-polling',
      'provisioning',
      'launching',
      'idle',
    ]);
  });

  it('numbers the first fresh instance 1', async () => {
    await engine.start({ tokens: ['--fresh', '--quiet'], requestedAt: 1_000_000, requester: 'bob' });

    expect(runtime.launched.map((s) => s.name)).toEqual(['1193-mc-1']);
    expect(runtime.launched[0].env).toEqual({ EULA: 'TRUE', VERSION: '1.19.3' });
    expect(runtime.launched[0].memoryBytes).toBeUndefined();
  });

  it('passes a 64-bit seed through exactly as typed', async () => {
    await engine.start({ tokens: ['-4172144997902289642', '--fresh'], requestedAt: 1_000_000, requester: 'bob' });

    expect(runtime.launched[0].env.SEED).toBe('-4172144997902289642');
  });

  it('rejects fresh-world options without --fresh', async () => {
    runtime.listing = '1193-mc-1';

    const outcome = await engine.start({ tokens: ['-d', 'hard', '-p', '25570'], requestedAt: 1_000_000, requester: 'bob' });

    expect(outcome).toEqual({ kind: 'InvalidOption', message: '-p only applies to fresh worlds; add --fresh' });
    expect(runtime.started).toEqual([]);
    expect(gate.snapshot().active).toBe(false);
  });

  it('does not create a volume when the instance listing fails', async () => {
    runtime.listError = new Error('socket hang up');

    await expect(
      engine.start({ tokens: ['--fresh'], requestedAt: 1_000_000, requester: 'bob' }),
    ).rejects.toThrow('socket hang up');
    expect(slots).toEqual([]);
    expect(transitions[transitions.length - 1]).toEqual(['provisioning', 'idle']);
  });

  it('reports validation errors without touching the session', async () => {
    const outcome = await engine.start({ tokens: ['--fresh!'], requestedAt: 1_000_000, requester: 'carol' });

    expect(outcome).toEqual({
      kind: 'ValidationError',
      error: { kind: 'MalformedToken', token: { text: '--fresh!', index: 0, offset: 0 } },
      tokens: ['--fresh!'],
    });
    expect(gate.snapshot()).toEqual({ active: false, start: 0 });
    expect(transitions.map(([, to]) => to)).toEqual(['validating', 'idle']);
  });

  it('rejects out-of-range options before the gate', async () => {
    const outcome = await engine.start({ tokens: ['--fresh', '-p', '70000'], requestedAt: 1_000_000, requester: 'carol' });

    expect(outcome).toEqual({ kind: 'InvalidOption', message: 'Port 70000 is outside 1-65535' });
    expect(gate.snapshot().active).toBe(false);
  });

  it('refuses a restart inside the cooldown', async () => {
    runtime.listing = '1193-mc-1';
    await engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    const outcome = await engine.start({ tokens: [], requestedAt: 1_030_000, requester: 'bob' });

    expect(outcome).toEqual({ kind: 'SessionBusy', since: 1_000_000, thresholdMs: THRESHOLD_MS });
    expect(runtime.started).toEqual(['1193-mc-1']);
  });

  it('launches once for concurrent start requests', async () => {
    runtime.listing = '1193-mc-1';

    const outcomes = await Promise.all([
      engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' }),
      engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'bob' }),
    ]);

    expect(outcomes.map((o) => o.kind).sort()).toEqual(['SessionBusy', 'Started']);
    expect(runtime.started).toEqual(['1193-mc-1']);
  });

  it('gives up when the daemon never answers, leaving the session active', async () => {
    runtime.pingResult = false;

    const outcome = await engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    expect(outcome).toEqual({ kind: 'DaemonUnavailable', attempts: 2 });
    expect(runtime.daemonStarts).toBe(1);
    expect(runtime.started).toEqual([]);
    expect(gate.snapshot()).toEqual({ active: true, start: 1_000_000 });
  });

  it('reports a missing container', async () => {
    runtime.listing = '1194-mc-3';

    const outcome = await engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    expect(outcome).toEqual({ kind: 'ContainerNotFound', version: '1.19.3' });
    expect(gate.snapshot().active).toBe(true);
  });

  it('reports a failed launch and keeps the cooldown', async () => {
    runtime.launchError = 'port is already allocated';

    const outcome = await engine.start({ tokens: ['--fresh'], requestedAt: 1_000_000, requester: 'alice' });

    expect(outcome).toEqual({ kind: 'LaunchFailure', instance: '1193-mc-1', reason: 'port is already allocated' });
    expect(gate.snapshot()).toEqual({ active: true, start: 1_000_000 });
  });

  it('rethrows unexpected faults and returns to idle', async () => {
    runtime.listError = new Error('socket hang up');

    await expect(engine.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' })).rejects.toThrow(
      'socket hang up',
    );
    expect(transitions[transitions.length - 1]).toEqual(['locating', 'idle']);
  });

  it('renders one reply per invocation', async () => {
    runtime.listing = '1193-mc-1';
    await engine.handleStart({ tokens: ['--quiet'], requestedAt: 1_000_000, requester: 'alice' });

    await expect(engine.handleStart({ tokens: [], requestedAt: 1_000_500, requester: 'bob' })).resolves.toBe(
      'A session is already currently running! Sessions can be restarted once every 00h:01m:00s.',
    );
    expect(engine.handleRateLimited(2500)).toBe('Slow down! You can use this command again in 3s.');
  });

  it('skips daemon polling when no poller is configured', async () => {
    runtime.listing = '1193-mc-1';
    runtime.pingResult = false;
    const bare = new OrchestrationEngine({ runtime, gate, server: SERVER, volumeRoot: '/vol' });

    const outcome = await bare.start({ tokens: [], requestedAt: 1_000_000, requester: 'alice' });

    expect(outcome.kind).toBe('Started');
    expect(runtime.daemonStarts).toBe(0);
  });
});
