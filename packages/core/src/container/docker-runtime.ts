import Docker from 'dockerode';
import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import { err, ok } from '../types/result.js';
import type { ContainerRuntime, FreshInstanceSpec, LaunchResult } from './runtime.js';

export interface DockerRuntimeConfig {
  /** argv used to bring the Docker daemon up, e.g. ['systemctl', 'start', 'docker'] */
  daemonStartCommand: string[];
  dockerOptions?: Docker.DockerOptions;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function statusCodeOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

export class DockerRuntime implements ContainerRuntime {
  private docker: Docker;

  constructor(private readonly config: DockerRuntimeConfig) {
    this.docker = new Docker(config.dockerOptions);
  }

  async listInstances(versionTag: string): Promise<string> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { name: [versionTag] },
    });
    // Docker reports names with a leading slash
    return containers
      .flatMap((c) => c.Names)
      .map((name) => name.replace(/^\//, ''))
      .join('\n');
  }

  async startExisting(name: string): Promise<LaunchResult> {
    try {
      const container = this.docker.getContainer(name);
      await container.start();
      console.log(`[Docker] Started existing container ${name}`);
      return ok({ instance: name, containerId: container.id });
    } catch (e) {
      // 304 Not Modified = already running
      if (statusCodeOf(e) === 304) {
        console.log(`[Docker] Container ${name} already running`);
        return ok({ instance: name, containerId: name });
      }
      console.error(`[Docker] Failed to start ${name}:`, errorMessage(e));
      return err({ kind: 'LaunchFailure', instance: name, reason: errorMessage(e) });
    }
  }

  async launchFresh(spec: FreshInstanceSpec): Promise<LaunchResult> {
    const portKey = `${spec.containerPort}/tcp`;
    const containerOpts: Docker.ContainerCreateOptions = {
      Image: spec.image,
      name: spec.name,
      Env: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
      ExposedPorts: { [portKey]: {} },
      HostConfig: {
        Binds: [`${resolve(spec.volumePath)}:${spec.dataPath}`],
        PortBindings: { [portKey]: [{ HostPort: String(spec.hostPort) }] },
        ...(spec.memoryBytes !== undefined ? { Memory: spec.memoryBytes } : {}),
      },
    };

    try {
      console.log(`[Docker] Creating ${spec.name} from ${spec.image} (port ${spec.hostPort})`);
      const container = await this.docker.createContainer(containerOpts);
      await container.start();
      console.log(`[Docker] Container ${spec.name} started (${container.id.slice(0, 12)})`);
      return ok({ instance: spec.name, containerId: container.id });
    } catch (e) {
      console.error(`[Docker] Failed to launch ${spec.name}:`, errorMessage(e));
      return err({ kind: 'LaunchFailure', instance: spec.name, reason: errorMessage(e) });
    }
  }

  startDaemon(): void {
    const [command, ...args] = this.config.daemonStartCommand;
    if (!command) {
      console.warn('[Docker] No daemon start command configured');
      return;
    }

    console.log(`[Docker] Starting daemon: ${this.config.daemonStartCommand.join(' ')}`);
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', (e) => {
      console.error('[Docker] Daemon start command failed:', e.message);
    });
    child.unref();
  }

  async ping(): Promise<boolean> {
    try {
      await this.docker.ping();
      return true;
    } catch {
      return false;
    }
  }
}
