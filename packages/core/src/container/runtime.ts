import type { Result } from '../types/result.js';

export interface LaunchFailure {
  kind: 'LaunchFailure';
  instance: string;
  reason: string;
}

export interface Launched {
  instance: string;
  containerId: string;
}

export type LaunchResult = Result<Launched, LaunchFailure>;

export interface FreshInstanceSpec {
  /** Container name, `<versionTag>-mc-<n>` */
  name: string;
  image: string;
  /** Host directory bound as the server's data directory */
  volumePath: string;
  /** Mount point of the data directory inside the container */
  dataPath: string;
  hostPort: number;
  containerPort: number;
  env: Record<string, string>;
  memoryBytes?: number;
}

/**
 * What the orchestration engine needs from the container platform.
 * DockerRuntime is the production implementation; tests use an in-memory fake.
 */
export interface ContainerRuntime {
  /** Container names for the version tag, one per line. */
  listInstances(versionTag: string): Promise<string>;
  startExisting(name: string): Promise<LaunchResult>;
  launchFresh(spec: FreshInstanceSpec): Promise<LaunchResult>;
  /** Fire-and-forget daemon start. */
  startDaemon(): void;
  ping(): Promise<boolean>;
}
