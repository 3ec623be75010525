import {
  DaemonReadinessPoller,
  DockerRuntime,
  OrchestrationEngine,
  SessionGate,
  type AppConfig,
  type ContainerRuntime,
} from '@mcgate/core';
import { CommandRouter } from './command-router.js';
import { UserRateLimiter } from './rate-limiter.js';

/**
 * Wire the engine and its collaborators from loaded configuration.
 * The runtime defaults to Docker; tests pass a fake.
 */
export function buildRouter(
  config: AppConfig,
  runtime: ContainerRuntime = new DockerRuntime({ daemonStartCommand: config.settings.daemon.startCommand }),
): CommandRouter {
  const { server, daemon, volumes, chat } = config.settings;

  const poller = daemon.manage
    ? new DaemonReadinessPoller({
        probe: () => runtime.ping(),
        launchDaemon: () => runtime.startDaemon(),
        maxChecks: daemon.maxChecks,
        pollIntervalMs: daemon.pollIntervalSeconds * 1000,
      })
    : undefined;

  const engine = new OrchestrationEngine({
    runtime,
    gate: new SessionGate(server.restartThresholdSeconds * 1000),
    poller,
    server: {
      version: server.version,
      versionTag: config.versionTag,
      image: server.image,
      port: server.port,
      containerPort: server.containerPort,
      dataPath: server.dataPath,
    },
    volumeRoot: volumes.root,
  });

  const prefix = config.devMode ? '?' : chat.prefix;
  return new CommandRouter(engine, new UserRateLimiter(chat.userCooldownSeconds * 1000), prefix);
}
