import { format } from 'date-fns';
import { describeValidationError, renderDiagnostic } from '../args/diagnostic.js';
import type { Session } from '../session/session-gate.js';
import type { StartOutcome } from './orchestration-engine.js';

const pad = (n: number): string => String(n).padStart(2, '0');

/** Cooldown window as `HHh:MMm:SSs`. */
export function formatCooldown(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return `${pad(hours)}h:${pad(minutes)}m:${pad(seconds)}s`;
}

export function formatTimestamp(ms: number): string {
  return format(ms, 'yyyy-MM-dd HH:mm:ss');
}

export function rateLimitedReply(retryAfterMs: number): string {
  const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
  return `Slow down! You can use this command again in ${seconds}s.`;
}

export function formatStatus(session: Readonly<Session>, thresholdMs: number): string {
  if (!session.active) {
    return `No server session has been started yet. Cool-down window: ${formatCooldown(thresholdMs)}.`;
  }
  return (
    `A server session was started @ ${formatTimestamp(session.start)}. ` +
    `Cool-down window: ${formatCooldown(thresholdMs)}.`
  );
}

export function formatStartOutcome(outcome: StartOutcome, version: string): string {
  switch (outcome.kind) {
    case 'Started': {
      const world = outcome.fresh ? 'fresh world' : 'resumed';
      if (outcome.quiet) {
        return `Started ${outcome.instance} (${world}) on port ${outcome.hostPort}.`;
      }
      return [
        'Server session starting!',
        '```',
        'Starting a new server session...',
        `Request origin: ${outcome.requester}`,
        `Request session start @ ${formatTimestamp(outcome.startedAt)}`,
        `Request cool-down window: ${formatCooldown(outcome.thresholdMs)}`,
        `Instance: ${outcome.instance} (${world})`,
        `Port: ${outcome.hostPort}`,
        '```',
      ].join('\n');
    }
    case 'ValidationError':
      return [
        `Couldn't parse that command: ${describeValidationError(outcome.error)}`,
        '```',
        renderDiagnostic(outcome.tokens, outcome.error),
        '```',
      ].join('\n');
    case 'InvalidOption':
      return `Couldn't start the server: ${outcome.message}.`;
    case 'SessionBusy':
      return (
        'A session is already currently running! ' +
        `Sessions can be restarted once every ${formatCooldown(outcome.thresholdMs)}.`
      );
    case 'DaemonUnavailable':
      return `The container daemon did not come up after ${outcome.attempts} checks. Try again in a moment.`;
    case 'ContainerNotFound':
      return `No existing server found for version ${version}. Use \`--fresh\` to start a new world.`;
    case 'LaunchFailure':
      return (
        `Failed to launch ${outcome.instance}: ${outcome.reason}\n` +
        'The restart cooldown is still in effect.'
      );
  }
}
