/**
 * CommandRouter: maps prefixed chat messages onto engine operations.
 *
 *   !start [args…]   start or resume the server
 *   !status          show the current session
 *   !help            list the start flags
 *
 * Platform-free so the routing rules can be tested without a gateway.
 */

import { START_SCHEMA, describeSchema, type OrchestrationEngine } from '@mcgate/core';
import type { UserRateLimiter } from './rate-limiter.js';

export interface ChatCommand {
  name: string;
  args: string[];
}

export interface IncomingCommand {
  content: string;
  userId: string;
  userName: string;
  /** Message creation time, ms since epoch */
  createdAt: number;
}

export type CommandEngine = Pick<OrchestrationEngine, 'handleStart' | 'handleStatus' | 'handleRateLimited'>;

const COMMANDS = new Set(['start', 'status', 'help']);

/** Split a prefixed message into command name and whitespace-separated args. */
export function parseChatCommand(content: string, prefix: string): ChatCommand | null {
  if (!content.startsWith(prefix)) return null;

  const [name, ...args] = content.slice(prefix.length).trim().split(/\s+/).filter(Boolean);
  if (!name) return null;
  return { name: name.toLowerCase(), args };
}

export function helpText(prefix: string): string {
  return [
    `\`${prefix}start [seed] [flags]\` start the server session`,
    `\`${prefix}status\` show the current session`,
    '```',
    ...describeSchema(START_SCHEMA),
    '```',
  ].join('\n');
}

export class CommandRouter {
  constructor(
    private readonly engine: CommandEngine,
    private readonly limiter: UserRateLimiter,
    private readonly prefix: string,
  ) {}

  /**
   * Returns the reply text, or null when the message is not a command this
   * bot handles.
   */
  async route(input: IncomingCommand): Promise<string | null> {
    const command = parseChatCommand(input.content, this.prefix);
    if (!command || !COMMANDS.has(command.name)) return null;

    const decision = this.limiter.hit(input.userId, input.createdAt);
    if (!decision.allowed) {
      console.log(`[CommandRouter] ${input.userName} rate limited for ${decision.retryAfterMs}ms`);
      return this.engine.handleRateLimited(decision.retryAfterMs);
    }

    switch (command.name) {
      case 'start':
        return this.engine.handleStart({
          tokens: command.args,
          requestedAt: input.createdAt,
          requester: input.userName,
        });
      case 'status':
        return this.engine.handleStatus();
      default:
        return helpText(this.prefix);
    }
  }
}
