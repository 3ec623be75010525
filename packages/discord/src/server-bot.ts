/**
 * ServerBot: the discord.js client that carries chat commands to the
 * CommandRouter and posts the replies.
 *
 * Replies mention the requester. In channel mode they go to the configured
 * report channel instead of replying to the message in place.
 */

import {
  Client,
  GatewayIntentBits,
  Partials,
  Events,
  type Message,
} from 'discord.js';
import type { CommandRouter } from './command-router.js';

export interface ServerBotConfig {
  token: string;
  router: CommandRouter;
  /** Report channel; when set, replies are posted there. */
  channelId?: string;
  /** Login timeout in ms. Default: 30s */
  readyTimeoutMs?: number;
  /** Announce the startup time once connected. */
  devMode?: boolean;
}

const GENERIC_FAILURE = 'Something went wrong while handling that command. The error has been logged.';

/** Startup notice posted in dev mode; null when there is nothing to announce. */
export function readyAnnouncement(elapsedMs: number, devMode: boolean): string | null {
  if (!devMode) return null;
  return `Bot is ready after ${(elapsedMs / 1000).toFixed(2)}s`;
}

export class ServerBot {
  private client: Client;
  private botUserId: string | undefined;
  private running = false;
  private readonly createdAt = Date.now();

  constructor(private readonly config: ServerBotConfig) {
    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      partials: [
        Partials.Channel, // Required for DM events
      ],
    });

    this.setupEventHandlers();
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.running) return;

    console.log('[DiscordBot] Connecting to Discord...');

    const ready = new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(
        () => reject(new Error('Discord login timeout')),
        this.config.readyTimeoutMs ?? 30000,
      );
      this.client.once(Events.ClientReady, (readyClient) => {
        clearTimeout(timeout);
        this.botUserId = readyClient.user.id;
        console.log(`[DiscordBot] Discord connected as ${readyClient.user.tag}`);
        this.announceReady().catch((err: unknown) => {
          console.error('[DiscordBot] Failed to post ready notice:', err);
        });
        resolve();
      });
    });

    try {
      await this.client.login(this.config.token);
      await ready;
      this.running = true;
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      console.error(
        '[DiscordBot] Discord login FAILED, this usually means the bot token is invalid ' +
        `or the Message Content Intent is not enabled. Error: ${errMsg}`,
      );
      await this.client.destroy();
      throw err;
    }
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    await this.client.destroy();
    this.running = false;
    console.log('[DiscordBot] Discord disconnected');
  }

  isRunning(): boolean {
    return this.running;
  }

  private async announceReady(): Promise<void> {
    const notice = readyAnnouncement(Date.now() - this.createdAt, this.config.devMode ?? false);
    if (!notice) return;

    console.log(`[DiscordBot] ${notice}`);
    const { channelId } = this.config;
    if (!channelId) return;

    const channel = await this.client.channels.fetch(channelId);
    if (channel?.isSendable()) {
      await channel.send({ content: notice });
    }
  }

  // ─── Messages ───────────────────────────────────────────────────────────────

  private setupEventHandlers(): void {
    this.client.on(Events.MessageCreate, (message: Message) => {
      this.handleMessage(message).catch((err: unknown) => {
        console.error('[DiscordBot] Failed to deliver reply:', err);
      });
    });

    this.client.on(Events.Error, (err) => {
      console.error('[DiscordBot] Client error:', err.message);
    });
  }

  private async handleMessage(message: Message): Promise<void> {
    // Ignore own messages and other bots
    if (message.author.id === this.botUserId || message.author.bot) return;

    let reply: string | null;
    try {
      reply = await this.config.router.route({
        content: message.content,
        userId: message.author.id,
        userName: message.author.username,
        createdAt: message.createdTimestamp,
      });
    } catch (err) {
      console.error(
        `[DiscordBot] Command from ${message.author.username} (${message.author.id}) failed: ` +
        `"${message.content.slice(0, 80)}"`,
        err,
      );
      reply = GENERIC_FAILURE;
    }

    if (reply === null) return;
    await this.deliver(message, `<@${message.author.id}> ${reply}`);
  }

  private async deliver(message: Message, content: string): Promise<void> {
    const { channelId } = this.config;
    if (!channelId) {
      await message.reply({ content });
      return;
    }

    const channel = await this.client.channels.fetch(channelId);
    if (!channel?.isSendable()) {
      console.warn(`[DiscordBot] Report channel ${channelId} is not a text channel, replying in place`);
      await message.reply({ content });
      return;
    }
    await channel.send({ content });
  }
}
