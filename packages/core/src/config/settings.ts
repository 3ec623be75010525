import { z } from 'zod';
import { existsSync, readFileSync } from 'node:fs';

// ─────────────────────────────────────────────────────────────────────────────
// Settings file schema
// ─────────────────────────────────────────────────────────────────────────────

/** Dotted release, e.g. `1.19.3`. */
export const VERSION_RE = /^(\d+\.){2}\d+$/;

const ServerSettingsSchema = z.object({
  restartThresholdSeconds: z.number().int().nonnegative().default(3600),
  version: z.string().regex(VERSION_RE, 'must look like 1.19.3').default('1.19.3'),
  image: z.string().min(1).default('itzg/minecraft-server'),
  port: z.number().int().min(1).max(65535).default(25565),
  containerPort: z.number().int().min(1).max(65535).default(25565),
  dataPath: z.string().min(1).default('/data'),
});

const VolumeSettingsSchema = z.object({
  root: z.string().min(1).default('./volumes'),
});

const DaemonSettingsSchema = z.object({
  manage: z.boolean().default(true),
  maxChecks: z.number().int().positive().default(5),
  pollIntervalSeconds: z.number().nonnegative().default(2),
  startCommand: z.array(z.string().min(1)).min(1).default(['systemctl', 'start', 'docker']),
});

const ChatSettingsSchema = z.object({
  prefix: z.string().min(1).max(3).default('!'),
  userCooldownSeconds: z.number().nonnegative().default(10),
});

const SettingsSchema = z.object({
  server: ServerSettingsSchema.default({}),
  volumes: VolumeSettingsSchema.default({}),
  daemon: DaemonSettingsSchema.default({}),
  chat: ChatSettingsSchema.default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function parseSettings(raw: unknown): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid settings:\n${problems}`);
  }
  return result.data;
}

/**
 * Load settings from a JSON file. A missing file yields all defaults.
 */
export function loadSettings(path: string): Settings {
  if (!existsSync(path)) {
    console.warn(`[Config] Settings file ${path} not found, using defaults`);
    return parseSettings({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new Error(`Failed to read settings file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSettings(raw);
}

/** `1.19.3` → `1193`, the form used in container names. */
export function versionTag(version: string): string {
  if (!VERSION_RE.test(version)) {
    throw new Error(`Invalid target version "${version}"`);
  }
  return version.replace(/\./g, '');
}

// ─────────────────────────────────────────────────────────────────────────────
// Process configuration (environment + settings file)
// ─────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  settings: Settings;
  versionTag: string;
  settingsPath: string;
  discordToken?: string;
  /** Report channel used in channel mode */
  channelId?: string;
  devMode: boolean;
  /** Skip the gateway login entirely */
  clientOff: boolean;
  channelMode: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const settingsPath = env.MCGATE_SETTINGS || './bot_settings.json';
  const settings = loadSettings(settingsPath);

  const config: AppConfig = {
    settings,
    versionTag: versionTag(settings.server.version),
    settingsPath,
    discordToken: env.DISCORD_TOKEN || undefined,
    channelId: env.DISCORD_CHANNEL_ID || undefined,
    devMode: envFlag(env.MCGATE_DEV),
    clientOff: envFlag(env.MCGATE_CLIENT_OFF),
    channelMode: envFlag(env.MCGATE_CHANNEL_MODE),
  };

  if (!config.clientOff && !config.discordToken) {
    throw new Error('DISCORD_TOKEN is required unless MCGATE_CLIENT_OFF=true');
  }
  if (config.channelMode && !config.channelId) {
    throw new Error('MCGATE_CHANNEL_MODE requires DISCORD_CHANNEL_ID');
  }

  return config;
}
