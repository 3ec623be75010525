export { ServerBot, readyAnnouncement, type ServerBotConfig } from './server-bot.js';
export { CommandRouter, parseChatCommand, helpText, type ChatCommand, type IncomingCommand, type CommandEngine } from './command-router.js';
export { UserRateLimiter, type RateLimitDecision } from './rate-limiter.js';
export { buildRouter } from './bootstrap.js';
