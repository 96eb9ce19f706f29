import { ConfigError } from './errors.js';
import { DEFAULT_PROGRESS_PATH } from './services/progressService.js';

type Env = Record<string, string | undefined>;

export type BotConfig = {
  token: string;
  botUrl: string;
  allowedChatId: number;
  port: number;
  progressFile: string;
  reminderCron: string;
};

export function progressFile(env: Env = process.env): string {
  return env.PROGRESS_FILE || DEFAULT_PROGRESS_PATH;
}

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new ConfigError(`Missing required setting ${name}`);
  return value;
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  const allowedChatId = Number(required(env, 'ALLOWED_CHAT_ID'));
  if (!Number.isInteger(allowedChatId)) {
    throw new ConfigError('ALLOWED_CHAT_ID must be a numeric chat id');
  }

  const port = Number(env.PORT || 3000);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`PORT must be a positive integer, got "${env.PORT}"`);
  }

  return {
    token: required(env, 'TELEGRAM_TOKEN'),
    botUrl: required(env, 'BOT_URL').replace(/\/+$/, ''),
    allowedChatId,
    port,
    progressFile: progressFile(env),
    reminderCron: env.REVIEW_REMINDER_CRON || '0 9 * * *'
  };
}
