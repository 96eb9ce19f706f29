import { loadBotConfig, progressFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const env = {
  TELEGRAM_TOKEN: 'test-token',
  BOT_URL: 'https://quiz.example.com/',
  ALLOWED_CHAT_ID: '4242'
};

describe('config', () => {
  it('fills in defaults for optional bot settings', () => {
    expect(loadBotConfig(env)).toEqual({
      token: 'test-token',
      botUrl: 'https://quiz.example.com',
      allowedChatId: 4242,
      port: 3000,
      progressFile: 'storage/progress.json',
      reminderCron: '0 9 * * *'
    });
  });

  it('takes overrides from the environment', () => {
    const settings = loadBotConfig({ ...env, PORT: '8080', PROGRESS_FILE: '/tmp/p.json', REVIEW_REMINDER_CRON: '0 18 * * *' });

    expect(settings.port).toBe(8080);
    expect(settings.progressFile).toBe('/tmp/p.json');
    expect(settings.reminderCron).toBe('0 18 * * *');
  });

  it('requires the bot token', () => {
    expect(() => loadBotConfig({ ...env, TELEGRAM_TOKEN: undefined })).toThrow(
      new ConfigError('Missing required setting TELEGRAM_TOKEN')
    );
  });

  it('rejects a non-numeric chat id', () => {
    expect(() => loadBotConfig({ ...env, ALLOWED_CHAT_ID: 'me' })).toThrow(ConfigError);
  });

  it('defaults the progress file for the terminal', () => {
    expect(progressFile({})).toBe('storage/progress.json');
  });
});
