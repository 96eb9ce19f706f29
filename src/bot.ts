import TelegramBot from 'node-telegram-bot-api';
import express from 'express';
import bodyParser from 'body-parser';
import { config } from 'dotenv';
import cron from 'node-cron';
import { loadBotConfig } from './config.js';
import { loadCatalog } from './services/catalogService.js';
import { FileProgressStorage, ProgressStore } from './services/progressService.js';
import { QuizService } from './services/quizService.js';
import { QuizBot } from './telegram/quizBot.js';

config();

const settings = loadBotConfig();
const catalog = loadCatalog();
const quiz = new QuizService(catalog, new ProgressStore(catalog, new FileProgressStorage(settings.progressFile)));

const bot = new TelegramBot(settings.token, { webHook: true });
const quizBot = new QuizBot(bot, quiz, settings.allowedChatId);

function report(context: string) {
  return (err: unknown) => console.error(`❌ ${context}:`, err);
}

function withAuthorization(pattern: RegExp, handler: (msg: TelegramBot.Message) => Promise<void>) {
  bot.onText(pattern, (msg) => {
    const chatId = msg.chat.id;
    if (chatId !== settings.allowedChatId) {
      bot.sendMessage(chatId, '⛔ You do not have access to this bot.').catch(report('Access reply failed'));
      return;
    }
    handler(msg).catch(report(`Command ${pattern} failed`));
  });
}

withAuthorization(/\/start/, async () => {
  await bot.sendMessage(settings.allowedChatId, '👋 Willkommen! Learn German level by level.');
  await quizBot.sendMainMenu();
});

withAuthorization(/\/menu/, () => quizBot.sendMainMenu());

bot.on('callback_query', async (query) => {
  const chatId = query.message?.chat.id;
  if (chatId !== settings.allowedChatId || !query.data) return;

  try {
    await bot.answerCallbackQuery(query.id);
    await quizBot.handleCallback(query.data);
  } catch (err) {
    report(`Callback ${query.data} failed`)(err);
  }
});

bot.on('poll_answer', (answer) => {
  const userId = answer.user?.id;
  if (userId === undefined) return;
  quizBot
    .handlePollAnswer(answer.poll_id, userId, answer.option_ids)
    .catch(report('Poll answer failed'));
});

cron.schedule(settings.reminderCron, () => {
  console.log('⏰ Checking daily review reminder…');
  quizBot.sendDailyReminder().catch(report('Reminder failed'));
});

const app = express();

app.use(bodyParser.json());

app.post(`/bot${settings.token}`, (req, res) => {
  bot.processUpdate(req.body);
  res.sendStatus(200);
});

app.get('/', (_, res) => {
  res.send('Bot is up ✅');
});

app.listen(settings.port, () => {
  console.log(`🚀 Webhook server is running on port ${settings.port}`);
  bot.setWebHook(`${settings.botUrl}/bot${settings.token}`).catch(report('Webhook registration failed'));
});
