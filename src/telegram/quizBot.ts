import type TelegramBot from 'node-telegram-bot-api';
import { InvalidChoiceError } from '../errors.js';
import { QuizService } from '../services/quizService.js';
import { QuizSession } from '../services/sessionService.js';

export type QuizChat = Pick<TelegramBot, 'sendMessage' | 'sendPoll'>;

type ActiveSession =
  | { kind: 'level'; level: number; session: QuizSession; pollId: string | null }
  | { kind: 'review'; session: QuizSession; pollId: string | null };

// Telegram rejects longer quiz explanations
const MAX_EXPLANATION_LENGTH = 200;
const MIN_POLL_OPTIONS = 2;

// Legacy Markdown reserves these characters
function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function clip(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

/**
 * Telegram front end for a single learner. Questions with two or more
 * options go out as quiz polls; anything smaller falls back to an inline
 * keyboard.
 */
export class QuizBot {
  private active: ActiveSession | null = null;

  constructor(
    private readonly chat: QuizChat,
    private readonly quiz: QuizService,
    private readonly chatId: number
  ) {}

  isActive(): boolean {
    return this.active !== null;
  }

  async sendMainMenu(): Promise<void> {
    const { currentLevel } = this.quiz.currentProgress();
    const levelLabel = this.quiz.allLevelsComplete() ? '🏁 All levels done' : `▶️ Level ${currentLevel}`;

    await this.chat.sendMessage(this.chatId, '🧭 *Main menu* – pick an action:', {
      parse_mode: 'Markdown',
      reply_markup: {
        inline_keyboard: [
          [
            { text: levelLabel, callback_data: 'start_level' },
            { text: '🔁 Daily review', callback_data: 'daily_review' }
          ],
          [
            { text: '📚 Replay a level', callback_data: 'replay_level' },
            { text: '📊 Progress', callback_data: 'show_progress' }
          ]
        ]
      }
    });
  }

  async handleCallback(data: string): Promise<void> {
    if (data === 'menu') return this.sendMainMenu();
    if (data === 'start_level') return this.startCurrentLevel();
    if (data === 'replay_level') return this.sendReplayMenu();
    if (data === 'daily_review') return this.startDailyReview(false);
    if (data === 'review_confirm') return this.startDailyReview(true);
    if (data === 'show_progress') return this.sendProgress();

    const [action, value, choice] = data.split(':');
    if (action === 'replay' && value) return this.startLevel(Number(value));
    if (action === 'answer' && value && choice) return this.answerButton(Number(value), Number(choice));
  }

  async handlePollAnswer(pollId: string, userId: number, optionIds: number[]): Promise<void> {
    if (userId !== this.chatId || !this.active || this.active.pollId !== pollId) return;
    if (optionIds.length === 0) return;
    await this.answer(optionIds[0]);
  }

  async sendDailyReminder(): Promise<void> {
    if (this.active || !this.quiz.hasReviewMaterial() || this.quiz.reviewedToday()) return;

    await this.chat.sendMessage(this.chatId, '⏰ Time for your daily review!', {
      reply_markup: {
        inline_keyboard: [[{ text: '🔁 Start review', callback_data: 'daily_review' }]]
      }
    });
  }

  private async startCurrentLevel(): Promise<void> {
    if (this.quiz.allLevelsComplete()) {
      await this.chat.sendMessage(
        this.chatId,
        '🏆 You have completed every level! Use the daily review to keep practising.'
      );
      return;
    }
    await this.startLevel(this.quiz.currentProgress().currentLevel);
  }

  private async sendReplayMenu(): Promise<void> {
    const levels = this.quiz.playableLevels();
    await this.chat.sendMessage(this.chatId, '📚 Which level do you want to play?', {
      reply_markup: {
        inline_keyboard: [levels.map(level => ({ text: `Level ${level}`, callback_data: `replay:${level}` }))]
      }
    });
  }

  private async startLevel(level: number): Promise<void> {
    if (!this.quiz.playableLevels().includes(level)) {
      await this.chat.sendMessage(this.chatId, `🔒 Level ${level} is not unlocked yet.`);
      return;
    }

    const { vocabulary, topics } = this.quiz.contentForLevel(level);
    const lines = [`📅 *Level ${level}*`];
    if (vocabulary.length > 0) {
      lines.push('', 'New words:');
      lines.push(...vocabulary.map(e =>
        escapeMarkdown(`- ${e.article} ${e.singular} (plural: die ${e.plural}) – ${e.translation}`)
      ));
    }
    for (const topic of topics) {
      lines.push('', `📝 *${escapeMarkdown(topic.name)}*`, escapeMarkdown(topic.explanation));
    }
    await this.chat.sendMessage(this.chatId, lines.join('\n'), { parse_mode: 'Markdown' });

    this.active = { kind: 'level', level, session: this.quiz.startLevel(level), pollId: null };
    await this.nextStep();
  }

  private async startDailyReview(confirmed: boolean): Promise<void> {
    if (!this.quiz.hasReviewMaterial()) {
      await this.chat.sendMessage(this.chatId, '😅 Nothing to review yet. Pass a level first.');
      return;
    }

    if (!confirmed && this.quiz.reviewedToday()) {
      await this.chat.sendMessage(this.chatId, '✅ You already reviewed today. Review again?', {
        reply_markup: {
          inline_keyboard: [[
            { text: 'Yes', callback_data: 'review_confirm' },
            { text: 'No', callback_data: 'menu' }
          ]]
        }
      });
      return;
    }

    await this.chat.sendMessage(this.chatId, '🔁 Daily review – words and grammar you already know:');
    this.active = { kind: 'review', session: this.quiz.startReview(), pollId: null };
    await this.nextStep();
  }

  private async sendProgress(): Promise<void> {
    const progress = this.quiz.currentProgress();
    const scores = Object.entries(progress.scores)
      .map(([level, percent]) => `  - Level ${level}: ${percent}%`)
      .join('\n');

    const text = [
      '📊 *Your progress:*',
      `- 🎯 Current level: ${progress.currentLevel}`,
      `- 📚 Words learned: ${progress.learnedWords.length}`,
      `- 📅 Last review: ${progress.lastReviewDate ?? 'never'}`,
      scores ? `- ✅ Scores:\n${scores}` : '- ✅ Scores: none yet'
    ].join('\n');
    await this.chat.sendMessage(this.chatId, text, { parse_mode: 'Markdown' });
  }

  /**
   * Keyboard buttons carry the index of the question they belong to; taps
   * on an older keyboard, or while a poll is pending, are dropped.
   */
  private async answerButton(questionIndex: number, choice: number): Promise<void> {
    const active = this.active;
    if (!active || active.pollId !== null) return;
    if (active.session.position().index !== questionIndex) return;
    await this.answer(choice);
  }

  private async answer(choice: number): Promise<void> {
    if (!this.active) return;

    try {
      this.active.session.submitChoice(choice);
    } catch (err) {
      if (err instanceof InvalidChoiceError) {
        await this.chat.sendMessage(this.chatId, '❓ Please pick one of the offered options.');
        return;
      }
      throw err;
    }
    await this.nextStep();
  }

  private async nextStep(): Promise<void> {
    const active = this.active;
    if (!active) return;

    const question = active.session.currentQuestion();
    if (!question) return this.finish(active);

    const { index, total } = active.session.position();
    const prompt = `❓ ${index + 1}/${total} ${question.prompt}`;

    if (question.options.length < MIN_POLL_OPTIONS) {
      active.pollId = null;
      await this.chat.sendMessage(this.chatId, prompt, {
        reply_markup: {
          inline_keyboard: [question.options.map((option, i) => ({ text: option, callback_data: `answer:${index}:${i}` }))]
        }
      });
      return;
    }

    const poll = await this.chat.sendPoll(this.chatId, prompt, question.options, {
      is_anonymous: false,
      type: 'quiz',
      correct_option_id: question.options.indexOf(question.answer),
      explanation: clip(question.explanation, MAX_EXPLANATION_LENGTH)
    });
    active.pollId = poll.poll?.id ?? null;
  }

  private async finish(active: ActiveSession): Promise<void> {
    this.active = null;

    if (active.kind === 'review') {
      const { percent } = this.quiz.finishReview(active.session);
      await this.chat.sendMessage(this.chatId, `🎉 Review complete: ${percent}% correct.\n💾 Progress saved.`);
      return this.sendMainMenu();
    }

    const result = this.quiz.finishLevel(active.level, active.session);
    const lines = [`🏁 You answered ${result.percent}% of the questions correctly.`];
    if (!result.passed) {
      lines.push('You need 80% to pass. Try the level again!');
    } else if (result.advanced && this.quiz.allLevelsComplete()) {
      lines.push('🏆 Level passed! You have completed every level.');
    } else if (result.advanced) {
      lines.push(`🔥 Level passed! Level ${result.progress.currentLevel} is unlocked.`);
    } else {
      lines.push('🔥 Level passed!');
    }
    await this.chat.sendMessage(this.chatId, lines.join('\n'));
    return this.sendMainMenu();
  }
}
