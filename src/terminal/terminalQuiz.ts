import { QuizService } from '../services/quizService.js';
import { QuizSession } from '../services/sessionService.js';

export type Prompt = (question: string) => Promise<string>;
export type Print = (line: string) => void;

/**
 * Text front end: a menu loop over numbered choices. Anything that is not
 * a valid number is asked again.
 */
export class TerminalQuiz {
  constructor(
    private readonly quiz: QuizService,
    private readonly ask: Prompt,
    private readonly print: Print = console.log
  ) {}

  async askChoice(count: number): Promise<number> {
    for (;;) {
      const raw = (await this.ask('Select an option: ')).trim();
      const choice = Number(raw);
      if (/^\d+$/.test(raw) && choice >= 1 && choice <= count) return choice;
      this.print(`Enter a number between 1 and ${count}.`);
    }
  }

  async run(): Promise<void> {
    for (;;) {
      const { currentLevel } = this.quiz.currentProgress();
      this.print('');
      this.print('=== Deutsch-Quiz ===');
      this.print(`Current level: ${currentLevel}`);
      this.print('1. Start level');
      this.print('2. Replay a level');
      this.print('3. Daily review');
      this.print('4. Show progress');
      this.print('5. Exit');

      const choice = await this.askChoice(5);
      if (choice === 1) await this.playCurrentLevel();
      else if (choice === 2) await this.replayLevel();
      else if (choice === 3) await this.dailyReview();
      else if (choice === 4) this.showProgress();
      else {
        this.print('Auf Wiedersehen!');
        return;
      }
    }
  }

  async playCurrentLevel(): Promise<void> {
    if (this.quiz.allLevelsComplete()) {
      this.print('You have completed every level! Use the daily review to keep practising.');
      return;
    }
    await this.playLevel(this.quiz.currentProgress().currentLevel);
  }

  async replayLevel(): Promise<void> {
    const levels = this.quiz.playableLevels();
    if (levels.length === 0) {
      this.print('No levels available.');
      return;
    }
    levels.forEach((level, i) => this.print(`${i + 1}. Level ${level}`));
    const choice = await this.askChoice(levels.length);
    await this.playLevel(levels[choice - 1]);
  }

  async playLevel(level: number): Promise<void> {
    this.print('');
    this.print(`*** Level ${level} ***`);

    const { vocabulary, topics } = this.quiz.contentForLevel(level);
    if (vocabulary.length > 0) {
      this.print('New words in this level:');
      for (const e of vocabulary) {
        this.print(`- ${e.article} ${e.singular} (plural: ${e.plural}) – ${e.translation}`);
      }
    }
    for (const topic of topics) {
      this.print('');
      this.print(`Rule: ${topic.name}`);
      this.print(topic.explanation);
    }
    await this.ask('\nPress ENTER to start the exercises...');

    const session = this.quiz.startLevel(level);
    await this.runSession(session);

    const result = this.quiz.finishLevel(level, session);
    this.print('');
    this.print(`You answered ${result.percent}% of the questions correctly.`);
    this.print(result.passed
      ? 'Well done! You passed the level.'
      : 'You need 80% correct answers to pass. Try the level again.');
  }

  async dailyReview(): Promise<void> {
    if (!this.quiz.hasReviewMaterial()) {
      this.print('Nothing to review yet. Pass at least one level first.');
      return;
    }
    if (this.quiz.reviewedToday()) {
      const again = await this.ask('You already reviewed today. Review again? (y/n): ');
      if (again.trim().toLowerCase() !== 'y') return;
    }

    this.print('');
    this.print('*** Review ***');
    const session = this.quiz.startReview();
    await this.runSession(session);

    const { percent } = this.quiz.finishReview(session);
    this.print('');
    this.print(`Review complete: ${percent}% correct.`);
  }

  showProgress(): void {
    const progress = this.quiz.currentProgress();
    this.print(`Current level: ${progress.currentLevel}`);
    this.print(`Words learned: ${progress.learnedWords.length}`);
    this.print(`Last review: ${progress.lastReviewDate ?? 'never'}`);
    for (const [level, percent] of Object.entries(progress.scores)) {
      this.print(`Level ${level}: ${percent}%`);
    }
  }

  private async runSession(session: QuizSession): Promise<void> {
    for (let question = session.currentQuestion(); question; question = session.currentQuestion()) {
      const { index, total } = session.position();
      this.print('');
      this.print(`Question ${index + 1}/${total}`);
      this.print(question.prompt);
      question.options.forEach((option, i) => this.print(`  ${i + 1}. ${option}`));

      const choice = await this.askChoice(question.options.length);
      const outcome = session.submitChoice(choice - 1);
      this.print(outcome.correct ? '✔️  Correct!' : `❌  Wrong. The correct answer was: ${outcome.answer}`);
      this.print(`Explanation: ${outcome.explanation}`);
    }
  }
}
