import { LevelContent } from '../interfaces/content.interface.js';
import { LevelResult, ProgressRecord, ReviewResult } from '../interfaces/progress.interface.js';
import { ContentCatalog } from './catalogService.js';
import { ProgressStore, todayIso } from './progressService.js';
import { generateQuestions, generateReviewQuestions } from './questionService.js';
import { defaultRandom, RandomSource } from './random.js';
import { QuizSession } from './sessionService.js';

/**
 * Everything a front end needs: content lookup, session creation and
 * applying results to the single live progress record.
 */
export class QuizService {
  private progress: ProgressRecord;

  constructor(
    private readonly catalog: ContentCatalog,
    private readonly store: ProgressStore,
    private readonly random: RandomSource = defaultRandom
  ) {
    this.progress = store.load();
  }

  listLevels(): number {
    return this.catalog.maxLevel();
  }

  contentForLevel(level: number): LevelContent {
    return this.catalog.contentForLevel(level);
  }

  currentProgress(): ProgressRecord {
    return {
      ...this.progress,
      learnedWords: [...this.progress.learnedWords],
      scores: { ...this.progress.scores }
    };
  }

  allLevelsComplete(): boolean {
    return this.progress.currentLevel > this.catalog.maxLevel();
  }

  /** Levels at or below the frontier that can be played again. */
  playableLevels(): number[] {
    const last = Math.min(this.progress.currentLevel, this.catalog.maxLevel());
    return Array.from({ length: Math.max(last, 0) }, (_, i) => i + 1);
  }

  hasReviewMaterial(): boolean {
    return this.progress.learnedWords.length > 0;
  }

  reviewedToday(today: string = todayIso()): boolean {
    return this.progress.lastReviewDate === today;
  }

  startLevel(level: number): QuizSession {
    const { vocabulary, topics } = this.catalog.contentForLevel(level);
    return new QuizSession(generateQuestions(vocabulary, topics, this.random));
  }

  startReview(): QuizSession {
    return new QuizSession(generateReviewQuestions(this.catalog, this.progress, this.random));
  }

  finishLevel(level: number, session: QuizSession): LevelResult {
    const percent = session.percentage();
    const before = this.progress.currentLevel;

    this.progress = this.store.applyLevelResult(
      this.progress,
      level,
      percent,
      this.catalog.entriesForLevel(level)
    );
    this.store.save(this.progress);

    return {
      level,
      percent,
      passed: session.passed(),
      advanced: this.progress.currentLevel > before,
      progress: this.currentProgress()
    };
  }

  finishReview(session: QuizSession, today: string = todayIso()): ReviewResult {
    const percent = session.percentage();
    this.progress = this.store.applyReviewResult(this.progress, today);
    this.store.save(this.progress);

    return { percent, progress: this.currentProgress() };
  }
}
