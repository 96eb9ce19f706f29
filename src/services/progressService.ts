import * as fs from 'fs';
import path from 'path';
import { VocabularyEntry } from '../interfaces/content.interface.js';
import { ProgressRecord } from '../interfaces/progress.interface.js';
import { ContentCatalog } from './catalogService.js';
import { PASS_THRESHOLD } from './sessionService.js';

export const DEFAULT_PROGRESS_PATH = path.join('storage', 'progress.json');

export interface ProgressStorage {
  read(): string;
  write(text: string): void;
}

export class FileProgressStorage implements ProgressStorage {
  constructor(private readonly filePath: string = DEFAULT_PROGRESS_PATH) {}

  read(): string {
    return fs.readFileSync(this.filePath, 'utf-8');
  }

  write(text: string): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, text);
  }
}

export function defaultProgress(): ProgressRecord {
  return {
    currentLevel: 1,
    learnedWords: [],
    lastReviewDate: null,
    scores: {}
  };
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function cloneProgress(record: ProgressRecord): ProgressRecord {
  return {
    currentLevel: record.currentLevel,
    learnedWords: [...record.learnedWords],
    lastReviewDate: record.lastReviewDate,
    scores: { ...record.scores }
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isIsoDate = (value: unknown): value is string =>
  typeof value === 'string' && /^\d{4}-\d{2}-\d{2}$/.test(value);

/**
 * Keeps learner progress across runs. The whole record is rewritten on
 * every save; a missing or unreadable file means a fresh start.
 */
export class ProgressStore {
  constructor(
    private readonly catalog: ContentCatalog,
    private readonly storage: ProgressStorage
  ) {}

  private finalLevel(): number {
    return this.catalog.maxLevel() + 1;
  }

  load(): ProgressRecord {
    let data: unknown;
    try {
      data = JSON.parse(this.storage.read());
    } catch {
      return defaultProgress();
    }
    if (!isRecord(data)) return defaultProgress();

    const progress = defaultProgress();
    const { currentLevel, learnedWords, lastReviewDate, scores } = data;

    if (typeof currentLevel === 'number' && Number.isInteger(currentLevel)) {
      progress.currentLevel = Math.min(Math.max(currentLevel, 1), this.finalLevel());
    }

    if (Array.isArray(learnedWords)) {
      for (const word of learnedWords) {
        if (typeof word === 'string' && this.catalog.hasEntry(word) && !progress.learnedWords.includes(word)) {
          progress.learnedWords.push(word);
        }
      }
    }

    progress.lastReviewDate = isIsoDate(lastReviewDate) ? lastReviewDate : null;

    if (isRecord(scores)) {
      for (const [key, value] of Object.entries(scores)) {
        const level = Number(key);
        if (Number.isInteger(level) && level >= 1 && typeof value === 'number' && Number.isFinite(value)) {
          progress.scores[level] = value;
        }
      }
    }

    return progress;
  }

  save(record: ProgressRecord): void {
    try {
      this.storage.write(JSON.stringify(record, null, 2));
    } catch (err) {
      console.warn('⚠️ Failed to save progress:', err);
    }
  }

  /**
   * Records the score for a level. A passing score marks the level's words
   * as learned and, when the level was the learner's frontier, unlocks the
   * next one.
   */
  applyLevelResult(
    record: ProgressRecord,
    level: number,
    percent: number,
    entriesOfLevel: readonly VocabularyEntry[]
  ): ProgressRecord {
    const next = cloneProgress(record);
    next.scores[level] = percent;

    if (percent >= PASS_THRESHOLD) {
      for (const entry of entriesOfLevel) {
        if (!next.learnedWords.includes(entry.singular)) {
          next.learnedWords.push(entry.singular);
        }
      }
      if (record.currentLevel === level) {
        next.currentLevel = Math.min(record.currentLevel + 1, this.finalLevel());
      }
    }

    return next;
  }

  applyReviewResult(record: ProgressRecord, today: string): ProgressRecord {
    return { ...cloneProgress(record), lastReviewDate: today };
  }
}
