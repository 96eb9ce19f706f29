export interface ProgressRecord {
  currentLevel: number;
  learnedWords: string[];
  lastReviewDate: string | null;
  scores: Record<number, number>;
}

export type LevelResult = {
  level: number;
  percent: number;
  passed: boolean;
  advanced: boolean;
  progress: ProgressRecord;
};

export type ReviewResult = {
  percent: number;
  progress: ProgressRecord;
};
