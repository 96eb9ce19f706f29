import { InvalidChoiceError, InvalidStateError } from '../errors.js';
import { Question } from '../interfaces/content.interface.js';

export const PASS_THRESHOLD = 80;

export type SessionState =
  | { status: 'awaiting'; index: number }
  | { status: 'complete'; correct: number; total: number };

export type AnswerOutcome = {
  question: Question;
  selected: string;
  correct: boolean;
  answer: string;
  explanation: string;
};

export function scorePercentage(correct: number, total: number): number {
  if (total === 0) return 0;
  return Math.floor((100 * correct) / total);
}

/**
 * Walks one question list to completion. An empty list starts out
 * complete and scores 0%.
 */
export class QuizSession {
  private readonly items: readonly Question[];
  private state: SessionState;
  private correct = 0;

  constructor(questions: Question[]) {
    this.items = [...questions];
    this.state = this.items.length > 0
      ? { status: 'awaiting', index: 0 }
      : { status: 'complete', correct: 0, total: 0 };
  }

  getState(): SessionState {
    return { ...this.state };
  }

  isComplete(): boolean {
    return this.state.status === 'complete';
  }

  questions(): Question[] {
    return [...this.items];
  }

  position(): { index: number; total: number } {
    const index = this.state.status === 'awaiting' ? this.state.index : this.items.length;
    return { index, total: this.items.length };
  }

  currentQuestion(): Question | null {
    return this.state.status === 'awaiting' ? this.items[this.state.index] : null;
  }

  submitAnswer(selected: string): AnswerOutcome {
    if (this.state.status !== 'awaiting') {
      throw new InvalidStateError('Session is complete; no question is awaiting an answer');
    }

    const question = this.items[this.state.index];
    const isCorrect = selected === question.answer;
    if (isCorrect) this.correct++;

    const next = this.state.index + 1;
    this.state = next >= this.items.length
      ? { status: 'complete', correct: this.correct, total: this.items.length }
      : { status: 'awaiting', index: next };

    return {
      question,
      selected,
      correct: isCorrect,
      answer: question.answer,
      explanation: question.explanation
    };
  }

  /** Answers with the option at a zero-based position of the current question. */
  submitChoice(choice: number): AnswerOutcome {
    const question = this.currentQuestion();
    if (!question) {
      throw new InvalidStateError('Session is complete; no question is awaiting an answer');
    }
    if (!Number.isInteger(choice) || choice < 0 || choice >= question.options.length) {
      throw new InvalidChoiceError(choice, question.options.length);
    }
    return this.submitAnswer(question.options[choice]);
  }

  percentage(): number {
    if (this.state.status !== 'complete') {
      throw new InvalidStateError('Session is not complete yet');
    }
    return scorePercentage(this.state.correct, this.state.total);
  }

  passed(): boolean {
    return this.percentage() >= PASS_THRESHOLD;
  }
}
