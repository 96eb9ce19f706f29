import { GrammarTopic, Question, VocabularyEntry } from '../interfaces/content.interface.js';
import { ProgressRecord } from '../interfaces/progress.interface.js';
import { ContentCatalog } from './catalogService.js';
import { defaultRandom, RandomSource, sample, shuffleArray } from './random.js';

const DISTRACTOR_COUNT = 2;

const formatTerm = (entry: VocabularyEntry) => `${entry.article} ${entry.singular}`;
const formatPlural = (entry: VocabularyEntry) => `die ${entry.plural}`;

/**
 * Builds the options for one item: the correct answer plus up to two
 * distinct distractors taken from the other entries of the pool.
 * With a small pool the question simply gets fewer options.
 */
function buildOptions(
  entry: VocabularyEntry,
  pool: readonly VocabularyEntry[],
  format: (entry: VocabularyEntry) => string,
  random: RandomSource
): { answer: string; options: string[] } {
  const answer = format(entry);
  const candidates = new Set(
    pool
      .filter(other => other.singular !== entry.singular)
      .map(format)
      .filter(option => option !== answer)
  );
  const distractors = sample([...candidates], DISTRACTOR_COUNT, random);
  return { answer, options: shuffleArray([answer, ...distractors], random) };
}

export function translationQuestion(
  entry: VocabularyEntry,
  pool: readonly VocabularyEntry[],
  random: RandomSource = defaultRandom
): Question {
  const { answer, options } = buildOptions(entry, pool, formatTerm, random);
  return {
    kind: 'translation',
    prompt: `Choose the correct German term for '${entry.translation}':`,
    options,
    answer,
    explanation: entry.explanation
  };
}

export function pluralQuestion(
  entry: VocabularyEntry,
  pool: readonly VocabularyEntry[],
  random: RandomSource = defaultRandom
): Question {
  const { answer, options } = buildOptions(entry, pool, formatPlural, random);
  return {
    kind: 'plural',
    prompt: `What is the correct plural of '${formatTerm(entry)}'?`,
    options,
    answer,
    explanation: entry.explanation
  };
}

// Authored option order is kept
export function grammarQuestions(topics: readonly GrammarTopic[]): Question[] {
  return topics.flatMap(topic =>
    topic.questions.map(q => ({
      kind: 'grammar' as const,
      prompt: q.prompt,
      options: [...q.options],
      answer: q.answer,
      explanation: q.explanation
    }))
  );
}

/**
 * Two questions (translation and plural) per vocabulary entry, followed by
 * every question of the given grammar topics, in random order.
 */
export function generateQuestions(
  vocabulary: readonly VocabularyEntry[],
  topics: readonly GrammarTopic[],
  random: RandomSource = defaultRandom
): Question[] {
  const questions: Question[] = [];

  for (const entry of vocabulary) {
    questions.push(translationQuestion(entry, vocabulary, random));
    questions.push(pluralQuestion(entry, vocabulary, random));
  }
  questions.push(...grammarQuestions(topics));

  return shuffleArray(questions, random);
}

/**
 * Review set: one question per learned word (translation or plural, evenly
 * split) plus every grammar question up to the learner's current level.
 */
export function generateReviewQuestions(
  catalog: ContentCatalog,
  progress: ProgressRecord,
  random: RandomSource = defaultRandom
): Question[] {
  const learned = catalog.entriesByKeys(progress.learnedWords);
  const topics = catalog.topics().filter(topic => topic.level <= progress.currentLevel);

  const questions = learned.map(entry =>
    random() < 0.5 ? translationQuestion(entry, learned, random) : pluralQuestion(entry, learned, random)
  );
  questions.push(...grammarQuestions(topics));

  return shuffleArray(questions, random);
}
