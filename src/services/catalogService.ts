import vocabularyData from '../data/vocabulary.json';
import grammarData from '../data/grammar.json';
import { CatalogError } from '../errors.js';
import { GrammarQuestionSpec, GrammarTopic, LevelContent, VocabularyEntry } from '../interfaces/content.interface.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(item: Record<string, unknown>, field: string, where: string): string {
  const value = item[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new CatalogError(`${where}: "${field}" must be a non-empty string`);
  }
  return value;
}

function readLevel(item: Record<string, unknown>, where: string): number {
  const level = item.level;
  if (typeof level !== 'number' || !Number.isInteger(level) || level < 1) {
    throw new CatalogError(`${where}: level must be an integer >= 1`);
  }
  return level;
}

function parseEntry(raw: unknown, index: number): VocabularyEntry {
  const where = `vocabulary[${index}]`;
  if (!isRecord(raw)) throw new CatalogError(`${where}: expected an object`);

  return {
    level: readLevel(raw, where),
    singular: readString(raw, 'singular', where),
    article: readString(raw, 'article', where),
    plural: readString(raw, 'plural', where),
    translation: readString(raw, 'translation', where),
    explanation: readString(raw, 'explanation', where)
  };
}

function parseQuestion(raw: unknown, where: string): GrammarQuestionSpec {
  if (!isRecord(raw)) throw new CatalogError(`${where}: expected an object`);

  const options = raw.options;
  if (!Array.isArray(options) || options.length === 0 || !options.every(o => typeof o === 'string')) {
    throw new CatalogError(`${where}: options must be a non-empty list of strings`);
  }
  const optionList: string[] = options.filter((o): o is string => typeof o === 'string');
  if (new Set(optionList).size !== optionList.length) {
    throw new CatalogError(`${where}: options must not repeat`);
  }

  const answer = readString(raw, 'answer', where);
  if (!optionList.includes(answer)) {
    throw new CatalogError(`${where}: answer "${answer}" is not one of the options`);
  }

  return {
    prompt: readString(raw, 'prompt', where),
    options: optionList,
    answer,
    explanation: readString(raw, 'explanation', where)
  };
}

function parseTopic(raw: unknown, index: number): GrammarTopic {
  const where = `grammar[${index}]`;
  if (!isRecord(raw)) throw new CatalogError(`${where}: expected an object`);

  const questions = raw.questions;
  if (!Array.isArray(questions)) {
    throw new CatalogError(`${where}: questions must be a list`);
  }

  return {
    level: readLevel(raw, where),
    name: readString(raw, 'name', where),
    explanation: readString(raw, 'explanation', where),
    questions: questions.map((q, i) => parseQuestion(q, `${where}.questions[${i}]`))
  };
}

/**
 * Read-only view over the vocabulary and grammar content, keyed by the
 * level that introduces each item. Entries are identified by their
 * singular form.
 */
export class ContentCatalog {
  private readonly vocabulary: readonly VocabularyEntry[];
  private readonly grammar: readonly GrammarTopic[];
  private readonly keys: ReadonlySet<string>;

  constructor(vocabulary: VocabularyEntry[], grammar: GrammarTopic[]) {
    const keys = new Set<string>();
    for (const entry of vocabulary) {
      if (keys.has(entry.singular)) {
        throw new CatalogError(`Duplicate vocabulary entry "${entry.singular}"`);
      }
      keys.add(entry.singular);
    }

    this.vocabulary = Object.freeze([...vocabulary]);
    this.grammar = Object.freeze([...grammar]);
    this.keys = keys;
  }

  static fromJson(vocabulary: unknown, grammar: unknown): ContentCatalog {
    if (!Array.isArray(vocabulary)) throw new CatalogError('vocabulary must be a list');
    if (!Array.isArray(grammar)) throw new CatalogError('grammar must be a list');

    return new ContentCatalog(vocabulary.map(parseEntry), grammar.map(parseTopic));
  }

  topics(): GrammarTopic[] {
    return [...this.grammar];
  }

  entriesForLevel(level: number): VocabularyEntry[] {
    return this.vocabulary.filter(entry => entry.level === level);
  }

  topicsForLevel(level: number): GrammarTopic[] {
    return this.grammar.filter(topic => topic.level === level);
  }

  contentForLevel(level: number): LevelContent {
    return {
      vocabulary: this.entriesForLevel(level),
      topics: this.topicsForLevel(level)
    };
  }

  entriesByKeys(keys: Iterable<string>): VocabularyEntry[] {
    const wanted = new Set(keys);
    return this.vocabulary.filter(entry => wanted.has(entry.singular));
  }

  hasEntry(key: string): boolean {
    return this.keys.has(key);
  }

  maxLevel(): number {
    const levels = [...this.vocabulary, ...this.grammar].map(item => item.level);
    return levels.length > 0 ? Math.max(...levels) : 0;
  }
}

/**
 * Builds the catalog shipped in src/data.
 */
export function loadCatalog(): ContentCatalog {
  return ContentCatalog.fromJson(vocabularyData, grammarData);
}
