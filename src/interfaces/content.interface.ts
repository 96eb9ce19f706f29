export type VocabularyEntry = {
  level: number;
  singular: string;
  article: string;
  plural: string;
  translation: string;
  explanation: string;
};

export type GrammarQuestionSpec = {
  prompt: string;
  options: string[];
  answer: string;
  explanation: string;
};

export type GrammarTopic = {
  level: number;
  name: string;
  explanation: string;
  questions: GrammarQuestionSpec[];
};

export type QuestionKind = 'translation' | 'plural' | 'grammar';

export interface Question {
  kind: QuestionKind;
  prompt: string;
  options: string[];
  answer: string;
  explanation: string;
}

export type LevelContent = {
  vocabulary: VocabularyEntry[];
  topics: GrammarTopic[];
};
