import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { ProgressRecord } from '../src/interfaces/progress.interface.js';
import { loadCatalog } from '../src/services/catalogService.js';
import {
  defaultProgress,
  FileProgressStorage,
  ProgressStore,
  todayIso
} from '../src/services/progressService.js';
import { MemoryStorage } from './memoryStorage.js';

const catalog = loadCatalog();
const levelOne = catalog.entriesForLevel(1);

describe('ProgressStore.load', () => {
  it('starts fresh when nothing was saved', () => {
    expect(new ProgressStore(catalog, new MemoryStorage()).load()).toEqual({
      currentLevel: 1,
      learnedWords: [],
      lastReviewDate: null,
      scores: {}
    });
  });

  it('starts fresh when the file is corrupt', () => {
    expect(new ProgressStore(catalog, new MemoryStorage('{"currentLevel": 2,')).load()).toEqual(defaultProgress());
    expect(new ProgressStore(catalog, new MemoryStorage('[1, 2]')).load()).toEqual(defaultProgress());
  });

  it('drops unknown words, clamps the level and ignores malformed fields', () => {
    const storage = new MemoryStorage(JSON.stringify({
      currentLevel: 12,
      learnedWords: ['Lager', 'Bahnhof', 'Lager', 7],
      lastReviewDate: 'yesterday',
      scores: { 1: 90, x: 50, 2: 'high' }
    }));

    expect(new ProgressStore(catalog, storage).load()).toEqual({
      currentLevel: 4,
      learnedWords: ['Lager'],
      lastReviewDate: null,
      scores: { 1: 90 }
    });
  });

  it('round-trips a saved record', () => {
    const storage = new MemoryStorage();
    const store = new ProgressStore(catalog, storage);
    const record: ProgressRecord = {
      currentLevel: 2,
      learnedWords: ['Lager', 'Palette'],
      lastReviewDate: '2026-10-18',
      scores: { 1: 80, 2: 45 }
    };

    store.save(record);

    expect(store.load()).toEqual(record);
    expect(storage.writes).toBe(1);
  });
});

describe('ProgressStore.save', () => {
  it('warns instead of throwing when the write fails', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const storage = new MemoryStorage();
    storage.write = () => {
      throw new Error('EACCES: permission denied');
    };

    expect(() => new ProgressStore(catalog, storage).save(defaultProgress())).not.toThrow();
    expect(warn).toHaveBeenCalledWith('⚠️ Failed to save progress:', expect.any(Error));
    warn.mockRestore();
  });
});

describe('FileProgressStorage', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deutsch-quiz-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories and reads back what it wrote', () => {
    const file = path.join(dir, 'nested', 'progress.json');
    const store = new ProgressStore(catalog, new FileProgressStorage(file));
    const record = { ...defaultProgress(), learnedWords: ['Regal'], scores: { 1: 100 } };

    store.save(record);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      currentLevel: 1,
      learnedWords: ['Regal'],
      lastReviewDate: null,
      scores: { '1': 100 }
    });
    expect(store.load()).toEqual(record);
  });

  it('falls back to defaults when the file does not exist', () => {
    const store = new ProgressStore(catalog, new FileProgressStorage(path.join(dir, 'missing.json')));
    expect(store.load()).toEqual(defaultProgress());
  });
});

describe('ProgressStore.applyLevelResult', () => {
  const store = new ProgressStore(catalog, new MemoryStorage());

  it('advances the frontier level at exactly 80 percent', () => {
    const next = store.applyLevelResult(defaultProgress(), 1, 80, levelOne);

    expect(next.currentLevel).toBe(2);
    expect(next.scores).toEqual({ 1: 80 });
    expect(next.learnedWords).toEqual(['Gabelstapler', 'Lager', 'Palette', 'Lagerarbeiter', 'Regal']);
  });

  it('records but does not advance at 79 percent', () => {
    const next = store.applyLevelResult(defaultProgress(), 1, 79, levelOne);

    expect(next.currentLevel).toBe(1);
    expect(next.scores).toEqual({ 1: 79 });
    expect(next.learnedWords).toEqual([]);
  });

  it('does not advance when replaying a past level', () => {
    const record = { ...defaultProgress(), currentLevel: 3, scores: { 1: 50 } };
    const next = store.applyLevelResult(record, 1, 80, levelOne);

    expect(next.currentLevel).toBe(3);
    expect(next.scores).toEqual({ 1: 80 });
  });

  it('never duplicates learned words', () => {
    const once = store.applyLevelResult(defaultProgress(), 1, 100, levelOne);
    const twice = store.applyLevelResult(once, 1, 90, levelOne);

    expect(twice.learnedWords).toEqual(once.learnedWords);
    expect(twice.scores).toEqual({ 1: 90 });
  });

  it('stops one past the highest level', () => {
    const finished = store.applyLevelResult({ ...defaultProgress(), currentLevel: 3 }, 3, 100, []);
    expect(finished.currentLevel).toBe(4);

    const beyond = store.applyLevelResult(finished, 4, 100, []);
    expect(beyond.currentLevel).toBe(4);
  });

  it('leaves the input record untouched', () => {
    const record = defaultProgress();
    store.applyLevelResult(record, 1, 100, levelOne);

    expect(record).toEqual(defaultProgress());
  });
});

describe('ProgressStore.applyReviewResult', () => {
  it('stamps the review date', () => {
    const store = new ProgressStore(catalog, new MemoryStorage());
    const record = { ...defaultProgress(), lastReviewDate: '2026-10-17' };

    expect(store.applyReviewResult(record, '2026-10-18').lastReviewDate).toBe('2026-10-18');
    expect(record.lastReviewDate).toBe('2026-10-17');
  });
});

describe('todayIso', () => {
  it('formats the UTC calendar date', () => {
    expect(todayIso(new Date('2026-10-18T23:30:00Z'))).toBe('2026-10-18');
  });
});
