import { ProgressStorage } from '../src/services/progressService.js';

export class MemoryStorage implements ProgressStorage {
  writes = 0;

  constructor(public content: string | null = null) {}

  read(): string {
    if (this.content === null) throw new Error('ENOENT: no progress saved');
    return this.content;
  }

  write(text: string): void {
    this.writes++;
    this.content = text;
  }
}
