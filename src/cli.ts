#!/usr/bin/env node
import * as readline from 'readline/promises';
import { config } from 'dotenv';
import { progressFile } from './config.js';
import { loadCatalog } from './services/catalogService.js';
import { FileProgressStorage, ProgressStore } from './services/progressService.js';
import { QuizService } from './services/quizService.js';
import { TerminalQuiz } from './terminal/terminalQuiz.js';

config();

async function main() {
  const catalog = loadCatalog();
  const quiz = new QuizService(catalog, new ProgressStore(catalog, new FileProgressStorage(progressFile())));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  try {
    await new TerminalQuiz(quiz, (question) => rl.question(question)).run();
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error('❌ Quiz stopped:', err);
  process.exitCode = 1;
});
