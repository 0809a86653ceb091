import type { ProfanityClassifierPort } from '../../services/ports/profanity-classifier.port';
import wordList from '../../config/profanity-words.json';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive matching against a fixed word list.
 */
export class WordListProfanityAdapter implements ProfanityClassifierPort {
  private readonly pattern: RegExp | null;

  constructor(words: readonly string[] = wordList.words) {
    const normalized = Array.from(
      new Set(words.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0))
    );
    // Longest first so a word wins over its own prefix in the alternation
    normalized.sort((a, b) => b.length - a.length);
    this.pattern = normalized.length > 0 ? new RegExp(`\\b(${normalized.map(escapeRegExp).join('|')})\\b`, 'gi') : null;
  }

  containsProfanity(text: string): boolean {
    if (!this.pattern) return false;
    this.pattern.lastIndex = 0;
    return this.pattern.test(text);
  }

  censor(text: string): string {
    if (!this.pattern) return text;
    return text.replace(this.pattern, (match) => '*'.repeat(match.length));
  }
}

export function createWordListProfanityAdapter(words?: readonly string[]): ProfanityClassifierPort {
  return new WordListProfanityAdapter(words);
}
