// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { stripEdgePunctuation, tokenizeTranscript } from '../tokenize/word.js';
import { MAX_PHRASE_WINDOW, lexiconConfigDefaults } from './defaults.js';
import { LexiconConfigError } from './errors.js';
import type { LexiconConfig } from './types.js';

/**
 * Normalize a configured phrase the same way transcripts are tokenized, so that lookups are
 * exact string matches against joined tokens. Stop words are removed, which means
 * "just a sec" is stored as "just sec".
 */
export const normalizePhrase = (phrase: string, stopWords: ReadonlySet<string>): string =>
  tokenizeTranscript(phrase)
    .filter((tok) => !stopWords.has(tok))
    .join(' ');

/**
 * An immutable set of lowercase phrases, each one or more space-separated words.
 */
export class PhraseSet implements Iterable<string> {
  readonly #phrases: ReadonlySet<string>;
  readonly #maxWords: number;

  constructor(phrases: Iterable<string>) {
    const set = new Set<string>();
    let maxWords = 0;
    for (const phrase of phrases) {
      if (!phrase) continue;
      set.add(phrase);
      maxWords = Math.max(maxWords, phrase.split(' ').length);
    }
    this.#phrases = set;
    this.#maxWords = maxWords;
  }

  has(phrase: string): boolean {
    return this.#phrases.has(phrase);
  }

  get size(): number {
    return this.#phrases.size;
  }

  /** Number of words in the longest phrase, 0 when empty. */
  get maxWords(): number {
    return this.#maxWords;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.#phrases.values();
  }
}

/**
 * The word sets consulted by the classifier. Built once and shared read-only; there is no
 * mutation API.
 *
 * @throws {@link LexiconConfigError} when a phrase is longer than {@link MAX_PHRASE_WINDOW} words
 * once normalized.
 */
export class Lexicon {
  readonly ignorePhrases: PhraseSet;
  readonly interruptPhrases: PhraseSet;
  readonly fillerPhrases: PhraseSet;
  readonly stopWords: ReadonlySet<string>;
  readonly debounceMs: number;

  constructor(config: LexiconConfig) {
    const stopWords = new Set(
      config.stopWords.map((w) => stripEdgePunctuation(w.trim().toLowerCase())).filter(Boolean),
    );
    const normalize = (phrases: string[]) => phrases.map((p) => normalizePhrase(p, stopWords));

    this.stopWords = stopWords;
    this.ignorePhrases = new PhraseSet(normalize(config.ignorePhrases));
    this.interruptPhrases = new PhraseSet(normalize(config.interruptPhrases));
    this.fillerPhrases = new PhraseSet(normalize(config.fillerPhrases));
    this.debounceMs = config.debounceMs;

    const tooLong = [...this.ignorePhrases, ...this.interruptPhrases, ...this.fillerPhrases]
      .filter((phrase) => phrase.split(' ').length > MAX_PHRASE_WINDOW)
      .map((phrase) => `"${phrase}" has more than ${MAX_PHRASE_WINDOW} words`);
    if (tooLong.length > 0) {
      throw new LexiconConfigError('lexicon phrases exceed the phrase window', { issues: tooLong });
    }

    Object.freeze(this);
  }

  isIgnorePhrase(phrase: string): boolean {
    return this.ignorePhrases.has(phrase);
  }

  isInterruptPhrase(phrase: string): boolean {
    return this.interruptPhrases.has(phrase);
  }

  isFillerPhrase(phrase: string): boolean {
    return this.fillerPhrases.has(phrase);
  }

  isStopWord(token: string): boolean {
    return this.stopWords.has(token);
  }

  /** Ignore and filler phrases together make up what may be swallowed while the agent speaks. */
  isAcceptable(phrase: string): boolean {
    return this.isIgnorePhrase(phrase) || this.isFillerPhrase(phrase);
  }

  /** Longest phrase across all three sets, in words. Between 1 and {@link MAX_PHRASE_WINDOW}. */
  get maxPhraseWords(): number {
    return Math.max(
      1,
      this.ignorePhrases.maxWords,
      this.interruptPhrases.maxWords,
      this.fillerPhrases.maxWords,
    );
  }

  /**
   * Phrases configured as both interrupt and ignore phrases. Interrupt wins when classifying.
   */
  overlappingPhrases(): string[] {
    return [...this.interruptPhrases].filter((p) => this.ignorePhrases.has(p)).sort();
  }

  /** Snapshot of the normalized sets in lexicon file form. */
  toConfig(): LexiconConfig {
    return {
      ignorePhrases: [...this.ignorePhrases],
      interruptPhrases: [...this.interruptPhrases],
      fillerPhrases: [...this.fillerPhrases],
      stopWords: [...this.stopWords],
      debounceMs: this.debounceMs,
    };
  }
}

let _defaultLexicon: Lexicon | undefined;

/** The bundled English lexicon, created on first use. */
export const defaultLexicon = (): Lexicon => {
  if (!_defaultLexicon) {
    _defaultLexicon = new Lexicon(lexiconConfigDefaults);
  }
  return _defaultLexicon;
};
