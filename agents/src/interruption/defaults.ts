// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import lexiconData from './lexicon.json' with { type: 'json' };
import type { LexiconConfig } from './types.js';

/** Two speaking-context decisions closer than this are treated as one. */
export const MICRO_DEBOUNCE_MS: number = lexiconData.debounceMs;

/** Longest phrase window tested against adjacent tokens. */
export const MAX_PHRASE_WINDOW = 3;

export const lexiconConfigDefaults: LexiconConfig = {
  ignorePhrases: lexiconData.ignorePhrases,
  interruptPhrases: lexiconData.interruptPhrases,
  fillerPhrases: lexiconData.fillerPhrases,
  stopWords: lexiconData.stopWords,
  debounceMs: MICRO_DEBOUNCE_MS,
};
