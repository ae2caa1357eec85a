// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
export { classifySpeakingTokens, classifyTranscript } from './classifier.js';
export { lexiconConfigSchema, lexiconFromConfig, loadLexiconFile } from './config.js';
export { type DebounceStatus, DebounceState } from './debounce.js';
export { MAX_PHRASE_WINDOW, MICRO_DEBOUNCE_MS, lexiconConfigDefaults } from './defaults.js';
export { LexiconConfigError } from './errors.js';
export {
  InterruptionFilter,
  type InterruptionFilterCallbacks,
  type InterruptionFilterHooks,
  type InterruptionFilterOptions,
} from './interruption_filter.js';
export { Lexicon, PhraseSet, defaultLexicon, normalizePhrase } from './lexicon.js';
export * from './types.js';
