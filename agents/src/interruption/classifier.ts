// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { tokenizeTranscript } from '../tokenize/word.js';
import type { DebounceState } from './debounce.js';
import { type Lexicon, defaultLexicon } from './lexicon.js';
import {
  type ClassificationResult,
  InterruptionAction,
  createClassificationResult,
} from './types.js';

interface PhraseWindow {
  start: number;
  end: number;
  phrase: string;
}

/**
 * Every run of 1..maxWords adjacent tokens, ordered by start position then length.
 */
function* phraseWindows(tokens: string[], maxWords: number): Generator<PhraseWindow> {
  for (let start = 0; start < tokens.length; start++) {
    for (let size = 1; size <= maxWords && start + size <= tokens.length; size++) {
      const end = start + size;
      yield { start, end, phrase: tokens.slice(start, end).join(' ') };
    }
  }
}

const formatTokens = (tokens: Iterable<string>) => `[${[...tokens].join(', ')}]`;

/**
 * Content rules applied while the agent holds the floor. Interrupt phrases take priority, then a
 * transcript made only of ignore/filler phrases is swallowed, and anything else interrupts.
 */
export function classifySpeakingTokens(tokens: string[], lexicon: Lexicon): ClassificationResult {
  const interruptMatches = new Set<string>();
  const covered = new Array<boolean>(tokens.length).fill(false);

  for (const { start, end, phrase } of phraseWindows(tokens, lexicon.maxPhraseWords)) {
    if (lexicon.isInterruptPhrase(phrase)) {
      interruptMatches.add(phrase);
    } else if (lexicon.isAcceptable(phrase)) {
      covered.fill(true, start, end);
    }
  }

  if (interruptMatches.size > 0) {
    return createClassificationResult(
      InterruptionAction.INTERRUPT,
      `contains interrupt words: ${formatTokens(interruptMatches)}`,
    );
  }

  if (covered.every(Boolean)) {
    return createClassificationResult(
      InterruptionAction.SWALLOW,
      `only passive/filler words: ${formatTokens(tokens)}`,
    );
  }

  return createClassificationResult(
    InterruptionAction.INTERRUPT,
    `mixed content detected: ${formatTokens(tokens)}`,
  );
}

/**
 * Classify one finalized transcript segment.
 *
 * Synchronous and free of I/O. The only side effect is on `debounce`, which must belong to the
 * session the transcript came from. Calls for one session must not overlap.
 *
 * @param transcript - raw transcript text, possibly empty or punctuation only
 * @param agentSpeaking - whether the agent has an interruptible utterance in flight
 * @param now - current time in milliseconds
 * @param debounce - the session's debounce slot
 * @param lexicon - word sets to consult, the bundled lexicon by default
 */
export function classifyTranscript(
  transcript: string,
  agentSpeaking: boolean,
  now: number,
  debounce: DebounceState,
  lexicon: Lexicon = defaultLexicon(),
): ClassificationResult {
  if (typeof transcript !== 'string') {
    throw new TypeError(`transcript must be a string, got ${typeof transcript}`);
  }
  if (typeof agentSpeaking !== 'boolean') {
    throw new TypeError(`agentSpeaking must be a boolean, got ${typeof agentSpeaking}`);
  }
  if (!Number.isFinite(now)) {
    throw new TypeError(`now must be a finite timestamp, got ${now}`);
  }

  debounce.observeAgentSpeaking(agentSpeaking);

  const tokens = tokenizeTranscript(transcript).filter((tok) => !lexicon.isStopWord(tok));

  if (tokens.length === 0) {
    return createClassificationResult(InterruptionAction.SWALLOW, 'no tokens');
  }

  if (!agentSpeaking) {
    return createClassificationResult(
      InterruptionAction.RESPOND,
      'agent silent, treat as normal input',
    );
  }

  const result = classifySpeakingTokens(tokens, lexicon);

  if (debounce.isCooling(now, lexicon.debounceMs)) {
    return createClassificationResult(
      InterruptionAction.SWALLOW,
      `debounced: duplicate within ${lexicon.debounceMs}ms of prior decision`,
    );
  }
  debounce.record(now);

  return result;
}
