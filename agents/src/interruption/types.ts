// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * What the agent runtime should do with a finalized user transcript.
 */
export enum InterruptionAction {
  /** Passive backchannel or noise: discard the transcript. */
  SWALLOW = 'swallow',
  /** The agent is silent: forward the transcript to normal response generation. */
  RESPOND = 'respond',
  /** Cancel the current agent utterance and forward the transcript. */
  INTERRUPT = 'interrupt',
}

/**
 * Outcome of classifying one transcript. `reason` is diagnostic text, not meant for branching.
 */
export interface ClassificationResult {
  readonly action: InterruptionAction;
  readonly reason: string;
}

export const createClassificationResult = (
  action: InterruptionAction,
  reason: string,
): ClassificationResult => Object.freeze({ action, reason });

/**
 * Plain-object shape of a lexicon definition, as stored in a lexicon JSON file.
 */
export interface LexiconConfig {
  ignorePhrases: string[];
  interruptPhrases: string[];
  fillerPhrases: string[];
  stopWords: string[];
  /** Window in milliseconds during which a second speaking-context decision is swallowed. */
  debounceMs: number;
}

export enum InterruptionFilterEventTypes {
  Decision = 'interruption_decision',
}

export type InterruptionDecisionEvent = {
  type: 'interruption_decision';
  transcript: string;
  agentSpeaking: boolean;
  action: InterruptionAction;
  reason: string;
  createdAt: number;
};

export const createInterruptionDecisionEvent = ({
  transcript,
  agentSpeaking,
  result,
  createdAt = Date.now(),
}: {
  transcript: string;
  agentSpeaking: boolean;
  result: ClassificationResult;
  createdAt?: number;
}): InterruptionDecisionEvent => ({
  type: 'interruption_decision',
  transcript,
  agentSpeaking,
  action: result.action,
  reason: result.reason,
  createdAt,
});
