// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Mutex } from '@livekit/mutex';
import type { TypedEventEmitter as TypedEmitter } from '@livekit/typed-emitter';
import EventEmitter from 'node:events';
import { log } from '../log.js';
import { classifyTranscript } from './classifier.js';
import { DebounceState } from './debounce.js';
import { type Lexicon, defaultLexicon } from './lexicon.js';
import {
  type ClassificationResult,
  InterruptionAction,
  type InterruptionDecisionEvent,
  InterruptionFilterEventTypes,
  createInterruptionDecisionEvent,
} from './types.js';

export type InterruptionFilterCallbacks = {
  [InterruptionFilterEventTypes.Decision]: (ev: InterruptionDecisionEvent) => void;
};

/**
 * Actions the agent runtime performs for each decision. All are optional.
 */
export interface InterruptionFilterHooks {
  /**
   * Cancel the current agent utterance, then handle the transcript as user input. The runtime
   * reports the end of the utterance through {@link InterruptionFilter.onAgentSpeechEnded}.
   */
  onInterrupt?: (transcript: string) => Promise<void> | void;
  /** Forward the transcript to normal response generation. */
  onRespond?: (transcript: string) => Promise<void> | void;
  /** Called for discarded transcripts. */
  onSwallow?: (transcript: string, reason: string) => Promise<void> | void;
}

export interface InterruptionFilterOptions {
  lexicon: Lexicon;
  hooks: InterruptionFilterHooks;
  /** Clock used when a caller does not pass a timestamp. */
  now: () => number;
}

/**
 * Per-session owner of the debounce state. Tracks whether the agent is speaking and routes each
 * finalized transcript to the runtime hooks.
 */
export class InterruptionFilter extends (EventEmitter as new () => TypedEmitter<InterruptionFilterCallbacks>) {
  readonly lexicon: Lexicon;

  private hooks: InterruptionFilterHooks;
  private clock: () => number;
  private debounce = new DebounceState();
  private lock = new Mutex();
  private logger = log();
  private _agentSpeaking = false;

  constructor(options: Partial<InterruptionFilterOptions> = {}) {
    super();

    const { lexicon = defaultLexicon(), hooks = {}, now = Date.now } = options;
    this.lexicon = lexicon;
    this.hooks = hooks;
    this.clock = now;

    const overlaps = lexicon.overlappingPhrases();
    if (overlaps.length > 0) {
      this.logger.warn(
        { overlaps },
        'phrases configured as both ignore and interrupt phrases, interrupt takes priority',
      );
    }
  }

  get agentSpeaking(): boolean {
    return this._agentSpeaking;
  }

  /** Agent started an interruptible utterance; a new debounce epoch begins. */
  onAgentSpeechStarted(): void {
    this.setAgentSpeaking(true);
  }

  /** Agent finished or was cut off; a new debounce epoch begins. */
  onAgentSpeechEnded(): void {
    this.setAgentSpeaking(false);
  }

  /**
   * Preview the decision {@link pushTranscript} would take right now. Runs no hook and leaves the
   * session's debounce slot untouched, so it is safe to call while transcripts are queued.
   */
  classify(transcript: string, now: number = this.clock()): ClassificationResult {
    return classifyTranscript(
      transcript,
      this._agentSpeaking,
      now,
      this.debounce.clone(),
      this.lexicon,
    );
  }

  /**
   * Classify a finalized transcript and run the matching hook. Calls are serialized per session,
   * so a transcript that arrives while an interruption is being applied is classified afterwards,
   * against the updated speaking state.
   */
  async pushTranscript(transcript: string, now?: number): Promise<ClassificationResult> {
    const unlock = await this.lock.lock();
    try {
      const agentSpeaking = this._agentSpeaking;
      const createdAt = now ?? this.clock();
      const result = classifyTranscript(
        transcript,
        agentSpeaking,
        createdAt,
        this.debounce,
        this.lexicon,
      );

      this.logger.debug(
        { transcript, agentSpeaking, action: result.action, reason: result.reason },
        'user transcript classified',
      );
      this.emit(
        InterruptionFilterEventTypes.Decision,
        createInterruptionDecisionEvent({ transcript, agentSpeaking, result, createdAt }),
      );

      try {
        await this.dispatch(transcript, result);
      } catch (error) {
        this.logger.error({ error, action: result.action }, 'interruption filter hook failed');
        throw error;
      }

      return result;
    } finally {
      unlock();
    }
  }

  private async dispatch(transcript: string, result: ClassificationResult): Promise<void> {
    switch (result.action) {
      case InterruptionAction.INTERRUPT:
        this.logger.info({ transcript, reason: result.reason }, 'agent speech interrupted by user');
        await this.hooks.onInterrupt?.(transcript);
        break;
      case InterruptionAction.RESPOND:
        await this.hooks.onRespond?.(transcript);
        break;
      case InterruptionAction.SWALLOW:
        await this.hooks.onSwallow?.(transcript, result.reason);
        break;
    }
  }

  private setAgentSpeaking(speaking: boolean): void {
    if (this._agentSpeaking === speaking) return;
    this._agentSpeaking = speaking;
    this.debounce.reset();
  }
}
