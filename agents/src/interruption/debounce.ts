// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

export type DebounceStatus =
  | { state: 'idle' }
  | { state: 'cooling'; lastDecisionAt: number; remainingMs: number };

/**
 * Single-slot debounce memory for one conversation session.
 *
 * Holds the time of the last decision taken while the agent was speaking. A change of the agent
 * speaking flag starts a new epoch and clears the slot. Owned by exactly one session and never
 * shared between sessions.
 */
export class DebounceState {
  #lastDecisionAt?: number;
  #agentSpeaking?: boolean;

  get lastDecisionAt(): number | undefined {
    return this.#lastDecisionAt;
  }

  /**
   * Track the agent speaking flag; any transition clears the slot.
   */
  observeAgentSpeaking(agentSpeaking: boolean): void {
    if (this.#agentSpeaking !== undefined && this.#agentSpeaking !== agentSpeaking) {
      this.reset();
    }
    this.#agentSpeaking = agentSpeaking;
  }

  isCooling(now: number, windowMs: number): boolean {
    return this.#lastDecisionAt !== undefined && now - this.#lastDecisionAt < windowMs;
  }

  statusAt(now: number, windowMs: number): DebounceStatus {
    if (this.#lastDecisionAt === undefined || !this.isCooling(now, windowMs)) {
      return { state: 'idle' };
    }
    return {
      state: 'cooling',
      lastDecisionAt: this.#lastDecisionAt,
      remainingMs: windowMs - (now - this.#lastDecisionAt),
    };
  }

  record(now: number): void {
    this.#lastDecisionAt = now;
  }

  reset(): void {
    this.#lastDecisionAt = undefined;
  }

  /** Independent copy of the slot and the observed speaking flag. */
  clone(): DebounceState {
    const copy = new DebounceState();
    copy.#lastDecisionAt = this.#lastDecisionAt;
    copy.#agentSpeaking = this.#agentSpeaking;
    return copy;
  }
}
