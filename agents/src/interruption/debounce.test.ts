// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { DebounceState } from './debounce.js';

describe('DebounceState', () => {
  it('should start idle', () => {
    const state = new DebounceState();

    expect(state.lastDecisionAt).toBeUndefined();
    expect(state.isCooling(0, 150)).toBe(false);
    expect(state.statusAt(0, 150)).toEqual({ state: 'idle' });
  });

  it('should cool down for the window after a recorded decision', () => {
    const state = new DebounceState();
    state.record(1000);

    expect(state.isCooling(1000, 150)).toBe(true);
    expect(state.isCooling(1149, 150)).toBe(true);
    expect(state.isCooling(1150, 150)).toBe(false);
    expect(state.statusAt(1100, 150)).toEqual({
      state: 'cooling',
      lastDecisionAt: 1000,
      remainingMs: 50,
    });
    expect(state.statusAt(1200, 150)).toEqual({ state: 'idle' });
  });

  it('should never cool down with a zero window', () => {
    const state = new DebounceState();
    state.record(1000);

    expect(state.isCooling(1000, 0)).toBe(false);
  });

  it('should clear the slot when the agent speaking flag changes', () => {
    const state = new DebounceState();
    state.observeAgentSpeaking(true);
    state.record(1000);

    state.observeAgentSpeaking(true);
    expect(state.lastDecisionAt).toBe(1000);

    state.observeAgentSpeaking(false);
    expect(state.lastDecisionAt).toBeUndefined();
  });

  it('should not clear the slot on the first observation', () => {
    const state = new DebounceState();
    state.record(1000);
    state.observeAgentSpeaking(false);

    expect(state.lastDecisionAt).toBe(1000);
  });

  it('should clear the slot on reset', () => {
    const state = new DebounceState();
    state.record(1000);
    state.reset();

    expect(state.isCooling(1001, 150)).toBe(false);
  });

  it('should copy the slot and speaking flag into an independent state', () => {
    const state = new DebounceState();
    state.observeAgentSpeaking(true);
    state.record(1000);

    const copy = state.clone();
    copy.record(2000);
    expect(state.lastDecisionAt).toBe(1000);

    copy.observeAgentSpeaking(false);
    expect(copy.lastDecisionAt).toBeUndefined();
    expect(state.lastDecisionAt).toBe(1000);
  });
});
