// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { stripEdgePunctuation, tokenizeTranscript } from './word.js';

describe('tokenizeTranscript', () => {
  it('should return no tokens for an empty string', () => {
    expect(tokenizeTranscript('')).toEqual([]);
  });

  it('should return no tokens for whitespace only', () => {
    expect(tokenizeTranscript('  \t \n ')).toEqual([]);
  });

  it('should return no tokens for punctuation only', () => {
    expect(tokenizeTranscript('... ... ...')).toEqual([]);
    expect(tokenizeTranscript('?! , ;')).toEqual([]);
  });

  it('should lowercase and strip trailing ellipses', () => {
    expect(tokenizeTranscript('Yeah... okay... uh-huh')).toEqual(['yeah', 'okay', 'uh-huh']);
  });

  it('should strip quotes, brackets and parentheses from both edges', () => {
    expect(tokenizeTranscript('"Stop!" (please) [wait]')).toEqual(['stop', 'please', 'wait']);
  });

  it('should keep inner punctuation', () => {
    expect(tokenizeTranscript("Don't, uh-huh.")).toEqual(["don't", 'uh-huh']);
  });

  it('should split on any whitespace', () => {
    expect(tokenizeTranscript('one\tsecond\nplease')).toEqual(['one', 'second', 'please']);
  });

  it('should leave characters outside the edge set alone', () => {
    expect(tokenizeTranscript('hmm… -so-')).toEqual(['hmm…', '-so-']);
  });
});

describe('stripEdgePunctuation', () => {
  it('should strip mixed leading and trailing punctuation', () => {
    expect(stripEdgePunctuation("'(hello),'")).toBe('hello');
  });

  it('should return an empty string when nothing but punctuation is left', () => {
    expect(stripEdgePunctuation('...')).toBe('');
  });
});
