// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

// prettier-ignore
export const EDGE_PUNCTUATIONS = ['.', ',', '!', '?', ';', ':', '(', ')', '[', ']', '"', "'"] as const;

const EDGE_RE = /^[.,!?;:()[\]"']+|[.,!?;:()[\]"']+$/g;

/**
 * Remove {@link EDGE_PUNCTUATIONS} from both ends of a word. Inner punctuation is kept, so
 * "uh-huh" and "don't" survive intact.
 */
export const stripEdgePunctuation = (word: string): string => word.replace(EDGE_RE, '');

/**
 * Split a transcript into normalized tokens: lowercased, whitespace separated, edge punctuation
 * stripped, empty pieces dropped.
 */
export const tokenizeTranscript = (text: string): string[] => {
  const re = /\S+/g;
  const lowered = text.toLowerCase();
  const tokens: string[] = [];

  let arr;
  while ((arr = re.exec(lowered)) !== null) {
    const token = stripEdgePunctuation(arr[0]);
    if (token) {
      tokens.push(token);
    }
  }

  return tokens;
};
