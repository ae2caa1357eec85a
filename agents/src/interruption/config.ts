// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { MICRO_DEBOUNCE_MS, lexiconConfigDefaults } from './defaults.js';
import { LexiconConfigError } from './errors.js';
import { Lexicon } from './lexicon.js';

const phraseList = z.array(z.string().trim().min(1, 'phrases must not be empty'));

export const lexiconConfigSchema = z
  .object({
    ignorePhrases: phraseList,
    interruptPhrases: phraseList,
    fillerPhrases: phraseList,
    stopWords: phraseList,
    debounceMs: z.number().finite().nonnegative().default(MICRO_DEBOUNCE_MS),
  })
  .strict();

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );

/**
 * Validate a lexicon definition and build a {@link Lexicon}. Keys that are absent are taken from
 * the bundled lexicon.
 *
 * @throws {@link LexiconConfigError} when the definition is malformed, or when a phrase is longer
 * than the classifier's phrase window once normalized.
 */
export function lexiconFromConfig(config: unknown, source?: string): Lexicon {
  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    throw new LexiconConfigError('lexicon definition must be an object', { source });
  }

  const parsed = lexiconConfigSchema.safeParse({ ...lexiconConfigDefaults, ...config });
  if (!parsed.success) {
    throw new LexiconConfigError('invalid lexicon definition', {
      issues: formatIssues(parsed.error),
      source,
    });
  }

  try {
    return new Lexicon(parsed.data);
  } catch (error) {
    if (error instanceof LexiconConfigError) {
      throw new LexiconConfigError(error.message, { issues: error.issues, source });
    }
    throw error;
  }
}

/**
 * Read a lexicon JSON file and build a {@link Lexicon} from it.
 */
export async function loadLexiconFile(path: string): Promise<Lexicon> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new LexiconConfigError(`unable to read lexicon file: ${error}`, { source: path });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new LexiconConfigError(`lexicon file is not valid JSON: ${error}`, { source: path });
  }

  return lexiconFromConfig(data, path);
}
