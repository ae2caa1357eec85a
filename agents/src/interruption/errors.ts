// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Error thrown when a lexicon definition cannot be loaded or fails validation.
 */
export class LexiconConfigError extends Error {
  readonly type = 'LexiconConfigError';

  readonly issues: string[];
  readonly source?: string;

  constructor(message: string, { issues = [], source }: { issues?: string[]; source?: string } = {}) {
    super(message);
    this.name = 'LexiconConfigError';
    this.issues = issues;
    this.source = source;
    Error.captureStackTrace(this, LexiconConfigError);
  }

  toString(): string {
    const where = this.source ? ` (source=${this.source})` : '';
    const details = this.issues.length > 0 ? `: ${this.issues.join('; ')}` : '';
    return `${this.name}: ${this.message}${where}${details}`;
  }
}
