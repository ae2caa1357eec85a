// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Decides, for each finalized user transcript heard while a voice agent is talking, whether the
 * agent should ignore it as a backchannel, stop talking, or respond normally.
 *
 * @packageDocumentation
 */
import * as interruption from './interruption/index.js';
import * as tokenize from './tokenize/index.js';

export * from './interruption/index.js';
export * from './log.js';
export * from './version.js';

export { interruption, tokenize };
