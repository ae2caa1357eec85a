// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
export { EDGE_PUNCTUATIONS, stripEdgePunctuation, tokenizeTranscript } from './word.js';
