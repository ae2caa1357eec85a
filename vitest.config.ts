// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // workspace packages are loaded from their sources, no build needed
    alias: [
      {
        find: /^@backchannel\/agents$/,
        replacement: fileURLToPath(new URL('./agents/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    include: ['agents/src/**/*.test.ts', 'examples/src/**/*.test.ts'],
    // it is recommended to define a name when using inline configs
    name: 'nodejs',
    environment: 'node',
    testTimeout: 10_000,
  },
});
