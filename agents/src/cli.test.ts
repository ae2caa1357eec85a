// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createProgram, runCli } from './cli.js';
import { LexiconConfigError } from './interruption/errors.js';

const run = async (...args: string[]) => {
  const lines: string[] = [];
  const program = createProgram({ output: (line) => lines.push(line) }).exitOverride();
  await program.parseAsync(['--log-level', 'error', ...args], { from: 'user' });
  return lines;
};

describe('cli', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'backchannel-cli-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should classify a backchannel heard while the agent speaks', async () => {
    expect(await run('classify', '--speaking', 'Yeah', 'okay')).toEqual([
      'swallow\tonly passive/filler words: [yeah, okay]',
    ]);
  });

  it('should treat the agent as silent by default', async () => {
    expect(await run('classify', 'stop')).toEqual([
      'respond\tagent silent, treat as normal input',
    ]);
  });

  it('should classify with a lexicon file', async () => {
    const path = join(dir, 'halt.json');
    await writeFile(path, JSON.stringify({ interruptPhrases: ['halt'] }));

    expect(await run('--lexicon', path, 'classify', '-s', 'halt!')).toEqual([
      'interrupt\tcontains interrupt words: [halt]',
    ]);
  });

  it('should summarize a lexicon file and its overlaps', async () => {
    const path = join(dir, 'overlap.json');
    await writeFile(path, JSON.stringify({ ignorePhrases: ['yeah', 'wait'], debounceMs: 200 }));

    const [line] = await run('--lexicon', path, 'lexicon');

    expect(JSON.parse(line ?? '')).toMatchObject({
      source: path,
      ignorePhrases: 2,
      stopWords: 7,
      debounceMs: 200,
      overlaps: ['wait'],
    });
  });

  it('should reject an invalid lexicon file', async () => {
    const path = join(dir, 'invalid.json');
    await writeFile(path, JSON.stringify({ debounceMs: 'soon' }));

    await expect(run('--lexicon', path, 'lexicon')).rejects.toThrow(LexiconConfigError);
  });

  describe('runCli', () => {
    const installed = ['/usr/bin/node', '/usr/local/bin/backchannel'];

    it('should run a full argv through an installed command path', async () => {
      const lines: string[] = [];

      const code = await runCli(
        [...installed, '--log-level', 'error', 'classify', '-s', 'stop'],
        { output: (line) => lines.push(line) },
      );

      expect(code).toBe(0);
      expect(lines).toEqual(['interrupt\tcontains interrupt words: [stop]']);
    });

    it('should resolve with exit code 1 when a command fails', async () => {
      const lines: string[] = [];

      const code = await runCli(
        [...installed, '--log-level', 'fatal', '--lexicon', join(dir, 'missing.json'), 'lexicon'],
        { output: (line) => lines.push(line) },
      );

      expect(code).toBe(1);
      expect(lines).toEqual([]);
    });
  });
});
