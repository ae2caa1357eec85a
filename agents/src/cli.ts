// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Command, Option } from 'commander';
import { classifyTranscript } from './interruption/classifier.js';
import { loadLexiconFile } from './interruption/config.js';
import { DebounceState } from './interruption/debounce.js';
import { type Lexicon, defaultLexicon } from './interruption/lexicon.js';
import { initializeLogger, isLoggerInitialized, log } from './log.js';
import { version } from './version.js';

type CliOptions = {
  logLevel: string;
  lexicon?: string;
};

type ProgramOptions = {
  /** Sink for command results, one line per call. */
  output: (line: string) => void;
};

const resolveLexicon = async (path?: string): Promise<Lexicon> =>
  path ? loadLexiconFile(path) : defaultLexicon();

/**
 * Build the `backchannel` command line program.
 *
 * @example
 * ```
 * await createProgram().parseAsync(['classify', '--speaking', 'uh-huh'], { from: 'user' });
 * ```
 */
export const createProgram = ({
  output = (line) => process.stdout.write(`${line}\n`),
}: Partial<ProgramOptions> = {}) => {
  const program = new Command()
    .name('backchannel')
    .description('Classify user transcripts heard while a voice agent is speaking')
    .version(version)
    .addOption(
      new Option('--log-level <level>', 'Set the logging level')
        .choices(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
        .default('info')
        .env('LOG_LEVEL'),
    )
    .addOption(new Option('--lexicon <path>', 'Lexicon JSON file').env('LEXICON_PATH'))
    .hook('preAction', (thisCommand) => {
      const { logLevel } = thisCommand.opts<CliOptions>();
      initializeLogger({ pretty: process.stdout.isTTY === true, level: logLevel });
    });

  program
    .command('classify')
    .description('Classify one transcript')
    .argument('<words...>', 'Transcript text')
    .option('-s, --speaking', 'The agent is currently speaking', false)
    .action(async (words: string[], opts: { speaking: boolean }) => {
      const { lexicon: lexiconPath } = program.opts<CliOptions>();
      const lexicon = await resolveLexicon(lexiconPath);
      const transcript = words.join(' ');
      const result = classifyTranscript(
        transcript,
        opts.speaking,
        Date.now(),
        new DebounceState(),
        lexicon,
      );
      log().debug({ transcript, agentSpeaking: opts.speaking, ...result }, 'transcript classified');
      output(`${result.action}\t${result.reason}`);
    });

  program
    .command('lexicon')
    .description('Validate a lexicon and print a summary')
    .action(async () => {
      const { lexicon: lexiconPath } = program.opts<CliOptions>();
      const lexicon = await resolveLexicon(lexiconPath);
      const overlaps = lexicon.overlappingPhrases();
      if (overlaps.length > 0) {
        log().warn({ overlaps }, 'phrases in both ignore and interrupt sets, interrupt wins');
      }
      output(
        JSON.stringify({
          source: lexiconPath ?? 'bundled',
          ignorePhrases: lexicon.ignorePhrases.size,
          interruptPhrases: lexicon.interruptPhrases.size,
          fillerPhrases: lexicon.fillerPhrases.size,
          stopWords: lexicon.stopWords.size,
          debounceMs: lexicon.debounceMs,
          overlaps,
        }),
      );
    });

  return program;
};

/**
 * Run the program against a full `process.argv` style vector and resolve with the exit code.
 * Failures are logged rather than thrown.
 */
export async function runCli(
  argv: string[] = process.argv,
  options: Partial<ProgramOptions> = {},
): Promise<number> {
  try {
    await createProgram(options).parseAsync(argv);
    return 0;
  } catch (error) {
    if (!isLoggerInitialized()) {
      initializeLogger({ pretty: false, level: 'error' });
    }
    log().fatal({ error: String(error) }, 'command failed');
    return 1;
  }
}
