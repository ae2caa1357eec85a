// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import {
  InterruptionFilter,
  InterruptionFilterEventTypes,
  initializeLogger,
  log,
} from '@backchannel/agents';
import { fileURLToPath } from 'node:url';

/**
 * Replays a short conversation against the filter: the agent explains something while the user
 * nods along, then the user cuts in, and a late partial transcript arrives right after.
 */
export async function runSession(): Promise<string[]> {
  const logger = log();
  const spoken: string[] = [];

  const filter: InterruptionFilter = new InterruptionFilter({
    hooks: {
      onInterrupt: (transcript) => {
        logger.info({ transcript }, 'cancelling agent speech');
        filter.onAgentSpeechEnded();
        spoken.push(`interrupt: ${transcript}`);
      },
      onRespond: (transcript) => {
        spoken.push(`respond: ${transcript}`);
      },
      onSwallow: (transcript) => {
        spoken.push(`swallow: ${transcript}`);
      },
    },
  });

  filter.on(InterruptionFilterEventTypes.Decision, (ev) => {
    logger.info({ action: ev.action, reason: ev.reason }, `"${ev.transcript}"`);
  });

  filter.onAgentSpeechStarted();
  await filter.pushTranscript('Yeah... okay... uh-huh', 1_000);
  await filter.pushTranscript('right, makes sense', 2_000);
  await filter.pushTranscript('Wait, can you repeat that?', 3_000);
  await filter.pushTranscript('can you repeat that', 3_080);

  filter.onAgentSpeechStarted();
  await filter.pushTranscript('...', 5_000);

  filter.onAgentSpeechEnded();
  await filter.pushTranscript('Yeah', 6_000);

  return spoken;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  initializeLogger({ pretty: true, level: 'info' });
  runSession()
    .then((spoken) => {
      log().info({ spoken }, 'session finished');
    })
    .catch((error) => {
      log().fatal({ error: String(error) }, 'session failed');
      process.exitCode = 1;
    });
}
