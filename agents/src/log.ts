// SPDX-FileCopyrightText: 2026 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Logger } from 'pino';
import { pino } from 'pino';

/** @internal */
export type LoggerOptions = {
  pretty: boolean;
  level?: string;
};

/** @internal */
let logger: Logger | undefined = undefined;

/** @internal */
export const log = () => {
  if (!logger) {
    throw new TypeError('logger not initialized. did you forget to run initializeLogger()?');
  }
  return logger;
};

/** Whether {@link initializeLogger} has run. */
export const isLoggerInitialized = (): boolean => logger !== undefined;

/** @internal */
export const initializeLogger = ({ pretty, level }: LoggerOptions) => {
  logger = pino(
    pretty
      ? {
          level: level || 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          },
        }
      : { level: level || 'info' },
  );
};
