// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { Logger } from 'pino';
import { pino } from 'pino';

export type LoggerOptions = {
  pretty: boolean;
  level?: string;
};

let logger: Logger | undefined = undefined;

export const log = () => {
  if (!logger) {
    throw new TypeError('logger not initialized. did you forget to run initializeLogger()?');
  }
  return logger;
};

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
