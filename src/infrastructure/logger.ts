import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export const logger = pino({
  name: 'reflective-extraction',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createRunLogger(runId: string, stepKind?: string): Logger {
  return logger.child({
    runId,
    ...(stepKind !== undefined && { stepKind }),
  });
}
