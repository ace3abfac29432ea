import pino from 'pino';

export const logger = pino({
  name: 'contract-intake',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createDocumentLogger(
  documentId: string,
  cycleId?: string,
  representative?: string,
) {
  return logger.child({
    documentId,
    ...(cycleId !== undefined && { cycleId }),
    ...(representative !== undefined && { representative }),
  });
}
