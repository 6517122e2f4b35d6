import { pino } from 'pino';
import { InvalidArgumentError } from './errors.js';
import type { DocumentConfig, DocumentOptions, DocumentSerializer } from './types.js';

export const DEFAULT_ID_FIELD = 'Id';

export const jsonSerializer: DocumentSerializer = {
  serialize: <T>(value: T): string => JSON.stringify(value),
  deserialize: <T>(json: string): T => JSON.parse(json),
};

function defaultLogger() {
  return pino({
    name: 'document-tables',
    level: process.env['DOCUMENT_TABLES_LOG_LEVEL'] ?? 'silent',
  });
}

export function resolveConfig(options: DocumentOptions = {}): DocumentConfig {
  const idField = options.idField ?? DEFAULT_ID_FIELD;
  if (idField.trim() === '') {
    throw new InvalidArgumentError('resolveConfig: idField must be a non-empty string');
  }
  return Object.freeze({
    idField,
    serializer: options.serializer ?? jsonSerializer,
    logger: options.logger ?? defaultLogger(),
  });
}
