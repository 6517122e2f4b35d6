import { pino } from 'pino';
import type { DocumentStore } from '../../src/types.js';

export interface SubDocument {
  Foo: string;
  Bar: string;
}

export interface JsonDocument {
  Id: string;
  Value: string;
  NumValue: number;
  Sub?: SubDocument;
}

export const TABLE = 'customer';

export const silentLogger = pino({ level: 'silent' });

export const testDocuments: readonly JsonDocument[] = [
  { Id: 'one', Value: 'FIRST!', NumValue: 0 },
  { Id: 'two', Value: 'another', NumValue: 10, Sub: { Foo: 'green', Bar: 'blue' } },
  { Id: 'three', Value: '', NumValue: 4 },
  { Id: 'four', Value: 'purple', NumValue: 17, Sub: { Foo: 'green', Bar: 'red' } },
  { Id: 'five', Value: 'purple', NumValue: 18 },
];

export async function loadDocuments(store: DocumentStore): Promise<void> {
  await store.ensureTable(TABLE);
  for (const doc of testDocuments) {
    await store.insert(TABLE, doc);
  }
}

export function ids(docs: readonly { Id: string }[]): string[] {
  return docs.map((doc) => doc.Id).sort();
}
