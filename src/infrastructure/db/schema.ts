import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';

export const processedDocuments = pgTable(
  'processed_documents',
  {
    documentId: text('document_id').primaryKey(),
    sourceRef: text('source_ref').notNull().default(''),
    processedAt: timestamp('processed_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_processed_documents_processed_at').on(table.processedAt)],
);
