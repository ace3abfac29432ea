import { eq, lt } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { processedDocuments } from '../../infrastructure/db/schema.js';
import type { ProcessedEntry } from '../../domain/types.js';

function toProcessedEntry(row: typeof processedDocuments.$inferSelect): ProcessedEntry {
  return {
    documentId: row.documentId,
    sourceRef: row.sourceRef,
    processedAt: row.processedAt,
  };
}

export async function findProcessedDocument(
  db: Database,
  documentId: string,
): Promise<ProcessedEntry | null> {
  const rows = await db
    .select()
    .from(processedDocuments)
    .where(eq(processedDocuments.documentId, documentId));

  return rows.length > 0 ? toProcessedEntry(rows[0]) : null;
}

export async function insertProcessedDocument(db: Database, entry: ProcessedEntry): Promise<void> {
  await db
    .insert(processedDocuments)
    .values({
      documentId: entry.documentId,
      sourceRef: entry.sourceRef,
      processedAt: entry.processedAt,
    })
    .onConflictDoNothing({ target: processedDocuments.documentId });
}

export async function deleteProcessedDocumentsBefore(db: Database, before: Date): Promise<number> {
  const rows = await db
    .delete(processedDocuments)
    .where(lt(processedDocuments.processedAt, before))
    .returning({ documentId: processedDocuments.documentId });

  return rows.length;
}
