import { mkdir, readdir, readFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { extractTextFromPdf } from '../pdf-parser.js';
import type { SourceDocument } from './types.js';

const log = logger.child({ module: 'local-folder-source' });

export interface LocalFolderOptions {
  contractsDir: string;
  processedDir: string;
}

function toDocument(fileName: string, options: LocalFolderOptions): SourceDocument {
  const path = join(options.contractsDir, fileName);

  return {
    documentId: fileName,
    metadata: { name: fileName, sourceRef: path },

    async readText() {
      let data: Uint8Array;
      try {
        data = new Uint8Array(await readFile(path));
      } catch (cause) {
        const details = describeError(cause);
        log.error({ documentId: fileName, errorCode: ErrorCode.SOURCE_READ_FAILED, retryable: false, details }, 'Failed to read document');
        return err(createAppError(ErrorCode.SOURCE_READ_FAILED, `Failed to read ${fileName}`, false, details));
      }
      return extractTextFromPdf(data, fileName);
    },

    async acknowledge() {
      const target = join(options.processedDir, fileName);
      try {
        await mkdir(options.processedDir, { recursive: true });
        await rename(path, target);
      } catch (cause) {
        const details = describeError(cause);
        log.warn({ documentId: fileName, errorCode: ErrorCode.SOURCE_ACK_FAILED, details }, 'Failed to move processed document');
        return err(createAppError(ErrorCode.SOURCE_ACK_FAILED, `Failed to move ${fileName}`, true, details));
      }
      log.debug({ documentId: fileName, target }, 'Document moved to processed folder');
      return ok(undefined);
    },
  };
}

/** Lists `*.pdf` files in the contracts folder, sorted by name. */
export async function listLocalDocuments(
  options: LocalFolderOptions,
): Promise<Result<SourceDocument[], AppError>> {
  let names: string[];
  try {
    const entries = await readdir(options.contractsDir, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
      .map((entry) => entry.name)
      .sort();
  } catch (cause) {
    const details = describeError(cause);
    log.error({ dir: options.contractsDir, errorCode: ErrorCode.SOURCE_UNAVAILABLE, retryable: true, details }, 'Failed to list contracts folder');
    return err(createAppError(ErrorCode.SOURCE_UNAVAILABLE, 'Failed to list contracts folder', true, details));
  }

  log.info({ dir: options.contractsDir, documentCount: names.length }, 'Contracts folder listed');
  return ok(names.map((name) => toDocument(name, options)));
}
