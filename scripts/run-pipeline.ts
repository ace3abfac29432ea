import 'dotenv/config';
import { loadPipelineConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import { sleep } from '../src/infrastructure/timeout.js';
import { createSheetsLedgerClient } from '../src/infrastructure/sheets/index.js';
import { listLocalDocuments } from '../src/infrastructure/document-source/local-folder.js';
import { createDedupLedger } from '../src/services/dedup/index.js';
import { loadExtractionRules } from '../src/services/extraction/index.js';
import { loadRepresentativeRegistry } from '../src/services/identity/registry.js';
import { runCycle, type PipelineDeps } from '../src/services/pipeline/index.js';
import type { Result } from '../src/domain/result.js';
import type { AppError } from '../src/domain/errors.js';

const log = logger.child({ module: 'pipeline-runner' });

function orExit<T>(result: Result<T, AppError>): T {
  if (!result.ok) {
    log.fatal({ errorCode: result.error.code, details: result.error.details }, result.error.message);
    process.exit(1);
  }
  return result.value;
}

async function main(): Promise<void> {
  const once = process.argv.includes('--once');

  const c = orExit(loadPipelineConfig());

  const deps: PipelineDeps = {
    dedup: orExit(await createDedupLedger(c.dedup)),
    rules: orExit(await loadExtractionRules(c.rulesPath)),
    registry: orExit(await loadRepresentativeRegistry(c.registryPath)),
    ledgerClient: createSheetsLedgerClient(),
    ledgers: { masterLedgerId: c.ledgers.masterLedgerId, backupLedgerId: c.ledgers.backupLedgerId },
    matchThreshold: c.matchThreshold,
    writeTimeoutMs: c.ledgers.writeTimeoutMs,
    acknowledgeSource: c.source.markProcessed,
  };

  log.info({ once, pollIntervalMs: c.pollIntervalMs, contractsDir: c.source.contractsDir }, 'Pipeline runner started');

  for (;;) {
    const documents = await listLocalDocuments(c.source);
    // a missing folder is logged by the source; the next poll tries again
    if (documents.ok) await runCycle(documents.value, deps);

    if (once) break;
    await sleep(c.pollIntervalMs);
  }
}

main().catch((error: unknown) => {
  log.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Pipeline runner crashed');
  process.exit(1);
});
