import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';

type Env = Record<string, string | undefined>;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const pipelineEnvSchema = z.object({
  CONTRACTS_DIR: z.string().min(1).default('./contracts/inbox'),
  PROCESSED_CONTRACTS_DIR: z.string().min(1).default('./contracts/processed'),
  MARK_SOURCE_PROCESSED: booleanFlag,
  MASTER_LEDGER_ID: z.string().min(1, 'MASTER_LEDGER_ID is required'),
  BACKUP_LEDGER_ID: z.string().min(1, 'BACKUP_LEDGER_ID is required'),
  REP_REGISTRY_PATH: z.string().min(1).default('./config/representatives.json'),
  EXTRACTION_RULES_PATH: z.string().min(1).default('./config/extraction-rules.json'),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  LEDGER_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  DEDUP_STORE: z.enum(['file', 'postgres']).default('file'),
  DEDUP_STATE_PATH: z.string().min(1).default('./data/processed-documents.json'),
  DATABASE_URL: z.string().url().optional(),
});

const leadServiceEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LEAD_API_BASE_URL: z.string().url(),
  LEAD_API_KEY: z.string().min(1, 'LEAD_API_KEY is required'),
  LEAD_API_SECRET: z.string().min(1, 'LEAD_API_SECRET is required'),
  LEAD_VENDOR_ID: z.string().regex(/^\d+$/, 'LEAD_VENDOR_ID must be numeric'),
  LEAD_PROGRAM_GROUP: z.string().min(1).default('SF&I Water Treatment'),
  LEAD_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LEAD_POLL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  LEAD_POLL_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),
  LEAD_POLL_BACKOFF_FACTOR: z.coerce.number().min(1).max(4).default(1.5),
  LEAD_POLL_MAX_DELAY_MS: z.coerce.number().int().positive().default(15_000),
  LEAD_ID_PATTERN: z.string().min(1).default('^F\\d{8}$'),
  LEAD_REUSE_WINDOW_DAYS: z.coerce.number().int().min(0).max(365).default(14),
});

export interface PipelineConfig {
  source: { contractsDir: string; processedDir: string; markProcessed: boolean };
  ledgers: { masterLedgerId: string; backupLedgerId: string; writeTimeoutMs: number };
  registryPath: string;
  rulesPath: string;
  pollIntervalMs: number;
  matchThreshold: number;
  dedup:
    | { store: 'file'; statePath: string }
    | { store: 'postgres'; databaseUrl: string };
}

export interface PollingConfig {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  idPattern: RegExp;
}

export interface LeadServiceConfig {
  port: number;
  api: {
    baseUrl: string;
    apiKey: string;
    apiSecret: string;
    vendorId: string;
    programGroup: string;
    timeoutMs: number;
  };
  polling: PollingConfig;
  reuseWindowDays: number;
}

function invalidConfig(error: z.ZodError): AppError {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  return createAppError(ErrorCode.CONFIG_INVALID, 'Invalid environment configuration', false, details);
}

export function loadPipelineConfig(env: Env = process.env): Result<PipelineConfig, AppError> {
  const parsed = pipelineEnvSchema.safeParse(env);
  if (!parsed.success) return err(invalidConfig(parsed.error));

  const e = parsed.data;

  let dedup: PipelineConfig['dedup'];
  if (e.DEDUP_STORE === 'postgres') {
    if (!e.DATABASE_URL) {
      return err(
        createAppError(
          ErrorCode.CONFIG_INVALID,
          'Invalid environment configuration',
          false,
          'DATABASE_URL: required when DEDUP_STORE=postgres',
        ),
      );
    }
    dedup = { store: 'postgres', databaseUrl: e.DATABASE_URL };
  } else {
    dedup = { store: 'file', statePath: e.DEDUP_STATE_PATH };
  }

  return ok({
    source: {
      contractsDir: e.CONTRACTS_DIR,
      processedDir: e.PROCESSED_CONTRACTS_DIR,
      markProcessed: e.MARK_SOURCE_PROCESSED,
    },
    ledgers: {
      masterLedgerId: e.MASTER_LEDGER_ID,
      backupLedgerId: e.BACKUP_LEDGER_ID,
      writeTimeoutMs: e.LEDGER_WRITE_TIMEOUT_MS,
    },
    registryPath: e.REP_REGISTRY_PATH,
    rulesPath: e.EXTRACTION_RULES_PATH,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    matchThreshold: e.MATCH_THRESHOLD,
    dedup,
  });
}

export function loadLeadServiceConfig(env: Env = process.env): Result<LeadServiceConfig, AppError> {
  const parsed = leadServiceEnvSchema.safeParse(env);
  if (!parsed.success) return err(invalidConfig(parsed.error));

  const e = parsed.data;

  let idPattern: RegExp;
  try {
    idPattern = new RegExp(e.LEAD_ID_PATTERN);
  } catch (cause) {
    return err(
      createAppError(
        ErrorCode.CONFIG_INVALID,
        'Invalid environment configuration',
        false,
        `LEAD_ID_PATTERN: ${cause instanceof Error ? cause.message : String(cause)}`,
      ),
    );
  }

  return ok({
    port: e.PORT,
    api: {
      baseUrl: e.LEAD_API_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.LEAD_API_KEY,
      apiSecret: e.LEAD_API_SECRET,
      vendorId: e.LEAD_VENDOR_ID,
      programGroup: e.LEAD_PROGRAM_GROUP,
      timeoutMs: e.LEAD_API_TIMEOUT_MS,
    },
    polling: {
      maxAttempts: e.LEAD_POLL_MAX_ATTEMPTS,
      initialDelayMs: e.LEAD_POLL_INITIAL_DELAY_MS,
      backoffFactor: e.LEAD_POLL_BACKOFF_FACTOR,
      maxDelayMs: e.LEAD_POLL_MAX_DELAY_MS,
      idPattern,
    },
    reuseWindowDays: e.LEAD_REUSE_WINDOW_DAYS,
  });
}
