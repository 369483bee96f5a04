import { z } from 'zod';

export interface SearchConfig {
  readonly url: string | null;
  readonly index: string;
  readonly username: string | null;
  readonly password: string | null;
  readonly queryFile: string;
  readonly pageSize: number;
}

export interface OracleConfig {
  readonly enabled: boolean;
  readonly region: string;
  readonly modelId: string;
  readonly maxTokens: number;
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
}

export interface TicketSinkConfig {
  readonly url: string | null;
  readonly project: string | null;
  readonly user: string | null;
  readonly token: string | null;
}

export interface ReportSinkConfig {
  readonly url: string | null;
  readonly user: string | null;
  readonly token: string | null;
  readonly pageId: string | null;
}

/** Process configuration, read once from the environment at startup. */
export interface AppConfig {
  readonly logLevel: string;
  readonly outputDir: string;
  readonly logFile: string;
  readonly search: SearchConfig;
  readonly oracle: OracleConfig;
  readonly pipeline: {
    readonly batchSize: number;
    readonly excerptLines: number;
    readonly refineChunkSize: number | null;
    /** Filter rule of the deterministic fallback plan. */
    readonly fallback: {
      readonly filterMode: 'any_triaged' | 'external_noise';
      readonly externalNoiseFloor: number;
    };
  };
  readonly tickets: TicketSinkConfig;
  readonly report: ReportSinkConfig;
  readonly server: { readonly host: string; readonly port: number };
}

export type Env = Readonly<Record<string, string | undefined>>;

const text = z.string().trim().min(1);
const positiveInt = z.coerce.number().int().positive();
const port = z.coerce.number().int().min(0).max(65535);
const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');
const filterMode = z.string().trim().toLowerCase().pipe(z.enum(['any_triaged', 'external_noise']));
const logLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Loads configuration from `env`. Unset variables take their defaults;
 * a value that fails validation also takes the default and adds an
 * entry to `warnings`, which the caller logs once the logger exists.
 */
export function loadConfig(env: Env = process.env): { config: AppConfig; warnings: string[] } {
  const warnings: string[] = [];

  function read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = schema.safeParse(raw);
    if (parsed.success) return parsed.data;
    warnings.push(`${key}: invalid value ${JSON.stringify(raw)}, using default`);
    return fallback;
  }

  const optional = (key: string): string | null => read<string | null>(key, text, null);

  const config: AppConfig = {
    logLevel: read<string>('LOG_LEVEL', logLevel, 'info'),
    outputDir: read('TRIAGE_OUTPUT_DIR', text, 'output'),
    logFile: read('TRIAGE_LOG_FILE', text, 'resources/sample_logs.json'),
    search: {
      url: optional('TRIAGE_ES_URL'),
      index: read('TRIAGE_ES_INDEX', text, 'logs-*'),
      username: optional('TRIAGE_ES_USERNAME'),
      password: optional('TRIAGE_ES_PASSWORD'),
      queryFile: read('TRIAGE_ES_QUERY_FILE', text, 'resources/search_query.json'),
      pageSize: read('TRIAGE_ES_PAGE_SIZE', positiveInt, 1000),
    },
    oracle: {
      enabled: read('TRIAGE_ORACLE_ENABLED', flag, false),
      region: optional('BEDROCK_REGION') ?? optional('AWS_REGION') ?? 'us-east-1',
      modelId: read('BEDROCK_MODEL_ID', text, 'anthropic.claude-3-5-haiku-20241022-v1:0'),
      maxTokens: read('TRIAGE_ORACLE_MAX_TOKENS', positiveInt, 4096),
      maxAttempts: read('TRIAGE_ORACLE_MAX_ATTEMPTS', positiveInt, 5),
      baseDelayMs: read('TRIAGE_ORACLE_BASE_DELAY_MS', z.coerce.number().int().min(0), 1000),
    },
    pipeline: {
      batchSize: read('TRIAGE_CLASSIFY_BATCH_SIZE', positiveInt, 10),
      excerptLines: read('TRIAGE_EXCERPT_LINES', positiveInt, 15),
      refineChunkSize: read<number | null>('TRIAGE_REFINE_CHUNK_SIZE', positiveInt, null),
      fallback: {
        filterMode: read('TRIAGE_FALLBACK_FILTER_MODE', filterMode, 'any_triaged'),
        externalNoiseFloor: read('TRIAGE_EXTERNAL_NOISE_FLOOR', positiveInt, 1),
      },
    },
    tickets: {
      url: optional('TRIAGE_TICKET_URL'),
      project: optional('TRIAGE_TICKET_PROJECT'),
      user: optional('TRIAGE_TICKET_USER'),
      token: optional('TRIAGE_TICKET_TOKEN'),
    },
    report: {
      url: optional('TRIAGE_REPORT_URL'),
      user: optional('TRIAGE_REPORT_USER'),
      token: optional('TRIAGE_REPORT_TOKEN'),
      pageId: optional('TRIAGE_REPORT_PAGE_ID'),
    },
    server: {
      host: read('HOST', text, '0.0.0.0'),
      port: read('PORT', port, 3000),
    },
  };

  return { config, warnings };
}
