import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getReportsDir, deepFreeze } from './utils.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

// Column references are spliced into SQL, so only plain or table-qualified identifiers pass.
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const REPORT_NAME = /^[a-z0-9][a-z0-9-]*$/;

export const RESERVED_LABELS = ['Created At', 'Source ID', 'Fingerprint'] as const;

const identifier = z.string().regex(IDENTIFIER, 'must be a column name, optionally table-qualified');

const FieldSchema = z.object({
  column: identifier,
  label: z.string().min(1),
});

export const ReportDefinitionSchema = z
  .object({
    title: z.string().min(1),
    enabled: z.boolean().default(true),
    cron: z.string().default('0 8 * * *'),
    worksheet: z.string().min(1).optional(),
    from: z
      .string()
      .min(1)
      .refine((s) => !s.includes(';') && !s.includes('--'), 'must be a single FROM clause'),
    id_column: identifier,
    created_at_column: identifier,
    fields: z.array(FieldSchema).min(1),
  })
  .superRefine((def, ctx) => {
    const seen = new Set<string>();
    for (const field of def.fields) {
      if (RESERVED_LABELS.some((reserved) => reserved === field.label)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `label "${field.label}" is reserved` });
      }
      if (seen.has(field.label)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate label "${field.label}"` });
      }
      seen.add(field.label);
    }
  });

export type ReportDefinition = z.infer<typeof ReportDefinitionSchema>;

const DEFAULT_REPORTS: Record<string, z.input<typeof ReportDefinitionSchema>> = {
  'new-users': {
    title: 'New Users',
    worksheet: 'New Users',
    from: 'engine4_users',
    id_column: 'user_id',
    created_at_column: 'creation_date',
    fields: [{ column: 'username', label: 'Username' }],
  },
  subscriptions: {
    title: 'Subscriptions',
    worksheet: 'Subscriptions',
    from: 'subscriptions s JOIN engine4_users u ON s.user_id = u.user_id',
    id_column: 's.subscription_id',
    created_at_column: 's.created_at',
    fields: [
      { column: 'u.username', label: 'Username' },
      { column: 's.subscription_type', label: 'Subscription Type' },
    ],
  },
};

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().default(8080),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),

  database: z
    .object({
      driver: z.enum(['mysql', 'sqlite']).default('mysql'),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().default(3306),
      user: z.string().default(''),
      password: z.string().default(''),
      database: z.string().default(''),
      // sqlite driver only
      path: z.string().default(''),
      // how the upstream stores DATETIME values, passed to mysql2
      timezone: z.string().default('Z'),
      connect_timeout_ms: z.number().int().positive().default(30000),
      query_timeout_ms: z.number().int().positive().default(60000),
      connection_limit: z.number().int().positive().default(4),
    })
    .default({}),

  sheets: z
    .object({
      backend: z.enum(['google', 'memory']).default('google'),
      spreadsheet_id: z.string().default(''),
      // used when spreadsheet_id is empty: opened by name, or created and shared
      spreadsheet_name: z.string().default(''),
      // defaults to delivery.email.to
      share_with: z.array(z.string()).default([]),
      // empty = application default credentials
      key_file: z.string().default(''),
      append_batch_size: z.number().int().positive().default(500),
      timeout_ms: z.number().int().positive().default(30000),
    })
    .default({}),

  delivery: z
    .object({
      email: z
        .object({
          enabled: z.boolean().default(false),
          smtp_host: z.string().default('smtp.gmail.com'),
          smtp_port: z.number().int().default(587),
          smtp_user: z.string().default(''),
          smtp_pass: z.string().default(''),
          from: z.string().default(''),
          to: z.array(z.string()).default([]),
          timeout_ms: z.number().int().positive().default(30000),
        })
        .default({}),
    })
    .default({}),

  window: z
    .object({
      lookback_hours: z.number().default(24),
      timezone: z.string().default('UTC'),
      align_to: z.enum(['minute', 'hour', 'day']).default('hour'),
    })
    .default({}),

  retry: z
    .object({
      max_attempts: z.number().int().min(1).default(3),
      initial_delay_ms: z.number().int().min(0).default(1000),
      factor: z.number().min(1).default(2),
      max_delay_ms: z.number().int().min(0).default(30000),
    })
    .default({}),

  run: z
    .object({
      timeout_ms: z.number().int().positive().default(300000),
    })
    .default({}),

  summary: z
    .object({
      max_items: z.number().int().positive().default(50),
    })
    .default({}),

  history: z
    .object({
      path: z.string().default('~/.daily-reports/runs.db'),
    })
    .default({}),

  reports: z.record(z.string().regex(REPORT_NAME), ReportDefinitionSchema).default(DEFAULT_REPORTS),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, ...keys: string[]): Record<string, unknown> {
  let node = raw;
  for (const key of keys) {
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  return node;
}

function toPort(value: string, name: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`${name} must be a port number`, { value });
  }
  return port;
}

/**
 * Overlay connection settings and credentials from the environment.
 * The environment is the secret provider: nothing here is ever written back to disk.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const db = (): Record<string, unknown> => section(raw, 'database');
  const email = (): Record<string, unknown> => section(raw, 'delivery', 'email');

  if (env['MYSQL_HOST']) db()['host'] = env['MYSQL_HOST'];
  if (env['MYSQL_PORT']) db()['port'] = toPort(env['MYSQL_PORT'], 'MYSQL_PORT');
  if (env['MYSQL_USER']) db()['user'] = env['MYSQL_USER'];
  if (env['MYSQL_PASSWORD']) db()['password'] = env['MYSQL_PASSWORD'];
  if (env['MYSQL_DATABASE']) db()['database'] = env['MYSQL_DATABASE'];

  if (env['SMTP_HOST']) email()['smtp_host'] = env['SMTP_HOST'];
  if (env['SMTP_PORT']) email()['smtp_port'] = toPort(env['SMTP_PORT'], 'SMTP_PORT');
  if (env['SMTP_USER']) email()['smtp_user'] = env['SMTP_USER'];
  if (env['SMTP_PASSWORD']) email()['smtp_pass'] = env['SMTP_PASSWORD'];
  if (env['EMAIL_TO']) {
    email()['to'] = env['EMAIL_TO']
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  if (env['SPREADSHEET_ID']) section(raw, 'sheets')['spreadsheet_id'] = env['SPREADSHEET_ID'];
  if (env['SPREADSHEET_NAME']) section(raw, 'sheets')['spreadsheet_name'] = env['SPREADSHEET_NAME'];
  if (env['GOOGLE_APPLICATION_CREDENTIALS']) {
    section(raw, 'sheets')['key_file'] = env['GOOGLE_APPLICATION_CREDENTIALS'];
  }

  return raw;
}

/**
 * Validate a raw config object and freeze it. The result is treated as
 * immutable for the lifetime of a run.
 */
export function parseConfig(raw: unknown): Readonly<Config> {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return deepFreeze(parsed.data);
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Readonly<Config>> {
  const env = options.env ?? process.env;
  const explorer = cosmiconfig('reports', {
    searchPlaces: ['reports.config.yaml', 'reports.config.yml', '.reportsrc.yaml', '.reportsrc.yml'],
  });

  const explicitPath = options.configPath ?? env['REPORTS_CONFIG'];
  const defaultConfigPath = path.join(getReportsDir(), 'config.yaml');

  let loaded: unknown = {};

  if (explicitPath) {
    const resolved = resolvePath(explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    loaded = result?.config ?? {};
  } else {
    const found = await explorer.search(options.cwd ?? process.cwd());
    if (found) {
      loaded = found.config;
      logger.debug({ path: found.filepath }, 'Loaded config');
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      loaded = result?.config ?? {};
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  if (!isRecord(loaded)) {
    throw new ConfigurationError('Config file must contain a mapping at the top level');
  }

  return parseConfig(applyEnvOverrides(structuredClone(loaded), env));
}

/**
 * Secret values known to the config, used to scrub outbound diagnostics.
 */
export function configSecrets(config: Config): string[] {
  return [config.database.password, config.delivery.email.smtp_pass].filter((s) => s.length > 0);
}

/**
 * Config summary with credentials masked, safe to return from the status surface.
 */
export function maskConfig(config: Config): Config {
  const masked = structuredClone(config);
  if (masked.database.password) masked.database.password = '***';
  if (masked.delivery.email.smtp_pass) masked.delivery.email.smtp_pass = '***';
  return masked;
}

export function worksheetName(def: ReportDefinition): string {
  return def.worksheet ?? def.title;
}
