import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { isPlainObject, snapshotSchemaDefinition } from '@regwatch/core';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** Registry attributes compared between snapshots when the config names none */
export const DEFAULT_TRACKED_FIELDS = [
  'COMPANY_NAME',
  'COMPANY_CLASS',
  'COMPANY_STATUS',
  'AUTHORIZED_CAPITAL',
  'PAIDUP_CAPITAL',
  'PRINCIPAL_BUSINESS_ACTIVITY',
  'REGISTERED_OFFICE_ADDRESS',
] as const;

const normalizationKind = z.enum(['text', 'enum', 'numeric']);

export const normalizationSchema = z
  .object({
    defaultKind: normalizationKind.optional(),
    fields: z.record(normalizationKind).optional(),
    nullTokens: z.array(z.string()).optional(),
  })
  .strict();

const schemaSection = z
  .object({
    keyField: z.string().min(1).default('CIN'),
    fields: z.array(z.string().min(1)).min(1).optional(),
    trackedFields: z.array(z.string().min(1)).min(1).default([...DEFAULT_TRACKED_FIELDS]),
    contextFields: z
      .object({
        name: z.string().min(1).optional(),
        state: z.string().min(1).optional(),
        status: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    snapshotDir: z.string().min(1).default('./data/snapshots'),
    changeLogDir: z.string().min(1).default('./data/change_logs'),
    schema: schemaSection.default({}),
    normalization: normalizationSchema.default({}),
    engine: z
      .object({
        shardSize: z.number().int().min(1).optional(),
      })
      .strict()
      .default({}),
    csv: z
      .object({
        delimiter: z.string().min(1).optional(),
        quote: z.string().min(1).optional(),
        encoding: z.enum(['utf-8', 'utf8', 'latin1']).optional(),
        sanitizeFormulas: z.boolean().optional(),
        formulaEscapePrefix: z.string().optional(),
      })
      .strict()
      .default({}),
    query: z
      .object({
        limit: z.number().int().min(1).max(1000).optional(),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .transform((value) => {
    const { schema } = value;
    // Stored fields default to the tracked fields plus whatever context needs
    const fields =
      schema.fields ??
      Array.from(
        new Set([
          ...schema.trackedFields,
          ...Object.values(schema.contextFields ?? {}).filter(
            (field): field is string => field !== undefined
          ),
        ])
      );
    return {
      ...value,
      schema: {
        keyField: schema.keyField,
        fields,
        trackedFields: schema.trackedFields,
        contextFields: schema.contextFields ?? {},
      },
    };
  })
  .superRefine((value, ctx) => {
    const result = snapshotSchemaDefinition.safeParse(value.schema);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: ['schema', ...issue.path],
        });
      }
    }

    const known = new Set(value.schema.fields);
    for (const field of Object.keys(value.normalization.fields ?? {})) {
      if (!known.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Normalization rule for unknown field: ${field}`,
          path: ['normalization', 'fields', field],
        });
      }
    }
  });

export type ConfigFile = z.output<typeof configFileSchema>;

/**
 * @param source - what was validated, e.g. a config file path
 */
export function formatZodError(err: z.ZodError, source = 'config'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid ${source}:\n${issues}`;
}

/**
 * Validate an already-parsed config value
 */
export function parseConfig(raw: unknown, source?: string): ConfigFile {
  const expanded = expandEnvVars(raw);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error, source));
  }
  return result.data;
}

/**
 * Read and validate a config file; relative directories resolve against the
 * working directory.
 */
export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file: ${absolutePath}`, { cause: err });
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: err });
  }

  const config = parseConfig(parsed, `config file ${absolutePath}`);
  return {
    ...config,
    snapshotDir: resolve(process.cwd(), config.snapshotDir),
    changeLogDir: resolve(process.cwd(), config.changeLogDir),
  };
}
