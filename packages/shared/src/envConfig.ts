import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'pointforge';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

export type IntegerVarOptions = {
  defaultValue?: number;
  description?: string;
  min?: number;
  max?: number;
};

export function integerVar(options?: IntegerVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === undefined || value.trim() === '') {
      return options?.defaultValue;
    }

    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = {
  defaultValue?: string;
  description?: string;
  lowercase?: boolean;
  allowed?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    const raw = value?.trim() ?? '';
    if (raw.length === 0) {
      return options?.defaultValue;
    }

    const normalized = options?.lowercase ? raw.toLowerCase() : raw;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Accepted values: ${options.allowed.join(', ')}`
      });
      return z.NEVER;
    }

    return normalized;
  });
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const pointforgeEnvSchema = z.object({
  POINTFORGE_SERVER: stringVar({ description: 'server' }),
  POINTFORGE_TOKEN: stringVar({ description: 'token' }),
  POINTFORGE_HTTP_TIMEOUT_MS: integerVar({
    description: 'HTTP timeout (ms)',
    defaultValue: DEFAULT_HTTP_TIMEOUT_MS,
    min: 1
  }),
  POINTFORGE_LOG_LEVEL: stringVar({
    description: 'log level',
    defaultValue: 'info',
    lowercase: true,
    allowed: LOG_LEVELS
  })
});

export type PointforgeEnv = {
  server?: string;
  token?: string;
  httpTimeoutMs: number;
  logLevel: string;
};

export function loadPointforgeEnv(env?: EnvSource): PointforgeEnv {
  const parsed = loadEnvConfig(pointforgeEnvSchema, { env, context: 'pointforge' });
  return {
    server: parsed.POINTFORGE_SERVER,
    token: parsed.POINTFORGE_TOKEN,
    httpTimeoutMs: parsed.POINTFORGE_HTTP_TIMEOUT_MS ?? DEFAULT_HTTP_TIMEOUT_MS,
    logLevel: parsed.POINTFORGE_LOG_LEVEL ?? 'info'
  };
}
