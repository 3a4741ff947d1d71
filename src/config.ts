import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';
import { ConfigurationError } from './shared/errors.js';

const trimmed = z.string().trim().default('');

const schemaBase = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CONTAINER_APP_HOSTNAME: trimmed,

  COPILOTSTUDIOAGENT__TENANTID: trimmed,
  COPILOTSTUDIOAGENT__AGENTAPPID: trimmed,
  COPILOTSTUDIOAGENT__CLIENTSECRET: trimmed,
  COPILOTSTUDIOAGENT__ENVIRONMENTID: trimmed,
  COPILOTSTUDIOAGENT__SCHEMANAME: trimmed,
  API_KEY: trimmed,
  JWKS_URL: trimmed,

  BACKEND_MODE: z.enum(['copilot-studio', 'mock']).default('copilot-studio'),
  REMOTE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120000),
  SESSION_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
  SESSION_MAX_ENTRIES: z.coerce.number().int().min(0).default(0),
  CANCEL_MODE: z.enum(['fail', 'reject']).default('fail'),

  AGENT_NAME: z.string().trim().min(1).default('Copilot Studio Agent'),
  AGENT_DESCRIPTION: z.string().trim().min(1).default('An agent that invokes Copilot Studio capabilities'),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.COPILOTSTUDIOAGENT__CLIENTSECRET && !input.COPILOTSTUDIOAGENT__TENANTID) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['COPILOTSTUDIOAGENT__TENANTID'],
      message: 'COPILOTSTUDIOAGENT__CLIENTSECRET enables bearer-token auth, which requires COPILOTSTUDIOAGENT__TENANTID.',
    });
  }

  if (input.COPILOTSTUDIOAGENT__CLIENTSECRET && !input.COPILOTSTUDIOAGENT__AGENTAPPID) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['COPILOTSTUDIOAGENT__AGENTAPPID'],
      message: 'COPILOTSTUDIOAGENT__CLIENTSECRET enables bearer-token auth, which requires COPILOTSTUDIOAGENT__AGENTAPPID.',
    });
  }

  if (input.JWKS_URL && !/^https?:\/\//.test(input.JWKS_URL)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JWKS_URL'],
      message: 'JWKS_URL must be an http(s) URL.',
    });
  }
});

type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    output[key] = value === '' ? undefined : value;
  }
  return output;
};

const envFilePath = process.env.RELAY_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
const dotenvCode = dotenvOutput.error && 'code' in dotenvOutput.error ? dotenvOutput.error.code : undefined;
if (dotenvOutput.error && dotenvCode !== 'ENOENT') {
  throw new ConfigurationError(`Unable to load config file ${envFilePath}: ${dotenvOutput.error.message}`);
}

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid relay configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const parseAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
  dotenvVars: DotenvParseOutput | undefined = dotenvOutput.parsed,
) => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  const parsed = parseSchema(env);
  return {
    ...parsed,
    JWKS_URL:
      parsed.JWKS_URL ||
      (parsed.COPILOTSTUDIOAGENT__TENANTID
        ? `https://login.microsoftonline.com/${parsed.COPILOTSTUDIOAGENT__TENANTID}/discovery/keys`
        : ''),
  };
};

export type AppConfig = ReturnType<typeof parseAppConfig>;

export type AuthMode = 'bearer' | 'api-key' | 'disabled';

export const resolveAuthMode = (config: AppConfig): AuthMode => {
  if (config.COPILOTSTUDIOAGENT__CLIENTSECRET) return 'bearer';
  if (config.API_KEY) return 'api-key';
  return 'disabled';
};

export const publicBaseUrl = (config: AppConfig) =>
  config.CONTAINER_APP_HOSTNAME ? `https://${config.CONTAINER_APP_HOSTNAME}/` : `http://localhost:${config.PORT}/`;

export const config = parseAppConfig();
