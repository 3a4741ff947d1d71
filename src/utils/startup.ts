import { resolveAuthMode, type AppConfig } from '../config.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export class StartupValidationError extends Error {
  readonly issues: StartupIssue[];

  constructor(issues: StartupIssue[]) {
    const errors = issues.filter((entry) => entry.severity === 'error');
    super(`startup validation failed with ${errors.length} error(s)`);
    this.name = 'StartupValidationError';
    this.issues = issues;
  }

  get errorCount() {
    return this.issues.filter((entry) => entry.severity === 'error').length;
  }
}

const issue = (entry: StartupIssue): StartupIssue => entry;

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

const COPILOT_STUDIO_KEYS = [
  'COPILOTSTUDIOAGENT__TENANTID',
  'COPILOTSTUDIOAGENT__AGENTAPPID',
  'COPILOTSTUDIOAGENT__CLIENTSECRET',
  'COPILOTSTUDIOAGENT__ENVIRONMENTID',
  'COPILOTSTUDIOAGENT__SCHEMANAME',
] as const;

export const validateStartupConfig = (config: AppConfig): StartupIssue[] => {
  const issues: StartupIssue[] = [];
  const authMode = resolveAuthMode(config);

  if (authMode === 'disabled') {
    issues.push(
      issue({
        severity: 'warn',
        area: 'auth',
        message:
          'AUTHENTICATION IS DISABLED: neither COPILOTSTUDIOAGENT__CLIENTSECRET nor API_KEY is set; every endpoint accepts anonymous callers.',
        remediation: 'Set COPILOTSTUDIOAGENT__CLIENTSECRET (bearer-token mode) or API_KEY (static key mode), then restart the relay.',
        code: 'auth_disabled',
      }),
    );
  } else if (authMode === 'api-key' && config.API_KEY.length < 24) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'auth',
        message: 'API_KEY is short; use at least 24 characters.',
        remediation: 'Regenerate API_KEY with a longer random value and restart the relay.',
        code: 'weak_api_key',
      }),
    );
  }

  if (config.BACKEND_MODE === 'copilot-studio') {
    const missing = COPILOT_STUDIO_KEYS.filter((key) => !config[key]);
    if (missing.length > 0) {
      issues.push(
        issue({
          severity: 'error',
          area: 'backend',
          message: `BACKEND_MODE=copilot-studio requires ${missing.join(', ')}.`,
          remediation: 'Set the Copilot Studio agent settings in .env, or switch BACKEND_MODE=mock for local smoke testing.',
          code: 'copilot_studio_missing_settings',
        }),
      );
    }
  }

  if (config.BACKEND_MODE === 'mock') {
    issues.push(
      issue({
        severity: 'warn',
        area: 'backend',
        message: 'BACKEND_MODE=mock; replies are local echoes, no remote agent is called.',
        code: 'mock_backend',
      }),
    );
  }

  if (config.PORT === 0) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'runtime',
        message: 'PORT is 0; the relay will listen on an ephemeral port only.',
        remediation: 'Set PORT to a stable value (for example 8000) so callers can reach the agent card.',
        code: 'ephemeral_port',
      }),
    );
  }

  if (process.getuid?.() === 0) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'runtime',
        message: 'Running as root; prefer a dedicated non-root user.',
        remediation: 'Run the container or service under an unprivileged account.',
        code: 'running_as_root',
      }),
    );
  }

  return issues;
};

export const validateStartupConfigOrThrow = (config: AppConfig): StartupIssue[] => {
  const issues = validateStartupConfig(config);
  if (issues.some((entry) => entry.severity === 'error')) {
    throw new StartupValidationError(issues);
  }
  return issues;
};
