import { ScriptMenderConfig, configSchema } from './types.js';

/**
 * Partial configuration, typically built from CLI flags
 */
export type ConfigOverrides = {
  [K in keyof ScriptMenderConfig]?: Partial<ScriptMenderConfig[K]>;
};

function parseInteger(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  // Leave non-numeric text in place so validation reports it
  return Number.isInteger(parsed) ? parsed : value;
}

function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

/**
 * Load configuration from environment variables, then apply overrides
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ScriptMenderConfig {
  const envConfig = {
    gateway: {
      baseUrl: env.SCRIPTMENDER_OLLAMA_URL,
      model: env.SCRIPTMENDER_MODEL,
      requestTimeoutMs: parseInteger(env.SCRIPTMENDER_REQUEST_TIMEOUT),
      autoStart: parseBoolean(env.SCRIPTMENDER_AUTO_START),
      command: env.SCRIPTMENDER_OLLAMA_COMMAND,
      readinessAttempts: parseInteger(env.SCRIPTMENDER_READINESS_ATTEMPTS),
    },
    runtime: {
      language: env.SCRIPTMENDER_RUNTIME,
      interpreter: env.SCRIPTMENDER_INTERPRETER,
    },
    loop: {
      maxAttempts: parseInteger(env.SCRIPTMENDER_MAX_ATTEMPTS),
      outputDir: env.SCRIPTMENDER_OUTPUT_DIR,
      verbose: parseBoolean(env.SCRIPTMENDER_VERBOSE),
      executionTimeoutMs: parseInteger(env.SCRIPTMENDER_EXECUTION_TIMEOUT),
    },
    installer: {
      enabled: parseBoolean(env.SCRIPTMENDER_AUTO_INSTALL),
    },
    logging: {
      level: env.SCRIPTMENDER_LOG_LEVEL,
    },
  };

  // Remove undefined values to let Joi apply defaults
  const merged = mergeSections(removeUndefined(envConfig), removeUndefined(overrides));

  const { error, value } = configSchema.validate(merged, {
    allowUnknown: false,
    stripUnknown: true,
  });

  if (error) {
    throw new Error(`Configuration validation failed: ${error.message}`);
  }

  return value;
}

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively remove undefined values from an object
 */
function removeUndefined(obj: object): Section {
  const cleaned: Section = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    cleaned[key] = isSection(value) ? removeUndefined(value) : value;
  }
  return cleaned;
}

/**
 * Merge two-level config objects; values in `top` win
 */
function mergeSections(base: Section, top: Section): Section {
  const result: Section = { ...base };
  for (const [key, value] of Object.entries(top)) {
    const existing = result[key];
    result[key] = isSection(existing) && isSection(value) ? { ...existing, ...value } : value;
  }
  return result;
}

export * from './types.js';
