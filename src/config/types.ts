import Joi from 'joi';

export interface ScriptMenderConfig {
  // Model backend
  gateway: {
    baseUrl: string;
    model: string;
    requestTimeoutMs: number;
    autoStart: boolean;
    command: string;
    readinessAttempts: number;
    readinessIntervalMs: number;
  };

  // Language the generated scripts are written in
  runtime: {
    language: 'python' | 'node';
    interpreter?: string;
  };

  // Repair loop settings
  loop: {
    maxAttempts: number;
    outputDir: string;
    verbose: boolean;
    executionTimeoutMs: number;  // 0 disables the limit
  };

  installer: {
    enabled: boolean;
  };

  logging: {
    level: 'error' | 'warn' | 'info' | 'debug' | 'trace';
  };
}

export const configSchema = Joi.object<ScriptMenderConfig>({
  gateway: Joi.object({
    baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).default('http://localhost:11434'),
    model: Joi.string().min(1).default('qwen2.5-coder:7b'),
    requestTimeoutMs: Joi.number().integer().min(1000).default(300000), // 5 minutes
    autoStart: Joi.boolean().default(true),
    command: Joi.string().min(1).default('ollama'),
    readinessAttempts: Joi.number().integer().min(1).max(300).default(20),
    readinessIntervalMs: Joi.number().integer().min(10).default(1000),
  }).default(),

  runtime: Joi.object({
    language: Joi.string().valid('python', 'node').default('python'),
    interpreter: Joi.string().min(1).optional(),
  }).default(),

  loop: Joi.object({
    maxAttempts: Joi.number().integer().min(1).max(20).default(4),
    outputDir: Joi.string().min(1).default('.'),
    verbose: Joi.boolean().default(true),
    executionTimeoutMs: Joi.number().integer().min(0).default(0),
  }).default(),

  installer: Joi.object({
    enabled: Joi.boolean().default(true),
  }).default(),

  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'debug', 'trace').default('warn'),
  }).default(),
}).default();
