/**
 * System Commands (Health Check)
 */

import Joi from 'joi';
import { formatHealthCheck, HealthCheckData } from '../formatters.js';
import { CommandParameter, defineCommand } from '../types.js';

const healthCheckParams = [] as const satisfies readonly CommandParameter[];

export const healthCheck = defineCommand<Record<string, never>, HealthCheckData>({
  name: 'healthCheck',
  cliName: 'health-check',
  description: 'Check whether the model backend is reachable. Does not start it.',
  parameters: healthCheckParams,
  argsSchema: Joi.object<Record<string, never>>({}),
  examples: ['scriptmender health-check', 'SCRIPTMENDER_OLLAMA_URL=http://gpu-box:11434 scriptmender health-check'],
  async handler(context) {
    const reachable = await context.supervisor.isReachable();
    const url = context.config.gateway.baseUrl;

    return {
      success: reachable,
      data: {
        status: reachable ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        backend: {
          url,
          reachable,
          managed: context.supervisor.ownsBackend,
        },
        model: context.config.gateway.model,
        runtime: context.runtime.name,
      },
      error: reachable ? undefined : `Model backend not reachable at ${url}`,
    };
  },
  formatResult(result) {
    return result.data ? formatHealthCheck(result.data) : '';
  },
});
