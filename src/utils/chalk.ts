/**
 * Chalk instance with colour switched off for non-TTY output, NO_COLOR,
 * FORCE_COLOR=0 and CI
 */

import { Chalk } from 'chalk';

export function shouldDisableColors(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): boolean {
  // Piped output, e.g. `scriptmender ... | tee log`
  if (!isTTY) {
    return true;
  }

  if (env.NO_COLOR) {
    return true;
  }

  if (env.FORCE_COLOR === '0' || env.FORCE_COLOR === 'false') {
    return true;
  }

  // Common CI environments set this
  if (env.CI && !env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk = new Chalk(shouldDisableColors() ? { level: 0 } : {});

export default configuredChalk;
