import chalk from '../utils/chalk.js';
import { RepairLoopObserver } from '../services/RepairLoopService.js';
import { lastLine } from './utils.js';

export type LineWriter = (line: string) => void;

const SCRIPT_RULE = '='.repeat(60);

/**
 * Progress lines for an interactive repair run
 */
export function createConsoleReporter(model: string, write: LineWriter = line => console.log(line)): RepairLoopObserver {
  return {
    onGenerating(_task, kind) {
      if (kind === 'initial') {
        write(chalk.cyan(`#> 🎨 CREATING: Asking ${model} to write the script...`));
      } else {
        write(chalk.cyan(`#> 🧠 DEBUGGING: Asking ${model} to fix the bug...`));
      }
    },

    onAttemptStart(_attempt, _mode, scriptPath) {
      write(`\n${chalk.bold('#> SCRIPT:')} ${scriptPath}`);
      write(SCRIPT_RULE);
    },

    onMissingDependency(classification) {
      write(chalk.yellow(`    [!] Missing Module: ${classification.packageName}`));
    },

    onInstallResult(packageName, installed) {
      if (installed) {
        write(chalk.green('    [R] Retrying with new package...'));
      } else {
        write(chalk.red(`    [x] Could not install ${packageName}`));
      }
    },

    onFailure(classification, attempt) {
      write(chalk.yellow(`    [!] Logic Error detected on attempt ${attempt + 1}:`));
      write(`        ${lastLine(classification.diagnostic)}`);
    },

    onSucceeded(attempt) {
      write(chalk.green(`\n✅ Success on attempt ${attempt + 1}!`));
    },

    onExhausted() {
      write(chalk.red('\n❌ Failed after max retries.'));
    },
  };
}
