import { ScriptRuntime } from '../runtimes/ScriptRuntime.js';
import { FailureClassification } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * One entry of the classification table. `build` may decline a match
 * (return null), in which case the next match or rule is tried.
 */
export interface ClassificationRule {
  name: string;
  pattern: RegExp;
  build(match: RegExpMatchArray, diagnostic: string): FailureClassification | null;
}

export const GENERIC_FAILURE_RULE: ClassificationRule = {
  name: 'generic',
  pattern: /[\s\S]*/,
  build: (_match, diagnostic) => ({ kind: 'generic', diagnostic }),
};

/**
 * Build the ordered rule table for a runtime: every module-not-found
 * signature first, the generic fallback last.
 */
export function buildClassificationRules(runtime: ScriptRuntime): ClassificationRule[] {
  const missingModuleRules = runtime.missingModulePatterns.map((signature): ClassificationRule => ({
    name: signature.name,
    pattern: signature.pattern,
    build: (match, diagnostic) => {
      const moduleName = match[1];
      if (!moduleName) return null;

      const packageName = runtime.resolvePackage(moduleName);
      if (!packageName) return null;

      return { kind: 'missing-dependency', moduleName, packageName, diagnostic };
    },
  }));

  return [...missingModuleRules, GENERIC_FAILURE_RULE];
}

function globalPattern(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
}

/**
 * Decides whether a failed run is missing a dependency or is a generic defect
 */
export class FailureClassifier {
  constructor(private rules: readonly ClassificationRule[]) {}

  static forRuntime(runtime: ScriptRuntime): FailureClassifier {
    return new FailureClassifier(buildClassificationRules(runtime));
  }

  classify(diagnostic: string): FailureClassification {
    for (const rule of this.rules) {
      for (const match of diagnostic.matchAll(globalPattern(rule.pattern))) {
        const classification = rule.build(match, diagnostic);
        if (classification) {
          logger.debug('Failure classified', { rule: rule.name, kind: classification.kind });
          return classification;
        }
      }
    }

    return { kind: 'generic', diagnostic };
  }
}
