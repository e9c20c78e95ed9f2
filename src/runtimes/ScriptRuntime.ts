/**
 * A script runtime describes everything language-specific about the
 * scripts the model writes: how they are named, run, diagnosed and cleaned.
 */

export type RuntimeName = 'python' | 'node';

export interface ProcessCommand {
  file: string;
  args: string[];
}

/**
 * A module-not-found signature. The first capture group holds the module name.
 */
export interface MissingModulePattern {
  name: string;
  pattern: RegExp;
}

export interface NormalizationRules {
  /** Lines starting with these (after trimming) are install or run commands */
  commandPrefixes: readonly string[];
  /** Lines starting with these (trimmed, lowercased) are chatty prose */
  prosePrefixes: readonly string[];
  /** Literal replacements for symbols the model tends to misspell */
  replacements: ReadonlyArray<readonly [from: string, to: string]>;
  /** Import statement to prepend when the usage pattern appears without it */
  importHints: ReadonlyArray<readonly [usage: RegExp, statement: string]>;
  /** Rewrites a top-level `return <expr>` line, if the language has no top-level return */
  bareReturn?: (expression: string) => string;
}

export interface ScriptRuntime {
  readonly name: RuntimeName;
  readonly displayName: string;
  readonly fileExtension: string;
  readonly commentPrefix: string;
  readonly fenceLanguages: readonly string[];
  /** Install command the model is told not to embed */
  readonly installHint: string;
  readonly missingModulePatterns: readonly MissingModulePattern[];
  readonly packageAliases: Readonly<Record<string, string>>;
  readonly normalization: NormalizationRules;

  /** Command that runs a script file */
  command(scriptPath: string): ProcessCommand;

  /**
   * Turn a module name from a diagnostic into an installable package name,
   * or null when the module is not something a package manager provides.
   */
  resolvePackage(moduleName: string): string | null;
}
