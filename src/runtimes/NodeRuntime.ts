import { builtinModules } from 'module';
import { NormalizationRules, ScriptRuntime } from './ScriptRuntime.js';

const nodeNormalization: NormalizationRules = {
  commandPrefixes: ['npm install', 'npm i ', 'node '],
  prosePrefixes: ['here is', 'sure,', 'to run'],
  replacements: [],
  importHints: [
    [/\bfs\./, "import fs from 'node:fs';"],
    [/\bpath\./, "import path from 'node:path';"],
    [/\bos\./, "import os from 'node:os';"],
    [/\breadline\./, "import readline from 'node:readline';"],
  ],
};

/**
 * Scripts run as ES modules on the same Node.js binary as scriptmender.
 */
export class NodeRuntime implements ScriptRuntime {
  readonly name = 'node' as const;
  readonly displayName = 'Node.js';
  readonly fileExtension = '.mjs';
  readonly commentPrefix = '//';
  readonly fenceLanguages = ['javascript', 'js', 'mjs', 'node'] as const;
  readonly installHint = 'npm install';
  readonly missingModulePatterns = [
    { name: 'package-not-found', pattern: /Cannot find package '([^']+)'/ },
    { name: 'module-not-found', pattern: /Cannot find module '([^']+)'/ },
  ];
  readonly packageAliases: Readonly<Record<string, string>> = {};
  readonly normalization = nodeNormalization;

  constructor(readonly interpreter: string = process.execPath) {}

  command(scriptPath: string) {
    return { file: this.interpreter, args: [scriptPath] };
  }

  resolvePackage(moduleName: string): string | null {
    const specifier = moduleName.trim();
    if (!specifier || specifier.startsWith('.') || specifier.startsWith('/') || specifier.startsWith('node:')) {
      return null;
    }
    // Windows drive paths and file URLs
    if (/^[A-Za-z]:[\\/]/.test(specifier) || specifier.startsWith('file:')) {
      return null;
    }

    const segments = specifier.split('/');
    const packageName = specifier.startsWith('@')
      ? segments.slice(0, 2).join('/')
      : segments[0] ?? specifier;

    if (builtinModules.includes(packageName)) {
      return null;
    }
    return this.packageAliases[packageName] ?? packageName;
  }
}
