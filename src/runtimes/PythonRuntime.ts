import { NormalizationRules, ScriptRuntime } from './ScriptRuntime.js';

export const PYTHON_PACKAGE_ALIASES: Readonly<Record<string, string>> = {
  bs4: 'beautifulsoup4',
  sklearn: 'scikit-learn',
  cv2: 'opencv-python',
  PIL: 'Pillow',
  yaml: 'PyYAML',
};

const pythonNormalization: NormalizationRules = {
  commandPrefixes: ['pip install', 'python ', 'python3 '],
  prosePrefixes: ['here is', 'sure,', 'to run'],
  replacements: [
    ['beautiful_soup', 'BeautifulSoup'],
    ['from bs4 import bs4', 'import bs4'],
  ],
  importHints: [
    [/\brequests\./, 'import requests'],
    [/\bjson\./, 'import json'],
    [/\bsys\./, 'import sys'],
    [/\bos\./, 'import os'],
    [/\bpd\./, 'import pandas as pd'],
    [/\bnp\./, 'import numpy as np'],
    [/\bBeautifulSoup\b/, 'from bs4 import BeautifulSoup'],
    [/\byf\./, 'import yfinance as yf'],
  ],
  bareReturn: expression => `print(${expression})`,
};

export class PythonRuntime implements ScriptRuntime {
  readonly name = 'python' as const;
  readonly displayName = 'Python';
  readonly fileExtension = '.py';
  readonly commentPrefix = '#';
  readonly fenceLanguages = ['python', 'python3', 'py'] as const;
  readonly installHint = 'pip install';
  readonly missingModulePatterns = [
    { name: 'module-not-found', pattern: /ModuleNotFoundError: No module named '([^']+)'/ },
    { name: 'legacy-import-error', pattern: /ImportError: No module named '?([A-Za-z0-9_.]+)'?/ },
  ];
  readonly packageAliases = PYTHON_PACKAGE_ALIASES;
  readonly normalization = pythonNormalization;

  constructor(readonly interpreter: string = 'python3') {}

  command(scriptPath: string) {
    return { file: this.interpreter, args: [scriptPath] };
  }

  resolvePackage(moduleName: string): string | null {
    const trimmed = moduleName.trim();
    if (!trimmed) return null;
    return this.packageAliases[trimmed] ?? trimmed;
  }
}
