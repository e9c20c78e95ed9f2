import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileArtifactStore } from '../../src/storage/FileArtifactStore.js';
import { artifactFileName, parseArtifact, renderArtifact, slugify } from '../../src/storage/ArtifactStore.js';

describe('Script artifacts', () => {
  describe('slugify', () => {
    it('should keep letters and digits and join words with underscores', () => {
      expect(slugify('Print the current Date & time!')).toBe('print_the_current_date_time');
    });

    it('should truncate to 50 characters', () => {
      const slug = slugify('word '.repeat(30));
      expect(slug).toHaveLength(50);
      expect(slug.startsWith('word_word_')).toBe(true);
    });

    it('should fall back to a fixed name when nothing is left', () => {
      expect(slugify('!!!???')).toBe('task');
      expect(slugify('日本語')).toBe('task');
    });
  });

  describe('artifact format', () => {
    it('should render a two-line header before the body', () => {
      expect(renderArtifact('print date', 'Generated', 'print(1)', '#')).toBe(
        '# TASK: print date\n# MODE: Generated\nprint(1)'
      );
    });

    it('should keep the header on two lines for multi-line tasks', () => {
      expect(renderArtifact('first line\nsecond line', 'Auto-Debugged', 'x', '//')).toBe(
        '// TASK: first line second line\n// MODE: Auto-Debugged\nx'
      );
    });

    it('should parse what it renders', () => {
      const content = renderArtifact('list files', 'Auto-Debugged', 'import os\nprint(os.listdir())', '#');
      expect(parseArtifact(content, '#')).toEqual({
        task: 'list files',
        mode: 'Auto-Debugged',
        body: 'import os\nprint(os.listdir())',
      });
    });

    it('should reject content without a header', () => {
      expect(parseArtifact('print(1)', '#')).toBeNull();
      expect(parseArtifact('# TASK: x\n# MODE: Guessed\nprint(1)', '#')).toBeNull();
    });
  });

  describe('FileArtifactStore', () => {
    let tempDir: string;
    let store: FileArtifactStore;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scriptmender-artifacts-'));
      store = new FileArtifactStore(tempDir, '.py', '#');
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should derive the path from the task', () => {
      expect(store.pathFor('Fetch the weather')).toBe(path.join(tempDir, artifactFileName('Fetch the weather', '.py')));
      expect(path.basename(store.pathFor('Fetch the weather'))).toBe('generated_fetch_the_weather.py');
    });

    it('should overwrite the single artifact on every write', async () => {
      await store.write('fetch the weather', 'Generated', 'print(1)');
      await store.write('fetch the weather', 'Auto-Debugged', 'print(2)');

      const files = await fs.readdir(tempDir);
      expect(files).toEqual(['generated_fetch_the_weather.py']);

      const content = await fs.readFile(path.join(tempDir, files[0] ?? ''), 'utf8');
      expect(content).toBe('# TASK: fetch the weather\n# MODE: Auto-Debugged\nprint(2)');
    });

    it('should create the output directory when missing', async () => {
      const nested = new FileArtifactStore(path.join(tempDir, 'a', 'b'), '.mjs', '//');
      const artifact = await nested.write('say hi', 'Generated', "console.log('hi');");
      expect(artifact.path).toBe(path.join(tempDir, 'a', 'b', 'generated_say_hi.mjs'));
      expect(await nested.read('say hi')).toEqual(artifact);
    });

    it('should return null for a task that was never written', async () => {
      expect(await store.read('nothing here')).toBeNull();
    });
  });
});
