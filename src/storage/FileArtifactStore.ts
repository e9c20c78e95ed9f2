import path from 'path';
import { AttemptMode } from '../types/index.js';
import { readFileSafe, writeFileAtomic } from '../utils/fileUtils.js';
import { logger } from '../utils/logger.js';
import {
  ArtifactStore,
  ScriptArtifact,
  artifactFileName,
  parseArtifact,
  renderArtifact,
} from './ArtifactStore.js';

/**
 * Keeps each task's script in `<outputDir>/generated_<slug><ext>`
 */
export class FileArtifactStore implements ArtifactStore {
  private outputDir: string;

  constructor(
    outputDir: string,
    private extension: string,
    private commentPrefix: string
  ) {
    this.outputDir = path.resolve(outputDir);
  }

  pathFor(task: string): string {
    return path.join(this.outputDir, artifactFileName(task, this.extension));
  }

  async write(task: string, mode: AttemptMode, body: string): Promise<ScriptArtifact> {
    const filePath = this.pathFor(task);
    await writeFileAtomic(filePath, renderArtifact(task, mode, body, this.commentPrefix));
    logger.debug('Script artifact written', { path: filePath, mode, bytes: body.length });
    return { path: filePath, task, mode, body };
  }

  async read(task: string): Promise<ScriptArtifact | null> {
    const filePath = this.pathFor(task);
    const content = await readFileSafe(filePath);
    if (content === null) return null;

    const parsed = parseArtifact(content, this.commentPrefix);
    return parsed ? { path: filePath, ...parsed } : null;
  }
}
