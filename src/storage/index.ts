import { ScriptMenderConfig } from '../config/index.js';
import { ScriptRuntime } from '../runtimes/index.js';
import { ArtifactStore } from './ArtifactStore.js';
import { FileArtifactStore } from './FileArtifactStore.js';

/**
 * Create the artifact store for a runtime
 */
export function createArtifactStore(config: ScriptMenderConfig, runtime: ScriptRuntime): ArtifactStore {
  return new FileArtifactStore(config.loop.outputDir, runtime.fileExtension, runtime.commentPrefix);
}

export * from './ArtifactStore.js';
export * from './FileArtifactStore.js';
