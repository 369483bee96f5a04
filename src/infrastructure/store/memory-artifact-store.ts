import type { ArtifactMap, ArtifactName, ArtifactStore } from '../../application/index.js';

/** Artifact store kept in process memory; used by tests and dry runs. */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly artifacts: { [K in ArtifactName]?: ArtifactMap[K] } = {};

  load<K extends ArtifactName>(name: K): Promise<ArtifactMap[K] | null> {
    return Promise.resolve(this.artifacts[name] ?? null);
  }

  save<K extends ArtifactName>(name: K, value: ArtifactMap[K]): Promise<void> {
    this.artifacts[name] = structuredClone(value);
    return Promise.resolve();
  }

  remove(name: ArtifactName): Promise<void> {
    delete this.artifacts[name];
    return Promise.resolve();
  }

  has(name: ArtifactName): boolean {
    return this.artifacts[name] !== undefined;
  }
}
