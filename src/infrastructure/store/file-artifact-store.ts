import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { ArtifactMap, ArtifactName, ArtifactStore } from '../../application/index.js';
import { artifactSchemas } from './artifact-schemas.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Writes `data` through a temporary sibling so readers never see a partial file. */
export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  await rename(tmp, path);
}

/** Stage artifacts stored as `<outputDir>/<name>.json`. */
export class FileArtifactStore implements ArtifactStore {
  constructor(
    private readonly outputDir: string,
    private readonly log: Logger,
  ) {}

  pathOf(name: ArtifactName): string {
    return join(this.outputDir, `${name}.json`);
  }

  async load<K extends ArtifactName>(name: K): Promise<ArtifactMap[K] | null> {
    const path = this.pathOf(name);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err: unknown) {
      this.log.warn({ err, path }, 'Artifact is not valid JSON');
      return null;
    }

    const parsed = artifactSchemas[name].safeParse(json);
    if (!parsed.success) {
      this.log.warn({ path, issues: parsed.error.issues.slice(0, 5) }, 'Artifact failed validation');
      return null;
    }
    return parsed.data;
  }

  async save<K extends ArtifactName>(name: K, value: ArtifactMap[K]): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await writeJsonFile(this.pathOf(name), value);
    this.log.debug({ artifact: name }, 'Artifact saved');
  }

  async remove(name: ArtifactName): Promise<void> {
    await rm(this.pathOf(name), { force: true });
    this.log.debug({ artifact: name }, 'Artifact removed');
  }
}
