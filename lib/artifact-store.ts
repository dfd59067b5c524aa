import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { absolutizeManifest } from './manifest';

const ARTIFACT_ID = /^[a-f0-9]{16}$/;
const EXTENSION = '.m3u8';

export const isArtifactId = (id: string): boolean => ARTIFACT_ID.test(id);

/**
 * Content-addressed store for resolved media manifests. The id is the first
 * 16 hex characters of the SHA-256 of the stored body, so identical upstream
 * content maps to one file.
 */
export class ArtifactStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(process.cwd(), dir);
  }

  private filePath(id: string): string {
    return path.join(this.dir, `${id}${EXTENSION}`);
  }

  save(manifest: string, manifestUrl: string): string {
    const content = absolutizeManifest(manifest, manifestUrl);
    const id = crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
    const target = this.filePath(id);

    if (!fs.existsSync(target)) {
      fs.mkdirSync(this.dir, { recursive: true });
      const tmp = `${target}.${process.pid}.tmp`;
      fs.writeFileSync(tmp, content, 'utf-8');
      fs.renameSync(tmp, target);
    }
    return id;
  }

  read(id: string): string | null {
    if (!isArtifactId(id)) return null;
    try {
      return fs.readFileSync(this.filePath(id), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  clear(): number {
    if (!fs.existsSync(this.dir)) return 0;
    let removed = 0;
    for (const file of fs.readdirSync(this.dir)) {
      if (!file.endsWith(EXTENSION)) continue;
      fs.unlinkSync(path.join(this.dir, file));
      removed++;
    }
    return removed;
  }
}
