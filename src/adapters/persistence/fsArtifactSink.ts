import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ArtifactSinkPort } from "../../application/ports";
import { ArtifactWriteError, errorMessage } from "../../domain/errors";

export class FsArtifactSink implements ArtifactSinkPort {
  async write(path: string, bytes: Uint8Array): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, bytes);
    } catch (error) {
      throw new ArtifactWriteError(`No se pudo escribir ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async read(path: string): Promise<Buffer> {
    return readFile(path);
  }
}
