import { createHash } from "node:crypto";

export function computeSha256(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

/** Clave de cache: sha256 de la URL tal cual llega (sin normalizar). */
export function cacheKeyForUrl(url: string): string {
  return createHash("sha256").update(url, "utf8").digest("hex");
}

export function getStoragePathPrefix(sha256: string): string {
  return sha256.substring(0, 2);
}

export function getBlobStoragePath(contentHash: string): string {
  const prefix = getStoragePathPrefix(contentHash);
  return `blobs/${prefix}/${contentHash}`;
}
