/**
 * Model Resolver / Cache
 *
 * cache-aside でモデルを解決する:
 * 1. EFS (ローカルマウント) を読む
 * 2. ミスなら S3 からダウンロードして EFS に書き戻す
 *
 * キャッシュに有効期限はない。S3 から取得したバイト列の SHA-256 を
 * `<identifier>.sha256` に保存し、読み込み時に一致しなければ破棄して再取得する。
 * ダウンロード中はスタンプを外しておくので、並行して読む側は新しいファイルを
 * スタンプなし (信頼) として扱い、破棄しない。
 * 同一 identifier に対する並行 resolve はロックしない (書き込みは冪等)。
 */

import { createHash } from "crypto";
import { readFile, rm } from "fs/promises";
import * as path from "path";
import { type BlobStore, writeFileAtomic } from "./blob-store";
import { CorruptArtifactError, InvalidModelIdentifierError } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { Model, ModelCodec } from "./model";

export interface ModelCacheOptions {
  /** Local mount root, e.g. /mnt/models */
  localRoot: string;
  bucket: string;
  keyPrefix?: string;
  blobStore: BlobStore;
  codec: ModelCodec;
  logger?: Logger;
}

export interface ResolveOptions {
  /** Skip the local read and fetch from the bucket. */
  forceRefresh?: boolean;
}

export type LocalReadResult =
  | { kind: "hit"; model: Model }
  | { kind: "miss" }
  | { kind: "stale" };

const CHECKSUM_SUFFIX = ".sha256";

const sha256 = (bytes: Uint8Array): string => createHash("sha256").update(bytes).digest("hex");

function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function readIfExists(filePath: string): Promise<Buffer | undefined> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) return undefined;
    throw error;
  }
}

export function validateIdentifier(identifier: string): void {
  const segments = identifier.split(/[\\/]/);
  if (
    identifier.trim() === "" ||
    path.isAbsolute(identifier) ||
    segments.some((segment) => segment === ".." || segment === "")
  ) {
    throw new InvalidModelIdentifierError(identifier);
  }
}

export class ModelCache {
  private readonly logger: Logger;
  private readonly keyPrefix: string;

  constructor(private readonly options: ModelCacheOptions) {
    this.logger = options.logger ?? createLogger("model-cache");
    this.keyPrefix = options.keyPrefix ?? "";
  }

  localPath(identifier: string): string {
    return path.join(this.options.localRoot, identifier);
  }

  remoteKey(identifier: string): string {
    return `${this.keyPrefix}${identifier}`;
  }

  async resolve(identifier: string, { forceRefresh = false }: ResolveOptions = {}): Promise<Model> {
    validateIdentifier(identifier);

    if (!forceRefresh) {
      const local = await this.readLocal(identifier);
      if (local.kind === "hit") {
        this.logger.debug("Loaded model from local cache", { identifier });
        return local.model;
      }
      this.logger.debug("Local cache unusable, loading from bucket", {
        identifier,
        reason: local.kind,
      });
    }

    return this.fetchRemote(identifier);
  }

  /** Independent resolves in order; the first failure propagates. */
  async resolveAll(identifiers: readonly string[], options?: ResolveOptions): Promise<Model[]> {
    const models: Model[] = [];
    for (const identifier of identifiers) {
      models.push(await this.resolve(identifier, options));
    }
    return models;
  }

  async readLocal(identifier: string): Promise<LocalReadResult> {
    const filePath = this.localPath(identifier);
    const bytes = await readIfExists(filePath);
    if (!bytes) return { kind: "miss" };

    const checksum = await readIfExists(filePath + CHECKSUM_SUFFIX);
    if (checksum && checksum.toString("utf-8").trim() !== sha256(bytes)) {
      this.logger.warn("Checksum mismatch, evicting cached model", { identifier, path: filePath });
      await this.evict(identifier);
      return { kind: "stale" };
    }

    return { kind: "hit", model: this.deserialize(filePath, bytes) };
  }

  async evict(identifier: string): Promise<void> {
    const filePath = this.localPath(identifier);
    await rm(filePath, { force: true });
    await rm(filePath + CHECKSUM_SUFFIX, { force: true });
  }

  private async fetchRemote(identifier: string): Promise<Model> {
    const filePath = this.localPath(identifier);
    const key = this.remoteKey(identifier);

    await rm(filePath + CHECKSUM_SUFFIX, { force: true });
    const bytes = await this.options.blobStore.download(this.options.bucket, key, filePath);
    this.logger.debug("Downloaded model from bucket, saved to local cache", {
      identifier,
      bucket: this.options.bucket,
      key,
      path: filePath,
    });

    await writeFileAtomic(filePath + CHECKSUM_SUFFIX, Buffer.from(sha256(bytes)));

    return this.deserialize(filePath, bytes);
  }

  private deserialize(filePath: string, bytes: Buffer): Model {
    try {
      return this.options.codec.deserialize(bytes);
    } catch (error) {
      throw new CorruptArtifactError(filePath, { cause: error });
    }
  }
}

/**
 * Lazily-initialised value with an explicit lifecycle.
 *
 * 最初の get() でローダーを実行し、以降は同じ Promise を返す。
 * 失敗した場合は保持しないので、次の呼び出しで再試行される。
 */
export class LazyModels<T> {
  private pending?: Promise<T>;

  constructor(private readonly loader: () => Promise<T>) {}

  get(): Promise<T> {
    if (this.pending) return this.pending;

    const pending = this.loader();
    this.pending = pending;
    pending.catch(() => {
      if (this.pending === pending) this.pending = undefined;
    });
    return pending;
  }

  get loaded(): boolean {
    return this.pending !== undefined;
  }

  reset(): void {
    this.pending = undefined;
  }
}
