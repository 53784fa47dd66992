import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type Redis from "ioredis";

export const ARTIFACT_TTL_SECONDS = 24 * 60 * 60;

export type RunRef = {
  /** Relative run path, e.g. `2025-10-15/with_reflection_2025-10-15_20-00-00`. */
  key: string;
  chatId?: string;
};

/** Where run artifacts end up. Implementations may throw; RunLogger swallows. */
export interface ArtifactSink {
  write(run: RunRef, name: string, content: string): Promise<void>;
}

export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly baseDir: string) {}

  runDir(run: RunRef): string {
    return path.join(this.baseDir, ...run.key.split("/"));
  }

  async write(run: RunRef, name: string, content: string): Promise<void> {
    const dir = this.runDir(run);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, name), content, "utf8");
  }
}

function artifactKey(runKey: string, name: string): string {
  return `summary:artifact:${runKey}:${name}`;
}

function chatIndexKey(chatId: string): string {
  return `summary:artifact:index:${chatId}`;
}

/** Artifacts as expiring Redis keys, indexed per chat. */
export class RedisArtifactSink implements ArtifactSink {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds = ARTIFACT_TTL_SECONDS
  ) {}

  async write(run: RunRef, name: string, content: string): Promise<void> {
    const key = artifactKey(run.key, name);
    const value = JSON.stringify({
      runKey: run.key,
      chatId: run.chatId ?? null,
      name,
      createdAt: new Date().toISOString(),
      content,
    });

    const tx = this.redis.multi().set(key, value, "EX", this.ttlSeconds);
    if (run.chatId) {
      const indexKey = chatIndexKey(run.chatId);
      tx.sadd(indexKey, run.key).expire(indexKey, this.ttlSeconds);
    }
    await tx.exec();
  }
}
