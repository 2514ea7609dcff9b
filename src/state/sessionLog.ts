import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { formatElapsed } from "../format.js";
import type { SessionSegment } from "../types.js";

export interface SessionLog {
  save(segments: SessionSegment[]): Promise<void>;
}

export function formatSessionLog(segments: SessionSegment[]): string {
  return segments.map(segment => `${formatElapsed(segment.seconds, true)} ${segment.kind}`).join("\n");
}

/** Rewrites the whole log on every save; writes are serialised. */
export class SessionFileLog implements SessionLog {
  private pending = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async save(segments: SessionSegment[]): Promise<void> {
    const serialized = formatSessionLog(segments);
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }
}
