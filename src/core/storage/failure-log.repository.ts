import { Injectable, Logger } from "@nestjs/common";
import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { FailureEntry } from "../records";

/**
 * Append-only JSON-lines failure log. Writes are chained so entries land
 * in the order they were recorded; `flush` waits for the chain to drain.
 */
@Injectable()
export class FailureLogRepository {
  private readonly logger = new Logger(FailureLogRepository.name);
  private pending: Promise<void> = Promise.resolve();

  record(filePath: string, entry: FailureEntry): void {
    this.pending = this.pending
      .then(async () => {
        await mkdir(dirname(filePath), { recursive: true });
        await appendFile(filePath, `${JSON.stringify(entry)}\n`, "utf-8");
      })
      .catch((error: unknown) => {
        const errorStack = error instanceof Error ? error.stack : "";
        this.logger.error(
          "Failed to append failure log entry",
          {
            operation: "record",
            filePath,
            stage: entry.stage,
            kind: entry.kind,
            sourceId: entry.sourceId,
            timestamp: new Date().toISOString(),
          },
          errorStack,
        );
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}
