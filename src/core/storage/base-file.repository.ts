import { Logger } from "@nestjs/common";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";

/**
 * Shared JSON file helpers for the record repositories
 */
export abstract class BaseFileRepository {
  protected readonly logger = new Logger(this.constructor.name);

  protected async writeJson(filePath: string, data: unknown): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
  }

  protected async readJson(filePath: string): Promise<unknown> {
    const content = await readFile(filePath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }
}
