import { Injectable, Logger } from "@nestjs/common";
import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import { parse } from "csv-parse";
import { readFile } from "fs/promises";
import { SourceRowDto } from "./dto/source-row.dto";
import { Source } from "../records";
import { InvalidSourceListError } from "../../common/errors/pipeline.errors";
import { domainOf, normalizeUrl } from "../../common/helpers/url.helper";

const COLUMN_ALIASES: Record<string, string> = {
  hint: "strategy",
  mode: "strategy",
  tag: "category",
  type: "category",
  site: "url",
};

export interface RejectedSourceRow {
  line: number;
  url: string;
  reason: string;
}

export interface SourceList {
  sources: Source[];
  rejected: RejectedSourceRow[];
}

/**
 * Loads the tabular source list (url, strategy, category)
 */
@Injectable()
export class SourceListReader {
  private readonly logger = new Logger(SourceListReader.name);

  async read(filePath: string): Promise<SourceList> {
    this.logger.log("Reading source list", {
      operation: "read",
      filePath,
      timestamp: new Date().toISOString(),
    });

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidSourceListError(
        `Cannot read source list ${filePath}: ${message}`,
      );
    }

    return this.parseContent(content);
  }

  /**
   * Parse CSV content. Rows failing validation are returned as rejected,
   * duplicate URLs keep their first occurrence.
   */
  async parseContent(content: string): Promise<SourceList> {
    const rows = await parseCsv(content);

    if (rows.length > 0 && !("url" in rows[0])) {
      throw new InvalidSourceListError(
        "Source list must have a header row with a `url` column",
      );
    }

    const sources: Source[] = [];
    const rejected: RejectedSourceRow[] = [];
    const seen = new Set<string>();

    rows.forEach((row, index) => {
      // header is line 1
      const line = index + 2;
      const dto = plainToInstance(SourceRowDto, row);
      const errors = validateSync(dto);
      const rawUrl = typeof row.url === "string" ? row.url : "";

      if (errors.length > 0) {
        const reason = errors
          .flatMap((error) => Object.values(error.constraints ?? {}))
          .join("; ");
        this.logger.warn("Invalid source row skipped", {
          operation: "parseContent",
          line,
          url: rawUrl,
          reason,
          timestamp: new Date().toISOString(),
        });
        rejected.push({ line, url: rawUrl, reason });
        return;
      }

      const id = normalizeUrl(dto.url);
      if (seen.has(id)) {
        this.logger.debug(`Duplicate source ${id} on line ${line} ignored`);
        return;
      }
      seen.add(id);

      sources.push({
        id,
        url: dto.url.trim(),
        domain: domainOf(dto.url),
        hint: dto.strategy,
        category: dto.category,
      });
    });

    this.logger.log("Source list parsed", {
      operation: "parseContent",
      sourceCount: sources.length,
      rejectedCount: rejected.length,
      timestamp: new Date().toISOString(),
    });

    return { sources, rejected };
  }
}

function parseCsv(content: string): Promise<Record<string, unknown>[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
        columns: (header: string[]) =>
          header.map((name) => {
            const key = name.trim().toLowerCase();
            return COLUMN_ALIASES[key] ?? key;
          }),
      },
      (error, records: unknown) => {
        if (error) {
          reject(
            new InvalidSourceListError(`Malformed source list: ${error.message}`),
          );
          return;
        }
        if (!Array.isArray(records)) {
          resolve([]);
          return;
        }
        resolve(
          records.filter(
            (record): record is Record<string, unknown> =>
              typeof record === "object" && record !== null,
          ),
        );
      },
    );
  });
}
