#!/usr/bin/env node
import "reflect-metadata";
import { INestApplicationContext, Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { Command } from "commander";
import { AppModule } from "./app.module";
import {
  PipelineService,
  RunSummary,
} from "./modules/pipeline/services/pipeline.service";
import { RunContext } from "./core/run/run-context";
import {
  PipelineError,
  RunCancelledError,
  errorMessage,
  errorStack,
} from "./common/errors/pipeline.errors";

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  CANCELLED: 130,
} as const;

interface CommandOptions {
  out: string;
  verbose?: boolean;
}

const logger = new Logger("Cli");

function logLevels(verbose: boolean): LogLevel[] {
  return verbose
    ? ["fatal", "error", "warn", "log", "debug", "verbose"]
    : ["fatal", "error", "warn", "log"];
}

/**
 * Exit status of a finished run: success needs at least one live document
 */
export function exitCodeFor(summary: RunSummary): number {
  return summary.liveDocumentCount > 0 ? EXIT_CODES.OK : EXIT_CODES.FAILURE;
}

async function execute(
  options: CommandOptions,
  run: (pipeline: PipelineService, ctx: RunContext) => Promise<RunSummary>,
): Promise<number> {
  let app: INestApplicationContext | null = null;
  let ctx: RunContext | null = null;
  const onInterrupt = () => {
    logger.warn("Interrupt received, cancelling run");
    ctx?.cancel("Run interrupted");
  };
  process.once("SIGINT", onInterrupt);

  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: logLevels(options.verbose ?? false),
    });
    const pipeline = app.get(PipelineService);
    ctx = pipeline.createRunContext(options.out);

    const summary = await run(pipeline, ctx);
    logger.log(
      `Run ${summary.runId}: ${summary.liveDocumentCount}/${summary.documentCount} live documents, ` +
        `${summary.profileCount} profiles, ${summary.failureCount} failures`,
    );
    return exitCodeFor(summary);
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.warn(`${error.message}; partial output kept in ${options.out}`);
      return EXIT_CODES.CANCELLED;
    }
    if (error instanceof PipelineError) {
      logger.error(`${error.kind}: ${error.message}`);
      return EXIT_CODES.FAILURE;
    }
    logger.error(`Unexpected failure: ${errorMessage(error)}`, errorStack(error));
    return EXIT_CODES.FAILURE;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await app?.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("market-intel")
    .description(
      "Crawl a list of web sources, analyse their content and build consolidated organisation profiles",
    )
    .version("0.1.0");

  program
    .command("run")
    .description("Run the full pipeline over a CSV source list")
    .argument("<sources>", "CSV file with url,strategy,category columns")
    .option("-o, --out <dir>", "Output directory", "output")
    .option("-v, --verbose", "Enable debug logging")
    .action(async (sources: string, options: CommandOptions) => {
      process.exitCode = await execute(options, (pipeline, ctx) =>
        pipeline.runFull(sources, options.out, ctx),
      );
    });

  program
    .command("analyze")
    .description("Re-run analysis and aggregation over an existing cleaned corpus")
    .argument("<cleaned>", "cleaned.json written by a previous run")
    .option("-o, --out <dir>", "Output directory", "output")
    .option("-v, --verbose", "Enable debug logging")
    .action(async (cleaned: string, options: CommandOptions) => {
      process.exitCode = await execute(options, (pipeline, ctx) =>
        pipeline.runAnalysis(cleaned, options.out, ctx),
      );
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error(errorMessage(error), errorStack(error));
      process.exitCode = EXIT_CODES.FAILURE;
    });
}
