import { plainToInstance } from "class-transformer";
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from "class-validator";

/**
 * Environment schema. Values arrive as strings and are converted by
 * class-transformer before validation.
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(0)
  REQUEST_DELAY_MS = 500;

  @IsInt()
  @Min(1)
  FETCH_TIMEOUT_MS = 30000;

  @IsInt()
  @Min(1)
  @Max(10)
  FETCH_MAX_ATTEMPTS = 3;

  @IsInt()
  @Min(0)
  FETCH_BACKOFF_MS = 2000;

  @IsInt()
  @Min(1)
  FETCH_CONCURRENCY = 4;

  @IsInt()
  @Min(0)
  STATIC_MIN_TEXT_LENGTH = 300;

  @IsInt()
  @Min(0)
  RENDER_SETTLE_MS = 5000;

  @IsInt()
  @Min(0)
  @Max(50)
  RENDER_MAX_SCROLLS = 6;

  @IsInt()
  @Min(0)
  RENDER_SCROLL_PAUSE_MS = 1000;

  @IsOptional()
  @IsString()
  RENDER_SNAPSHOT_DIR?: string;

  @IsOptional()
  @IsString()
  CHROMIUM_EXECUTABLE_PATH?: string;

  @IsInt()
  @Min(0)
  MAX_SECTION_LINKS = 3;

  @IsInt()
  @Min(0)
  @Max(50)
  MAX_PAGINATION_PAGES = 10;

  @IsInt()
  @Min(0)
  MIN_CONTENT_LENGTH = 150;

  @IsInt()
  @Min(1)
  TOP_KEYWORDS = 20;

  @IsInt()
  @Min(1)
  SUMMARY_SENTENCES = 3;

  @IsInt()
  @Min(1)
  CLUSTER_TOP_N = 10;

  @IsNumber()
  @Min(0)
  @Max(1)
  CLUSTER_SIMILARITY = 0.3;

  @IsNumber()
  @Min(0)
  @Max(1)
  NAME_SIMILARITY = 0.85;

  @IsInt()
  @Min(1)
  COOCCURRENCE_TERMS = 30;

  @IsInt()
  @Min(1)
  COOCCURRENCE_WINDOW = 2;

  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  SUMMARIZER_ENDPOINT?: string;

  @IsString()
  SUMMARIZER_MODEL = "mistral";
}

export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {}).join(", ") || error.property,
      )
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return validatedConfig;
}
