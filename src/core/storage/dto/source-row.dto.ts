import { Transform } from "class-transformer";
import { IsIn, IsString, IsUrl } from "class-validator";
import {
  SOURCE_CATEGORIES,
  STRATEGY_HINTS,
  SourceCategory,
  StrategyHint,
} from "../../records";

const lowerOr =
  (fallback: string) =>
  ({ value }: { value: unknown }): unknown =>
    typeof value === "string" && value.trim().length > 0
      ? value.trim().toLowerCase()
      : fallback;

/**
 * One row of the source list file: url, strategy hint, category tag
 */
export class SourceRowDto {
  @IsString()
  @IsUrl(
    {
      protocols: ["http", "https"],
      require_protocol: true,
      require_valid_protocol: true,
    },
    { message: "url must be a valid http:// or https:// URL" },
  )
  url!: string;

  @Transform(lowerOr("auto"))
  @IsIn(STRATEGY_HINTS, {
    message: `strategy must be one of: ${STRATEGY_HINTS.join(", ")}`,
  })
  strategy: StrategyHint = "auto";

  @Transform(lowerOr("company"))
  @IsIn(SOURCE_CATEGORIES, {
    message: `category must be one of: ${SOURCE_CATEGORIES.join(", ")}`,
  })
  category: SourceCategory = "company";
}
