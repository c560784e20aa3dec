import { Type } from "class-transformer";
import {
  IsArray,
  IsBoolean,
  IsHexadecimal,
  IsIn,
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsString,
  ValidateIf,
  ValidateNested,
} from "class-validator";
import {
  CleanedDocument,
  LANGUAGE_TAGS,
  LanguageTag,
  SOURCE_CATEGORIES,
  SectionLabel,
  SourceCategory,
} from "../../records";

export class DocumentSectionsDto implements Record<SectionLabel, string> {
  @IsString()
  about!: string;

  @IsString()
  services!: string;

  @IsString()
  clients!: string;

  @IsString()
  technologies!: string;

  @IsString()
  jobs!: string;

  @IsString()
  blog!: string;

  @IsString()
  contact!: string;
}

/**
 * One record of a cleaned corpus read back from disk for re-analysis
 */
export class CleanedDocumentDto implements CleanedDocument {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  captureId!: string;

  @IsString()
  @IsNotEmpty()
  sourceId!: string;

  @IsString()
  url!: string;

  @IsString()
  domain!: string;

  @ValidateIf((_, value) => value !== null)
  @IsString()
  entityDomain!: string | null;

  @IsIn(SOURCE_CATEGORIES, {
    message: `category must be one of: ${SOURCE_CATEGORIES.join(", ")}`,
  })
  category!: SourceCategory;

  @IsISO8601()
  capturedAt!: string;

  @IsString()
  name!: string;

  @IsString()
  title!: string;

  @IsString()
  location!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => DocumentSectionsDto)
  sections!: DocumentSectionsDto;

  @IsArray()
  @IsString({ each: true })
  emails!: string[];

  @IsArray()
  @IsString({ each: true })
  phones!: string[];

  @IsArray()
  @IsString({ each: true })
  technologies!: string[];

  @IsArray()
  @IsString({ each: true })
  services!: string[];

  @IsArray()
  @IsString({ each: true })
  offers!: string[];

  @IsArray()
  @IsString({ each: true })
  novelties!: string[];

  @IsString()
  @IsNotEmpty()
  text!: string;

  @IsHexadecimal()
  fingerprint!: string;

  @IsIn(LANGUAGE_TAGS, {
    message: `language must be one of: ${LANGUAGE_TAGS.join(", ")}`,
  })
  language!: LanguageTag;

  @IsBoolean()
  live!: boolean;
}
