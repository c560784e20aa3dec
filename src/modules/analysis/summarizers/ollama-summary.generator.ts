import { Inject, Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance } from "axios";
import * as crypto from "crypto";
import { SummaryGenerator } from "./summary-generator";
import { CleanedDocument } from "../../../core/records";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  errorMessage,
  errorStack,
} from "../../../common/errors/pipeline.errors";

const MAX_PROMPT_TEXT = 4000;
const GENERATION_TIMEOUT_MS = 60000;

interface GenerateResponse {
  response?: unknown;
}

const PROMPTS: Record<string, string> = {
  fr: "Résume en trois phrases l'activité de l'entreprise décrite ci-dessous :",
  en: "Summarize in three sentences what the company described below does:",
};

/**
 * Local generative summaries through an Ollama-compatible /api/generate
 * endpoint. Disabled when no endpoint is configured.
 */
@Injectable()
export class OllamaSummaryGenerator implements SummaryGenerator {
  private readonly logger = new Logger(OllamaSummaryGenerator.name);
  private readonly client: AxiosInstance | null;

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {
    this.client = settings.summarizerEndpoint
      ? axios.create({
          baseURL: settings.summarizerEndpoint,
          timeout: GENERATION_TIMEOUT_MS,
          headers: { "Content-Type": "application/json" },
        })
      : null;
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  async generate(document: CleanedDocument): Promise<string | null> {
    if (!this.client) {
      return null;
    }
    const requestId = crypto.randomUUID();
    const prompt = `${PROMPTS[document.language] ?? PROMPTS.en}\n\n${document.text.slice(0, MAX_PROMPT_TEXT)}`;

    try {
      const { data } = await this.client.post<GenerateResponse>(
        "/api/generate",
        {
          model: this.settings.summarizerModel,
          prompt,
          stream: false,
        },
      );
      const summary =
        typeof data.response === "string" ? data.response.trim() : "";
      return summary || null;
    } catch (error) {
      this.logger.warn(
        "Generative summary failed",
        {
          operation: "generate",
          requestId,
          documentId: document.id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        },
        errorStack(error),
      );
      return null;
    }
  }
}
