import { Inject, Injectable, Logger } from "@nestjs/common";
import axios, { AxiosError, AxiosInstance } from "axios";
import * as crypto from "crypto";
import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";
import { PageRetriever, RetrievedPage } from "./page-retriever";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import { DEFAULT_USER_AGENT } from "../../../common/constants/string-const";
import {
  FetchFailedError,
  FetchTransientError,
} from "../../../common/errors/pipeline.errors";

const TRANSIENT_CODES = new Set([
  "ECONNABORTED",
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
]);

/**
 * Plain HTTP retrieval with keep-alive agents
 */
@Injectable()
export class StaticPageRetriever implements PageRetriever {
  readonly strategy = "static" as const;
  private readonly logger = new Logger(StaticPageRetriever.name);
  private readonly client: AxiosInstance;

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {
    this.client = axios.create({
      timeout: settings.fetchTimeoutMs,
      httpAgent: new HttpAgent({
        keepAlive: true,
        maxSockets: 10,
        maxFreeSockets: 5,
        timeout: settings.fetchTimeoutMs,
      }),
      httpsAgent: new HttpsAgent({
        keepAlive: true,
        maxSockets: 10,
        maxFreeSockets: 5,
        timeout: settings.fetchTimeoutMs,
      }),
      headers: {
        "User-Agent": DEFAULT_USER_AGENT,
        Accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9,fr;q=0.8",
        "Cache-Control": "no-cache",
        Pragma: "no-cache",
      },
      responseType: "text",
      maxRedirects: 5,
      validateStatus: (status) => status < 400,
    });
  }

  async retrieve(url: string): Promise<RetrievedPage> {
    const requestId = crypto.randomUUID();

    this.logger.debug("Fetching HTML", {
      operation: "retrieve",
      requestId,
      url,
      timestamp: new Date().toISOString(),
    });

    try {
      const response = await this.client.get<unknown>(url);

      if (typeof response.data !== "string") {
        throw new FetchFailedError("Malformed response: body is not text");
      }

      const contentType = String(response.headers["content-type"] ?? "");
      if (contentType && !/html|xml|text\/plain/i.test(contentType)) {
        throw new FetchFailedError(
          `Unsupported content type: ${contentType}`,
          response.status,
        );
      }

      const finalUrl =
        typeof response.request?.res?.responseUrl === "string"
          ? response.request.res.responseUrl
          : url;

      this.logger.debug("HTML fetched successfully", {
        operation: "retrieve",
        requestId,
        url,
        statusCode: response.status,
        contentLength: response.data.length,
        timestamp: new Date().toISOString(),
      });

      return { url: finalUrl, status: response.status, html: response.data };
    } catch (error) {
      const classified = classifyFetchError(error);

      this.logger.warn("Failed to fetch HTML", {
        operation: "retrieve",
        requestId,
        url,
        statusCode: classified.statusCode,
        kind: classified.kind,
        error: classified.message,
        timestamp: new Date().toISOString(),
      });

      throw classified;
    }
  }
}

/**
 * Map an axios (or other) error onto the transient/permanent split
 */
export function classifyFetchError(
  error: unknown,
): FetchTransientError | FetchFailedError {
  if (error instanceof FetchTransientError || error instanceof FetchFailedError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const axiosError: AxiosError = error;
    const statusCode = axiosError.response?.status;

    if (statusCode !== undefined) {
      if (statusCode >= 500 || statusCode === 429 || statusCode === 408) {
        return new FetchTransientError(`HTTP ${statusCode}`, statusCode);
      }
      return new FetchFailedError(`HTTP ${statusCode}`, statusCode);
    }

    const code = axiosError.code ?? "";
    if (TRANSIENT_CODES.has(code)) {
      const message =
        code === "ECONNABORTED" || code === "ETIMEDOUT"
          ? "Request timeout"
          : code === "ECONNRESET"
            ? "Connection reset by server"
            : code === "ECONNREFUSED"
              ? "Connection refused"
              : axiosError.message;
      return new FetchTransientError(message);
    }
    if (code === "ENOTFOUND") {
      return new FetchFailedError("DNS resolution failed");
    }
    return new FetchFailedError(axiosError.message);
  }

  return new FetchFailedError(
    error instanceof Error ? error.message : String(error),
  );
}
