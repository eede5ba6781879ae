import type { FetchOutcome, ImageFetcherPort } from "../../application/ports";
import { errorMessage } from "../../domain/errors";
import { logger } from "../../utils/logger";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpImageFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  fetchFn?: FetchFn;
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug("No se pudo descartar el cuerpo", { error: errorMessage(error) });
  }
}

/** Fetcher sobre `fetch` nativo con timeout por request. */
export class HttpImageFetcher implements ImageFetcherPort {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpImageFetcherOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async fetchImage(url: string): Promise<FetchOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        signal: controller.signal,
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "image/*",
        },
      });

      if (!response.ok) {
        await discardBody(response);
        return {
          ok: false,
          retryable: isRetryableStatus(response.status),
          error: `HTTP ${response.status}`,
          httpStatus: response.status,
        };
      }

      const contentType = response.headers.get("content-type") || "";
      if (!contentType.startsWith("image/")) {
        await discardBody(response);
        return {
          ok: false,
          retryable: false,
          error: `Content-Type invalido: ${contentType || "(vacio)"}`,
          httpStatus: response.status,
        };
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      return { ok: true, bytes, contentType, httpStatus: response.status };
    } catch (error) {
      // timeout o error de conexion: siempre reintentable
      const message = controller.signal.aborted ? `timeout tras ${this.options.timeoutMs}ms` : errorMessage(error);
      logger.warn("Fetch fallido", { url, error: message });
      return { ok: false, retryable: true, error: message };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
