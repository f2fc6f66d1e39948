import type { ErrorBody } from "./types.ts";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

export interface WaymarkErrorOptions {
  /** Defaults to 500. */
  status?: number;
  /** Defaults to `INTERNAL_ERROR`. */
  code?: string;
  details?: unknown;
  /**
   * `false` marks a fault on the server side, which the dispatcher logs.
   * Defaults to `true` below 500.
   */
  operational?: boolean;
  cause?: unknown;
}

/**
 * Base class of every error that knows its HTTP answer.
 *
 * Guards, handlers and extractors throw these; the dispatcher turns them into
 * responses with {@link WaymarkError.toResponse}.
 *
 * @example
 * ```typescript
 * throw new WaymarkError("Quota exceeded", { status: 429, code: "QUOTA" });
 * ```
 */
export class WaymarkError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details: unknown;
  readonly isOperational: boolean;

  constructor(message: string, options: WaymarkErrorOptions = {}) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "WaymarkError";
    this.status = options.status ?? 500;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.details = options.details;
    this.isOperational = options.operational ?? this.status < 500;
  }

  /**
   * Response body. `details` and `stack` are only included in development.
   */
  toJSON(development = false): ErrorBody {
    const body: ErrorBody["error"] = {
      message: this.message,
      code: this.code,
      status: this.status,
      ...this.publicFields(),
    };

    if (development) {
      if (this.details !== undefined) body.details = this.details;

      const frames = this.stack?.split("\n").slice(1).map((frame) =>
        frame.trim()
      );
      if (frames?.length) body.stack = frames;
    }

    return { error: body };
  }

  toResponse(development = false): Response {
    return new Response(JSON.stringify(this.toJSON(development)), {
      status: this.status,
      headers: { ...this.headers(), "Content-Type": JSON_CONTENT_TYPE },
    });
  }

  /** Body fields sent in every mode. */
  protected publicFields(): Pick<ErrorBody["error"], "allowed"> {
    return {};
  }

  /** Response headers besides Content-Type. */
  protected headers(): Record<string, string> {
    return {};
  }
}
