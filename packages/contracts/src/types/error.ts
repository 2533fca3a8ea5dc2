import type { z } from "zod";

/**
 * Error codes for data handed to the core from outside.
 */
export type CrawlErrorCode =
  | "SETTINGS_INVALID"
  | "SAVE_INVALID"
  | "CATALOG_INVALID"
  | "FLOOR_CONFIG_INVALID";

/**
 * Unified error type for every parsing boundary of the core.
 *
 * @example
 * ```typescript
 * const error = CrawlError.saveInvalid("floorLevel must be positive", {
 *   floorLevel: 0,
 * });
 * ```
 */
export class CrawlError extends Error {
  override readonly name = "CrawlError";

  constructor(
    public readonly code: CrawlErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CrawlError);
    }
  }

  static settingsInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): CrawlError {
    return new CrawlError("SETTINGS_INVALID", message, details);
  }

  static saveInvalid(message: string, details?: Record<string, unknown>): CrawlError {
    return new CrawlError("SAVE_INVALID", message, details);
  }

  static catalogInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): CrawlError {
    return new CrawlError("CATALOG_INVALID", message, details);
  }

  static floorConfigInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): CrawlError {
    return new CrawlError("FLOOR_CONFIG_INVALID", message, details);
  }

  /**
   * Wrap a zod failure, keeping one line per issue with its path.
   */
  static fromZod(code: CrawlErrorCode, error: z.ZodError): CrawlError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.map(String).join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    });
    return new CrawlError(code, issues[0] ?? "Invalid input", { issues });
  }

  static isCrawlError(error: unknown): error is CrawlError {
    return error instanceof CrawlError;
  }

  toJSON(): {
    name: string;
    code: CrawlErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
