/**
 * Error classes for whole-input failures. Per-row problems are never thrown;
 * importers collect them into their reports instead.
 */

export class InventoryImportError extends Error {
  constructor(message: string, readonly fileName: string | null = null) {
    super(message);
    this.name = "InventoryImportError";
  }
}

export class WantlistParseError extends Error {
  constructor(message: string, readonly fileName: string | null = null) {
    super(message);
    this.name = "WantlistParseError";
  }
}

export class ConfigError extends Error {
  constructor(message = "Invalid configuration") {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
