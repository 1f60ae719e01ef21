// src/errors.ts
//
// Every failure here is scoped to one user's turn; none of them stops the process.

export type BudgetErrorCode =
  | "extraction_empty"
  | "catalog_unavailable"
  | "session_store_unavailable"
  | "invalid_menu_reply"
  | "transport_failed";

export class BudgetError extends Error {
  readonly code: BudgetErrorCode;

  constructor(code: BudgetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ExtractionEmptyError extends BudgetError {
  constructor(text: string) {
    super("extraction_empty", `no items recognized in "${text.slice(0, 80)}"`);
  }
}

export class CatalogUnavailableError extends BudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("catalog_unavailable", message, options);
  }
}

export class SessionStoreUnavailableError extends BudgetError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super("session_store_unavailable", `session store ${operation} failed`, options);
  }
}

export class InvalidMenuReplyError extends BudgetError {
  constructor(reply: string, phase: string) {
    super("invalid_menu_reply", `option "${reply}" is not valid in phase ${phase}`);
  }
}

export class TransportError extends BudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport_failed", message, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
