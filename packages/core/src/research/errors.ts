import type { ZodIssue } from "zod";

export class InvalidModelOutputError extends Error {
  override readonly name = "InvalidModelOutputError";

  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
    readonly rawText?: string,
  ) {
    super(message);
  }
}

export class EmptyQueryError extends Error {
  override readonly name = "EmptyQueryError";

  constructor() {
    super("Research query must not be empty.");
  }
}

export class ResearchAbortedError extends Error {
  override readonly name = "ResearchAbortedError";

  constructor() {
    super("Research run was aborted.");
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export function errorMessage(e: unknown) {
  if (e instanceof Error) return e.message;
  return String(e);
}
