import { ZodError } from "zod";

export const errorKinds = [
  "TypeError",
  "ReferenceError",
  "RangeError",
  "SyntaxError",
  "TestFailure",
  "PersistenceError",
  "SerializationError",
  "TimeoutError",
  "ValidationError",
  "ConflictError",
  "UnknownError"
] as const;

export type ErrorKind = (typeof errorKinds)[number];

export class OrchestratorError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class PersistenceError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PersistenceError", message, options);
  }
}

export class SerializationError extends OrchestratorError {
  constructor(
    message: string,
    readonly path: string
  ) {
    super("SerializationError", `${message} at ${path}`);
  }
}

export class AgentTimeoutError extends OrchestratorError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super("TimeoutError", `${label} timed out after ${timeoutMs}ms`);
  }
}

export class TestFailureError extends OrchestratorError {
  constructor(readonly failedTests: number) {
    super("TestFailure", `Test failures detected: ${failedTests} tests failed`);
  }
}

export const isErrorKind = (value: string): value is ErrorKind => errorKinds.some((kind) => kind === value);

export const toErrorKind = (value: string): ErrorKind => (isErrorKind(value) ? value : "UnknownError");

export const classifyError = (error: unknown): ErrorKind => {
  if (error instanceof OrchestratorError) return error.kind;
  if (error instanceof ZodError) return "ValidationError";
  if (error instanceof TypeError) return "TypeError";
  if (error instanceof ReferenceError) return "ReferenceError";
  if (error instanceof RangeError) return "RangeError";
  if (error instanceof SyntaxError) return "SyntaxError";
  return "UnknownError";
};

export interface ErrorDescription {
  errorType: ErrorKind;
  errorMessage: string;
  stackTrace?: string;
}

export const describeError = (error: unknown): ErrorDescription => ({
  errorType: classifyError(error),
  errorMessage: error instanceof Error ? error.message : String(error),
  stackTrace: error instanceof Error ? error.stack : undefined
});
