/**
 * Error taxonomy for a drafting run.
 *
 * Config, auth and connectivity errors end the run. Protocol, model and
 * quota errors are recorded against a single message and the run moves on.
 */

export type ErrorKind =
  | "config"
  | "auth"
  | "connectivity"
  | "protocol"
  | "model"
  | "quota";

export abstract class InboxDrafterError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends InboxDrafterError {
  readonly kind = "config";

  /** Environment variables that were missing or invalid. */
  readonly variables: string[];

  constructor(message: string, variables: string[] = []) {
    super(message);
    this.variables = variables;
  }
}

export class AuthError extends InboxDrafterError {
  readonly kind = "auth";
}

export class ConnectivityError extends InboxDrafterError {
  readonly kind = "connectivity";
}

export class ProtocolError extends InboxDrafterError {
  readonly kind = "protocol";
}

export class ModelError extends InboxDrafterError {
  readonly kind = "model";
}

export class QuotaError extends InboxDrafterError {
  readonly kind = "quota";
}

const FATAL_KINDS: ReadonlySet<ErrorKind> = new Set([
  "config",
  "auth",
  "connectivity",
]);

/**
 * True for errors that must abort the whole run rather than a single message.
 */
export function isFatalError(error: unknown): error is InboxDrafterError {
  return error instanceof InboxDrafterError && FATAL_KINDS.has(error.kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
