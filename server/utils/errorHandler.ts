import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export class TimeoutError extends Error implements AppError {
  statusCode = 504;
  isOperational = true;
  timeoutMs: number;
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends Error implements AppError {
  statusCode = 499;
  isOperational = true;
  constructor(operation: string) {
    super(`${operation} was cancelled`);
    this.name = "CancelledError";
  }
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const candidate = "statusCode" in error ? error.statusCode : "status" in error ? error.status : undefined;
  return typeof candidate === "number" ? candidate : undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  return readStatusCode(error) ?? 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export type CapabilityErrorType = "quota" | "auth" | "timeout" | "cancelled" | "internal";

export interface ClassifiedError {
  type: CapabilityErrorType;
  errorMessage: string;
  errorCode: string | number | undefined;
}

/**
 * Sorts a failed embedding / language-model call into the buckets reported on
 * tier outcomes.
 */
export function classifyCapabilityError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const errorCode = readErrorCode(err) ?? readStatusCode(err);

  if (err instanceof TimeoutError) {
    return { type: "timeout", errorMessage, errorCode };
  }

  if (err instanceof CancelledError || (err instanceof Error && err.name === "AbortError")) {
    return { type: "cancelled", errorMessage, errorCode };
  }

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return { type: "quota", errorMessage, errorCode };
  }

  if (errorCode === 401 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return { type: "auth", errorMessage, errorCode };
  }

  return { type: "internal", errorMessage, errorCode };
}
