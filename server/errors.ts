import type { Response } from "express";
import type { ZodError } from "zod";

export type ApiErrorCode =
  | "MISSING_APP_ID"
  | "VALIDATION_ERROR"
  | "INVALID_JSON"
  | "NOT_FOUND"
  | "GATEWAY_ERROR"
  | "PARSE_ERROR"
  | "UNSUPPORTED_METHOD"
  | "SCORING_ERROR"
  | "PERSISTENCE_ERROR"
  | "INTERNAL_ERROR";

export interface ApiIssue {
  path: string;
  message: string;
}

export interface ApiErrorBody {
  success: false;
  error: { code: ApiErrorCode; message: string; issues?: ApiIssue[] };
}

export function sendError(
  res: Response,
  status: number,
  code: ApiErrorCode,
  message: string,
  issues?: ApiIssue[]
): void {
  const body: ApiErrorBody = { success: false, error: { code, message, ...(issues ? { issues } : {}) } };
  res.status(status).json(body);
}

export function sendValidationError(res: Response, error: ZodError): void {
  const issues = error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
  const message = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
  sendError(res, 400, "VALIDATION_ERROR", message, issues);
}
