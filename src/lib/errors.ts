import { z, type ZodError, type ZodIssue, type ZodTypeAny } from "zod";

export type ErrorKind =
  | "MissingField"
  | "DuplicateReference"
  | "UnknownReference"
  | "InvalidField"
  | "AlreadyExists"
  | "NotFound"
  | "SelfReferenceForbidden"
  | "Forbidden"
  | "Unauthenticated"
  | "InvalidCredentials";

const STATUS: Record<ErrorKind, number> = {
  MissingField: 400,
  DuplicateReference: 400,
  UnknownReference: 400,
  InvalidField: 400,
  AlreadyExists: 400,
  SelfReferenceForbidden: 400,
  InvalidCredentials: 400,
  Unauthenticated: 401,
  Forbidden: 403,
  NotFound: 404,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly field?: string;

  constructor(kind: ErrorKind, message: string, field?: string) {
    super(message);
    this.name = "AppError";
    this.kind = kind;
    this.field = field;
  }

  get status(): number {
    return STATUS[this.kind];
  }

  toJSON() {
    return {
      error: this.message,
      code: this.kind,
      ...(this.field ? { field: this.field } : {}),
    };
  }
}

const isAbsent = (issue: ZodIssue) =>
  (issue.code === "invalid_type" && issue.received === "undefined") ||
  (issue.code === "too_small" &&
    (issue.type === "string" || issue.type === "array") &&
    Number(issue.minimum) === 1);

/** Reports the first zod issue as an AppError. */
export const fromZodError = (error: ZodError): AppError => {
  const issue = error.issues[0];
  if (!issue) return new AppError("InvalidField", "Invalid input");
  const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
  if (isAbsent(issue)) {
    return new AppError("MissingField", `${field ?? "value"}: this field is required.`, field);
  }
  return new AppError("InvalidField", `${field ?? "value"}: ${issue.message}`, field);
};

export const parseWith = <S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw fromZodError(parsed.error);
  return parsed.data;
};
