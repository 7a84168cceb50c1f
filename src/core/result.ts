export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; errors: string[] };

export type Failure = Extract<OperationResult<never>, { ok: false }>;

export function okResult<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function failResult(...errors: string[]): Failure {
  const cleaned = errors.map((e) => e.trim()).filter((e) => e.length > 0);
  const list = cleaned.length > 0 ? cleaned : ["unknown error"];
  return { ok: false, error: list.join("; "), errors: list };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string" && err.length > 0) return err;
  return String(err);
}
