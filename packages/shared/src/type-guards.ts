export function isString(val: unknown): val is string {
  return typeof val === "string";
}

export function hasMessage(err: unknown): err is {
  message: string;
} {
  return err !== null && typeof err === "object" && "message" in err && typeof err.message === "string";
}

/** Message of any thrown value, for log lines. */
export function errorMessage(err: unknown): string {
  if (hasMessage(err)) {
    return err.message;
  }
  return String(err);
}
