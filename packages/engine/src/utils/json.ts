/** Parses JSON text, or undefined when it is not JSON. */
export function parseJson(value: string): unknown {
  if (!value.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

/** Value of a string `message` field, as GitHub error bodies carry. */
export function messageField(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "message" in value && typeof value.message === "string") {
    return value.message;
  }
  return undefined;
}
