export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export function formatError(error: unknown): string {
  if (error instanceof TransportError) {
    const body = error.body.trim();
    if (body) {
      return `${error.message}\nJira response body: ${body}`;
    }

    return error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
