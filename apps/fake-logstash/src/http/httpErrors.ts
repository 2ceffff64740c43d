export type HttpError = Error & {
  status: number;
  code: string;
};

/**
 * Create an Error carrying an HTTP status and a response code.
 */
export function httpError(status: number, code: string, message?: string): HttpError {
  const err = new Error(message ?? code) as HttpError;
  err.status = status;
  err.code = code;
  return err;
}

export function isHttpError(e: unknown): e is HttpError {
  return (
    e instanceof Error &&
    "status" in e &&
    typeof e.status === "number" &&
    "code" in e &&
    typeof e.code === "string"
  );
}
