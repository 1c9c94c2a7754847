/**
 * The parts of an express Response the handlers write through. Express's
 * Response satisfies both; tests pass a recording mock.
 */

export interface JsonResponseWriter {
  readonly headersSent: boolean;
  status(code: number): JsonResponseWriter;
  json(body: unknown): unknown;
}

export interface StreamResponseWriter extends JsonResponseWriter {
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  end(): unknown;
}
