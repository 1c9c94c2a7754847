/**
 * Server-Sent Events framing. Transport-level only; chunk shapes are built by
 * ResponseAssembler.
 */

export const SSE_DONE = "data: [DONE]\n\n";

export function formatSSEChunk(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};
