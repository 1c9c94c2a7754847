import type { Readable } from "stream";

export async function streamToString(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  return new Promise<string>((resolve, reject) => {
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    });
    stream.on("error", (error: Error) => reject(error));
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
  });
}

/**
 * Splits a byte stream into SSE `data:` payloads. Comment lines, event names and
 * blank keep-alives are skipped; the `[DONE]` sentinel is yielded like any payload.
 */
export async function* readSSEData(stream: AsyncIterable<Buffer | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  for await (const chunk of stream) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    let newline = buffer.indexOf("\n");
    while (newline !== -1) {
      const line = buffer.slice(0, newline).replace(/\r$/, "");
      buffer = buffer.slice(newline + 1);
      if (line.startsWith("data:")) {
        yield line.slice(5).trimStart();
      }
      newline = buffer.indexOf("\n");
    }
  }
  buffer += decoder.decode();
  const rest = buffer.trim();
  if (rest.startsWith("data:")) {
    yield rest.slice(5).trimStart();
  }
}
