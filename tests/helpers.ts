import { PassThrough } from "node:stream";

export type CapturedStream = {
  stream: PassThrough;
  text(): string;
};

/** A stream whose written text can be read back once writing is done. */
export function captureStream(): CapturedStream {
  const stream = new PassThrough();
  return {
    stream,
    text() {
      const chunk: unknown = stream.read();
      return chunk === null ? "" : String(chunk);
    },
  };
}

export function inputStream(text: string): PassThrough {
  const stream = new PassThrough();
  stream.end(text);
  return stream;
}
