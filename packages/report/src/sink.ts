/** Destination for rendered text. Handlers write complete lines, terminator included. */
export interface OutputSink {
  write(chunk: string): void;
}

/** Collects everything written into a string. */
export class StringSink implements OutputSink {
  #buffer = "";

  write(chunk: string): void {
    this.#buffer += chunk;
  }

  toString(): string {
    return this.#buffer;
  }
}

/** Sink over a Node writable stream such as `process.stderr`. */
export function streamSink(stream: NodeJS.WritableStream): OutputSink {
  return {
    write(chunk) {
      stream.write(chunk);
    },
  };
}

export function writeLine(sink: OutputSink, text = ""): void {
  sink.write(`${text}\n`);
}
