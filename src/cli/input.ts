import { StringDecoder } from "node:string_decoder";

export interface InputText {
  text: string;
  /** True when reading stopped on abort before the stream ended. */
  interrupted: boolean;
}

export interface ReadInputTextOptions {
  signal?: AbortSignal;
}

/**
 * Collects a text stream. Aborting `signal` resolves with whatever arrived so
 * far instead of rejecting.
 */
export function readInputText(
  stream: NodeJS.ReadableStream,
  options: ReadInputTextOptions = {},
): Promise<InputText> {
  const { signal } = options;
  const decoder = new StringDecoder("utf8");
  const chunks: string[] = [];

  return new Promise<InputText>((resolve, reject) => {
    const onData = (chunk: string | Buffer) => {
      chunks.push(typeof chunk === "string" ? chunk : decoder.write(chunk));
    };
    const onEnd = () => {
      finish(false);
    };
    const onAbort = () => {
      stream.pause();
      finish(true);
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };

    function cleanup(): void {
      stream.removeListener("data", onData);
      stream.removeListener("end", onEnd);
      stream.removeListener("error", onError);
      signal?.removeEventListener("abort", onAbort);
    }

    function finish(interrupted: boolean): void {
      cleanup();
      chunks.push(decoder.end());
      resolve({ text: chunks.join(""), interrupted });
    }

    if (signal?.aborted) {
      finish(true);
      return;
    }

    stream.on("data", onData);
    stream.once("end", onEnd);
    stream.once("error", onError);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
