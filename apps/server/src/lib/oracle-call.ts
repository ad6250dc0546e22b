import { OracleTimeoutError } from "./errors.js";

/**
 * Run an external oracle request with a deadline. The callee receives a
 * signal that is aborted when the deadline passes.
 */
export async function callWithTimeout<T>(
  label: string,
  timeoutMs: number,
  request: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // settle first so the timeout wins over the request's own abort error
      reject(new OracleTimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([request(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
