import { TransformTimeoutError } from "./errors";

/**
 * Race a promise against a timer. The timer is always cleared, so a settled
 * promise leaves nothing scheduled behind it.
 *
 * The underlying work is not cancelled; callers that spawn processes should
 * also pass their own kill timeout.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransformTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
