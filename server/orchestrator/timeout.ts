import { CollaboratorTimeoutError } from "../utils/errorHandler";

/**
 * Race a collaborator call against a deadline. The timer is always cleared,
 * so nothing keeps the process alive after the call settles.
 */
export async function withTimeout<T>(label: string, timeoutMs: number, operation: Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
