import type { Logger } from "../../logging/index.js";

/**
 * Runs a strict storage operation and reduces the outcome to a boolean.
 * Every thrown value, path violations included, becomes `false`.
 */
export async function attempt(
  operation: string,
  path: string,
  run: () => Promise<unknown>,
  logger: Logger
): Promise<boolean> {
  try {
    await run();
    return true;
  } catch (error) {
    logger.debug("storage operation failed; reporting false", { operation, path, error });
    return false;
  }
}
