import { AppError, RepositoryError } from '../../utils/errors';
import { logger } from '../../utils/logging';

/**
 * Repository boundary: domain errors pass through, `translate` may map known
 * driver errors (unique violations) to domain errors, everything else is
 * logged and replaced with a RepositoryError.
 */
export const repositoryCall = async <T>(
  operation: string,
  work: () => Promise<T>,
  translate?: (error: unknown) => AppError | undefined
): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    const translated = translate?.(error);
    if (translated) {
      throw translated;
    }
    logger.error(`[Repository] ${operation} failed`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    throw new RepositoryError();
  }
};
