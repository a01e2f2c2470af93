import open from 'open';
import type { Logger } from 'pino';

/**
 * Open a local file in the user's default browser. Failure is logged, never
 * thrown: the report path is printed either way.
 */
export async function openInBrowser(filePath: string, logger: Logger): Promise<void> {
  try {
    await open(filePath);
  } catch (err) {
    logger.warn({ filePath, err }, 'Could not open the dashboard in a browser');
  }
}
