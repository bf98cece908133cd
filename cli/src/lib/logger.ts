/**
 * User-facing console output: results on stdout, failures on stderr.
 */
class Logger {
  info(message: string): void {
    console.log(message);
  }

  error(message: string, error?: unknown): void {
    if (error === undefined) {
      console.error(message);
      return;
    }
    console.error(`${message}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export const logger = new Logger();
