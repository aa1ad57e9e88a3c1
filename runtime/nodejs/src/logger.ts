import type { Logger } from '@mgscope/sdk';

/**
 * Console logger. Debug lines go to stderr with a `DEBUG:` prefix and only
 * when verbose, so stdout stays free for command output.
 */
export function createLogger(verbose: boolean): Logger {
  return {
    debug: (message: string) => {
      if (verbose) {
        console.error(`DEBUG: ${message}`);
      }
    },
    info: (message: string) => console.log(message),
    warn: (message: string) => console.warn(message),
  };
}
