let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// Status lines go to stderr so stdout stays clean for command output.
export const log = {
  debug(message: string): void {
    if (verbose) process.stderr.write(`[debug] ${message}\n`);
  },
  info(message: string): void {
    process.stderr.write(`${message}\n`);
  },
  warn(message: string): void {
    process.stderr.write(`[warn] ${message}\n`);
  },
  error(message: string): void {
    process.stderr.write(`[error] ${message}\n`);
  },
};
