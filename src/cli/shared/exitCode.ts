/** Exit code for a help request; the same as a parse failure, on a different stream. */
export const HELP_EXIT_CODE = 1;

export function setExitCode(code: number): void {
  process.exitCode = code;
}

export function formatCliError(error: unknown): string {
  return `ERROR: ${asErrorMessage(error)}`;
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
