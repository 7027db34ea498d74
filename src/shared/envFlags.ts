export function resolveBooleanFlag(raw: string | undefined): boolean {
  if (typeof raw !== "string") {
    return false;
  }
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}

export interface CliEnvironment {
  /** ARGBIND_DEBUG: print structured trace records on stderr. */
  debug: boolean;
  /** POSIXLY_CORRECT: stop option scanning at the first operand. */
  posixlyCorrect: boolean;
}

export function resolveCliEnvironment(env: NodeJS.ProcessEnv = process.env): CliEnvironment {
  return {
    debug: resolveBooleanFlag(env.ARGBIND_DEBUG),
    // getopt honours the variable whatever its value.
    posixlyCorrect: typeof env.POSIXLY_CORRECT === "string",
  };
}

export function debugTrace(environment: CliEnvironment, record: Record<string, unknown>): void {
  if (!environment.debug) {
    return;
  }
  console.debug(JSON.stringify({ scope: "cli", ...record }));
}
