/**
 * A user-facing error in a WordLang program: a bad token, an unknown or
 * redeclared variable. Always tied to a source line.
 */
export class WordLangError extends Error {
  constructor(
    message: string,
    public line: number,
  ) {
    super(message);
    this.name = 'WordLangError';
  }

  /** Diagnostic line as printed by the CLI. */
  format(): string {
    return `ERROR (line ${this.line}): ${this.message}`;
  }
}

/**
 * A broken contract between parser and evaluator. Never the program's
 * fault, so it is not reported as a diagnostic.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = 'InternalError';
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: WordLangError };

/** Run `fn`, turning a thrown WordLangError into a failed outcome. */
export function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof WordLangError) {
      return { ok: false, error };
    }
    throw error;
  }
}
