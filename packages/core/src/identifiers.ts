/**
 * Preprocessor identifier rules.
 */

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isPreprocessorIdentifier(s: string): boolean {
  return IDENTIFIER.test(s);
}

/** Replace every character that cannot appear in an identifier with `_`. */
export function toIdentifierFragment(s: string): string {
  return s.replace(/[^A-Za-z0-9_]/g, "_");
}
