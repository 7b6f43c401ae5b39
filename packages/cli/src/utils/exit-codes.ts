/**
 * Exit codes used by the culturegrid CLI.
 *
 * | Code | Meaning                                          |
 * |------|--------------------------------------------------|
 * | 0    | Success                                          |
 * | 1    | General error                                    |
 * | 2    | Format parameter mismatch found by `check`       |
 * | 3    | Rename target key already exists                 |
 * | 4    | A culture refused the change (read-only)         |
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  FORMAT_MISMATCH: 2,
  DUPLICATE_KEY: 3,
  IMMUTABLE: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [EXIT_CODES.SUCCESS]: 'Success - no issues found',
  [EXIT_CODES.ERROR]: 'General error',
  [EXIT_CODES.FORMAT_MISMATCH]: 'Format parameter mismatch between cultures',
  [EXIT_CODES.DUPLICATE_KEY]: 'Target key already exists',
  [EXIT_CODES.IMMUTABLE]: 'Resources cannot be changed',
};

export function getExitCodeDescription(code: number): string {
  const match = Object.entries(EXIT_CODE_DESCRIPTIONS).find(([value]) => Number(value) === code);
  return match ? match[1] : `Unknown exit code: ${code}`;
}
