/**
 * Print a failure the way every command does and exit with status 1.
 */
export function exitWithError(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(`📋 Stack trace:\n${error.stack}`);
  }
  process.exit(1);
}
