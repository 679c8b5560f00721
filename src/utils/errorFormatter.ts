/**
 * CLI failure output: a `✗` line with the problem, then one `→` hint per line
 * (searched catalog paths, how to rebuild a catalog), then exit code 1.
 */
export function exitWithError(title: string, hints: string[] = []): never {
  const lines = [`✗ ${title}`];
  if (hints.length > 0) {
    lines.push('', ...hints.map(hint => `→ ${hint}`));
  }

  console.error(lines.join('\n'));
  process.exit(1);
}
