export function getArg(flag: string, argv: readonly string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  return idx === -1 ? undefined : argv[idx + 1];
}
