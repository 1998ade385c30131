export interface CliOptions {
  inputPath: string;
  outputPath: string;
}

// Reads a `--name=value` flag; an empty value counts as absent
export const readFlag = (argv: readonly string[], name: string): string | undefined => {
  const prefix = `--${name}=`;
  const value = argv.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
  return value ? value : undefined;
};

export const parseArgs = (argv: readonly string[], defaults: CliOptions): CliOptions => ({
  inputPath: readFlag(argv, 'input') ?? defaults.inputPath,
  outputPath: readFlag(argv, 'output') ?? defaults.outputPath,
});
