export type CliRuntime = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  /** stderr is a terminal, so progress spinners may draw there. */
  interactive: boolean;
};

export function createNodeRuntime(
  stdout: NodeJS.WriteStream = process.stdout,
  stderr: NodeJS.WriteStream = process.stderr
): CliRuntime {
  return {
    writeOut: (text) => {
      stdout.write(text);
    },
    writeErr: (text) => {
      stderr.write(text);
    },
    interactive: Boolean(stderr.isTTY)
  };
}
