/** Where a command writes. Tests swap in buffers. */
export interface CommandIO {
  out: (text: string) => void;
  err: (text: string) => void;
  color: boolean;
}

export const processIO: CommandIO = {
  out: (text) => { process.stdout.write(text); },
  err: (text) => { process.stderr.write(text); },
  color: Boolean(process.stdout.isTTY),
};

export function bufferIO(color = false): CommandIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => { stdout.push(text); },
    err: (text) => { stderr.push(text); },
    color,
  };
}
