import { spawnSync } from "node:child_process";

export interface NpmRunOptions {
  cwd?: string | undefined;
  env?: Record<string, string | undefined> | undefined;
}

export type NpmRunner = (args: string[], options?: NpmRunOptions) => void;

export class CommandFailedError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number,
    reason = `exit code ${exitCode}`
  ) {
    super(`npm ${args.join(" ")} failed with ${reason}`);
    this.name = "CommandFailedError";
  }
}

export const runNpm: NpmRunner = (args, options = {}) => {
  const cmd = process.platform === "win32" ? (process.env.ComSpec ?? "cmd.exe") : "npm";
  const cmdArgs = process.platform === "win32" ? ["/d", "/s", "/c", "npm", ...args] : args;
  const result = spawnSync(cmd, cmdArgs, {
    cwd: options.cwd,
    stdio: "inherit",
    env: {
      ...process.env,
      ...(options.env ?? {})
    }
  });

  if (result.error) {
    throw result.error;
  }
  if (typeof result.status === "number" && result.status !== 0) {
    throw new CommandFailedError(args, result.status);
  }
  if (result.status === null) {
    throw new CommandFailedError(args, 1, `signal ${result.signal ?? "unknown"}`);
  }
};
