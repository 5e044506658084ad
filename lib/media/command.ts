import { spawn } from "node:child_process";

export type CommandResult = {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: Error;
};

export type CommandRunner = (bin: string, args: string[], opts: { timeoutMs: number }) => Promise<CommandResult>;

const KEEP_CHARS = 8000;

/** Resolves once the process is gone; a spawn error is part of the result. */
export const runCommand: CommandRunner = (bin, args, { timeoutMs }) =>
  new Promise((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const child = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    const finish = (code: number | null, error?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut, error });
    };

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = (stdout + chunk.toString("utf8")).slice(-KEEP_CHARS);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = (stderr + chunk.toString("utf8")).slice(-KEEP_CHARS);
    });
    child.on("error", (error) => finish(null, error));
    child.on("close", (code) => finish(code));
  });
