import { spawn } from "child_process";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/** Runs host commands without a shell, so arguments are never re-split. */
export class ChildProcessRunner implements CommandRunner {
  run(file: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(file, [...args], { stdio: ["pipe", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => (stdout += chunk));
      child.stderr.on("data", (chunk: string) => (stderr += chunk));

      child.on("error", reject);
      child.on("close", (code, signal) => {
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr
        });
      });

      child.stdin.on("error", reject);
      child.stdin.end(options.input ?? "");
    });
  }
}

export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map(part => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
