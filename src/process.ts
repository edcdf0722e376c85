import { spawn } from "child_process";

export type StdioMode = "capture" | "inherit";

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  stdio?: StdioMode;
}

export interface CommandResult {
  ok: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  spawnError: string | null;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

export const spawnRunner: CommandRunner = {
  run(spec: CommandSpec): Promise<CommandResult> {
    const stdio = spec.stdio ?? "capture";
    return new Promise((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        stdio: stdio === "inherit" ? ["inherit", "inherit", "pipe"] : ["ignore", "pipe", "pipe"]
      });
      let stdout = "";
      let stderr = "";
      let settled = false;
      const settle = (result: CommandResult): void => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };
      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      // Under "inherit" stderr is still piped so sudo refusals can be recognised.
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
        if (stdio === "inherit") {
          process.stderr.write(chunk);
        }
      });
      // "close" is not guaranteed after a failed spawn.
      child.on("error", (error) => {
        settle({ ok: false, code: null, signal: null, stdout, stderr, spawnError: error.message });
      });
      child.on("close", (code, signal) => {
        settle({ ok: code === 0, code, signal, stdout, stderr, spawnError: null });
      });
    });
  }
};

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./#-]+$/.test(part) ? part : `'${part}'`))
    .join(" ");
}

export function describeFailure(result: CommandResult): string {
  if (result.spawnError) {
    return result.spawnError;
  }
  const detail = result.stderr.trim();
  if (detail.length > 0) {
    return detail;
  }
  if (result.signal) {
    return `terminated by ${result.signal}`;
  }
  return `exit code ${String(result.code)}`;
}
