import { spawn } from "child_process";

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  /** Forward the tool's output to this process. */
  verbose: boolean;
  /** Collect stdout instead of forwarding or discarding it. */
  captureStdout?: boolean;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  error: Error | null;
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

export function commandSucceeded(result: CommandResult): boolean {
  return result.error === null && result.exitCode === 0;
}

export const spawnCommand: CommandRunner = (request) =>
  new Promise<CommandResult>((resolve) => {
    const output = request.verbose ? "inherit" : "ignore";
    const child = spawn(request.command, request.args, {
      cwd: request.cwd,
      stdio: ["ignore", request.captureStdout ? "pipe" : output, output],
      timeout: request.timeoutMs
    });

    const chunks: Buffer[] = [];
    let settled = false;
    const finish = (result: CommandResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(result);
    };

    child.stdout?.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    child.on("error", (error) => {
      finish({ exitCode: null, stdout: "", error });
    });
    child.on("close", (code, signal) => {
      const error =
        signal !== null ? new Error(`${request.command} terminated by ${signal}`) : null;
      finish({ exitCode: code, stdout: Buffer.concat(chunks).toString("utf8"), error });
    });
  });
