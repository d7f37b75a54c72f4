import { spawn } from "node:child_process";

export interface ToolResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external tool to completion and collects its output.
 * Rejects when the tool cannot be started or exits non-zero.
 */
export function runTool(command: string, args: readonly string[]): Promise<ToolResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (data: string) => {
      stdout += data;
    });
    proc.stderr.on("data", (data: string) => {
      stderr += data;
    });

    proc.on("close", (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        const reason = signal ? `signal ${signal}` : `code ${code}`;
        reject(new Error(`${command} exited with ${reason}: ${stderr.trim()}`));
      }
    });

    proc.on("error", (err) => {
      reject(err);
    });
  });
}
