/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { parseJson } from "./arg.js";

/**
 * Streams a command talks to; tests substitute an in-memory implementation
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
  /** Ask a yes/no question on an interactive terminal */
  confirm(question: string): Promise<boolean>;
  /** Whether stderr accepts ANSI colors */
  color: boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * The process's own streams
 */
export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
  readStdin: () => readStdin(),
  isStdinTTY,
  async confirm(question) {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      const answer = await rl.question(`${question} (y/N) `);
      return answer.trim().toLowerCase() === "y";
    } finally {
      rl.close();
    }
  },
  color: process.stderr.isTTY ?? false,
};
