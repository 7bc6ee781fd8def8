/**
 * External process execution over node:child_process
 */

import { type ChildProcess, spawn } from "node:child_process";
import { constants, createWriteStream } from "node:fs";
import { access } from "node:fs/promises";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { logger } from "../utils/logger";
import type { CommandResult, CommandRunner, RunOptions, RunToFileOptions } from "./capabilities";

interface ExitStatus {
  exitCode: number;
  timedOut: boolean;
  spawnError: Error | null;
}

function waitForExit(child: ChildProcess, timeoutMs?: number): Promise<ExitStatus> {
  return new Promise((resolve) => {
    let settled = false;
    let timedOut = false;

    const timer =
      timeoutMs && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    const finish = (status: Omit<ExitStatus, "timedOut">) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ ...status, timedOut });
    };

    child.once("error", (error) => finish({ exitCode: 127, spawnError: error }));
    child.once("close", (code) => finish({ exitCode: code ?? 1, spawnError: null }));
  });
}

function toResult(status: ExitStatus, stdout: string, stderr: string): CommandResult {
  let message = stderr;
  if (status.spawnError) {
    message = status.spawnError.message;
  } else if (status.timedOut) {
    message = `${stderr}${stderr ? "\n" : ""}timed out`;
  }
  return {
    success: status.exitCode === 0 && !status.timedOut && !status.spawnError,
    stdout,
    stderr: message,
    exitCode: status.exitCode,
    timedOut: status.timedOut,
  };
}

export class ProcessRunner implements CommandRunner {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    logger.debug(`exec: ${command} ${args.join(" ")}`);

    const child = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ["pipe", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (d: Buffer) => stdout.push(d));
    child.stderr.on("data", (d: Buffer) => stderr.push(d));
    // A process that exits without reading its input closes the pipe under us
    child.stdin.on("error", (err) => logger.debug(`stdin of ${command} closed early`, err));
    child.stdin.end(options.input ?? "");

    const status = await waitForExit(child, options.timeoutMs);
    return toResult(
      status,
      Buffer.concat(stdout).toString().trim(),
      Buffer.concat(stderr).toString().trim(),
    );
  }

  async runToFile(
    command: string,
    args: string[],
    outputPath: string,
    options: RunToFileOptions = {},
  ): Promise<CommandResult> {
    logger.debug(`exec: ${command} ${args.join(" ")} > ${outputPath}`);

    const child = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stderr: Buffer[] = [];
    child.stderr.on("data", (d: Buffer) => stderr.push(d));

    const sink = createWriteStream(outputPath, { mode: options.mode ?? 0o644 });
    const written =
      options.gzipLevel === undefined
        ? pipeline(child.stdout, sink)
        : pipeline(child.stdout, createGzip({ level: options.gzipLevel }), sink);

    const [exit, stream] = await Promise.allSettled([
      waitForExit(child, options.timeoutMs),
      written,
    ]);

    // waitForExit never rejects
    const status: ExitStatus =
      exit.status === "fulfilled" ? exit.value : { exitCode: 1, timedOut: false, spawnError: null };

    if (status.spawnError || status.timedOut) {
      return toResult(status, "", Buffer.concat(stderr).toString().trim());
    }
    if (stream.status === "rejected") {
      const reason = stream.reason instanceof Error ? stream.reason.message : String(stream.reason);
      return {
        success: false,
        stdout: "",
        stderr: reason,
        exitCode: status.exitCode,
        timedOut: false,
        writeFailed: true,
      };
    }
    return toResult(status, "", Buffer.concat(stderr).toString().trim());
  }

  async which(command: string): Promise<string | null> {
    const searchPath = process.env.PATH ?? "";
    for (const dir of searchPath.split(path.delimiter).filter(Boolean)) {
      const candidate = path.join(dir, command);
      const executable = await access(candidate, constants.X_OK).then(
        () => true,
        () => false,
      );
      if (executable) {
        return candidate;
      }
    }
    return null;
  }
}

export function secondsToMs(seconds: number): number | undefined {
  return seconds > 0 ? seconds * 1000 : undefined;
}
