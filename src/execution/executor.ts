// Command execution layer: every external invocation passes through this module.
// LocalExecutor is the hard boundary between devstrap and the OS. Children
// inherit stdio (sudo/doas prompts must reach the terminal) and run without a
// timeout; a package manager may legitimately take many minutes.
import execa from "execa";
import { constants } from "node:os";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Shell convention for "command not found". */
export const SPAWN_FAILED_EXIT_CODE = 127;

/** Result of command execution. */
export interface ExecResult {
  readonly exitCode: number;
  /** Signal that terminated the child, if any. */
  readonly signal: string | null;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command): Promise<ExecResult>;
}

export interface LocalExecutorOptions {
  /** PATH used to resolve argv[0]; pass the search path the probe scanned. Defaults to the inherited PATH. */
  readonly searchPath?: string;
}

/** Local executor using execa with inherited stdio. */
export class LocalExecutor implements Executor {
  private readonly searchPath: string | undefined;

  constructor(options: LocalExecutorOptions = {}) {
    this.searchPath = options.searchPath;
  }

  async execute(command: Command): Promise<ExecResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    logger.debug({ argv: command.argv }, "Executing command");

    const result = await execa(file, args, {
      stdio: "inherit",
      reject: false,
      env: this.searchPath === undefined ? command.env : { ...command.env, PATH: this.searchPath },
    });
    const durationMs = Math.round(performance.now() - start);

    if (result.signal) {
      return { exitCode: signalExitCode(result.signal), signal: result.signal, durationMs };
    }
    // execa leaves exitCode unset when the process never spawned (ENOENT, EACCES).
    if (typeof result.exitCode !== "number") {
      logger.error({ argv: command.argv }, "Command failed to spawn");
      return { exitCode: SPAWN_FAILED_EXIT_CODE, signal: null, durationMs };
    }
    return { exitCode: result.exitCode, signal: null, durationMs };
  }
}

/** 128 + signal number, as a shell reports a child killed by a signal. */
export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}
