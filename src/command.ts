import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { ReviewError } from "./errors.js";
import { getLogger } from "./logging.js";

const execFileAsync = promisify(execFile);

/** Runs an external CLI (e.g. `gh`) and returns its stdout. */
export async function runCommand(command: string[], options: { cwd?: string } = {}): Promise<string> {
  const [file, ...args] = command;
  const logger = getLogger();
  logger.debug("Running command:", command.join(" "));
  try {
    const { stdout } = await execFileAsync(file, args, {
      cwd: options.cwd,
      env: process.env,
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  } catch (error) {
    const err = error as NodeJS.ErrnoException & { stderr?: string };
    if (err.code === "ENOENT") {
      throw new ReviewError(`Command ${file} not found; is it installed and on PATH?`);
    }
    const stderr = (err.stderr ?? "").trim();
    logger.debug("Command failed:", stderr);
    throw new ReviewError(`Command ${command.join(" ")} failed: ${stderr || err.message}`);
  }
}
