#!/usr/bin/env node

import path from "node:path";
import process from "node:process";

import { fileAddress, resolveLine } from "./addressModel.js";
import { type CliOptions, parseArgs, sourceFromOptions } from "./cli.js";
import { countChanges } from "./diffParser.js";
import { isLiveSource, resolveReviewer } from "./diffSource.js";
import { InvalidAnchorError, describeError } from "./errors.js";
import { exportSession } from "./exportComments.js";
import { createLogger, setLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import type { ReloadResult } from "./reconciliation.js";
import { type OpenedSession, openSession } from "./session.js";
import { ChangeWatcher } from "./watcher.js";

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs();
  } catch (error) {
    console.error("[ERROR]", describeError(error));
    process.exitCode = 1;
    return;
  }

  // Export output goes to stdout, so only debug logging may share it.
  const logger = createLogger({ debug: options.debug, silent: options.command === "export" && !options.debug });
  setLogger(logger);
  logger.debug("CLI options:", JSON.stringify(options, null, 2));

  const repo = path.resolve(options.repo);
  try {
    const opened = await openSession({
      repo,
      source: sourceFromOptions(options),
      fresh: options.new,
      ignoreFiles: options.ignoreFiles,
    });

    if (options.command === "start") {
      await runWatchLoop(opened, repo, options, logger);
      return;
    }
    if (options.command === "export") {
      process.stdout.write(exportSession(opened.session, options.format));
      return;
    }

    await applyCommand(opened, repo, options, logger);
    await opened.engine.close();
  } catch (error) {
    logger.error("annodiff failed:", describeError(error));
    process.exitCode = 1;
  }
}

async function applyCommand(
  opened: OpenedSession,
  repo: string,
  options: CliOptions,
  logger: Logger,
): Promise<void> {
  const { engine, session } = opened;
  // Required fields are enforced by the argument schema for each command.
  const file = options.file ?? "";
  const message = options.message ?? "";
  const id = options.id ?? "";

  switch (options.command) {
    case "comment": {
      const author = options.author ?? (await resolveReviewer(repo));
      const side = options.deleted ? "old" : "new";
      if (options.line === undefined) {
        const comment = engine.addComment(fileAddress(file), author, message, options.category);
        logger.info(`Added file comment ${comment.id} on ${file}`);
        return;
      }
      const start = resolveLine(session.index, file, options.line, side);
      if (!start) {
        throw new InvalidAnchorError(`${file}:${options.line}`, `no ${side} line ${options.line} in the diff`);
      }
      if (options.end === undefined) {
        const comment = engine.addComment(start, author, message, options.category);
        logger.info(`Added comment ${comment.id} on ${file}:${options.line}`);
        return;
      }
      const end = resolveLine(session.index, file, options.end, side);
      if (!end) {
        throw new InvalidAnchorError(`${file}:${options.end}`, `no ${side} line ${options.end} in the diff`);
      }
      const comment = engine.selectionRange(start, end, author, message, options.category);
      logger.info(`Added comment ${comment.id} on ${file}:${options.line}-${options.end}`);
      return;
    }
    case "edit":
      engine.editComment(id, message, { force: options.force });
      logger.info(`Updated comment ${id}`);
      return;
    case "delete":
      engine.deleteComment(id, { force: options.force });
      logger.info(`Deleted comment ${id}`);
      return;
    case "respond":
      engine.setResponse(id, options.clear ? null : message);
      logger.info(options.clear ? `Cleared response on ${id}` : `Recorded response on ${id}`);
      return;
    case "reviewed": {
      const reviewed = engine.toggleReviewed(file);
      logger.info(`${file} marked ${reviewed ? "reviewed" : "not reviewed"}`);
      return;
    }
    default:
      return;
  }
}

async function runWatchLoop(
  opened: OpenedSession,
  repo: string,
  options: CliOptions,
  logger: Logger,
): Promise<void> {
  const { engine, session, diffSource } = opened;

  engine.on("reloaded", (result: ReloadResult) => {
    logger.info(
      `Session reloaded: ${result.inserted} new comments, ${result.responsesAdopted} responses` +
        (result.diffChanged ? ", diff updated" : ""),
    );
  });
  engine.on("saved", (location: string) => {
    logger.debug(`Saved ${location}`);
  });
  engine.on("error", (error: Error) => {
    logger.error(`Session paused: ${error.message}. Fix the file or wait for the next change.`);
  });

  const sessionWatcher = ChangeWatcher.forSessionFile(
    engine.location,
    () => void engine.reload(),
    options.debounceMs,
  );
  sessionWatcher.start();
  engine.attachWatcher(sessionWatcher);

  if (isLiveSource(diffSource.descriptor)) {
    const treeWatcher = ChangeWatcher.forRepository(
      repo,
      engine.location,
      () => void engine.refreshDiff(),
      options.debounceMs,
    );
    treeWatcher.start();
    engine.attachWatcher(treeWatcher);
  }

  let additions = 0;
  let deletions = 0;
  for (const file of session.files) {
    const counts = countChanges(file);
    additions += counts.additions;
    deletions += counts.deletions;
  }
  logger.info(
    `Reviewing ${session.files.length} files, +${additions} -${deletions} (${diffSource.description}); ` +
      `${session.comments.count} comments in ${engine.location}. Press Ctrl+C to stop.`,
  );

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  logger.info("Stopping; finishing pending saves.");
  await engine.close();
}

void main();
