import { type DiffSource, type DiffSourceDescriptor, createDiffSource } from "./diffSource.js";
import { MalformedDiffError, PersistenceError, SourceUnavailableError, describeError } from "./errors.js";
import { filterIgnoredFiles } from "./ignore.js";
import { getLogger } from "./logging.js";
import { ReconciliationEngine } from "./reconciliation.js";
import { FileSessionStorage, type SessionStorage, sessionPathFor } from "./sessionStorage.js";
import { SessionDocument, parseSessionText } from "./sessionDocument.js";
import { type Clock, type DiffFile, systemClock } from "./types.js";

export type OpenSessionOptions = {
  repo: string;
  source: DiffSourceDescriptor;
  /** Discards any saved session for this source. */
  fresh?: boolean;
  storage?: SessionStorage;
  /** Provider override; defaults to the git, gh or file provider for `source`. */
  diffSource?: DiffSource;
  ignoreFiles?: string[];
  clock?: Clock;
};

export type SessionOrigin = "created" | "loaded" | "resumed";

export type OpenedSession = {
  engine: ReconciliationEngine;
  session: SessionDocument;
  storage: SessionStorage;
  diffSource: DiffSource;
  origin: SessionOrigin;
};

/**
 * Opens the review session for a diff source. A fresh diff is always fetched
 * first; when the provider fails, an existing session file is resumed from its
 * saved diff, and without one the failure is fatal.
 */
export async function openSession(options: OpenSessionOptions): Promise<OpenedSession> {
  const logger = getLogger();
  const clock = options.clock ?? systemClock;
  const diffSource = options.diffSource ?? createDiffSource(options.repo, options.source);
  const storage = options.storage ?? new FileSessionStorage(sessionPathFor(options.repo, options.source));
  const filterFiles = (files: DiffFile[]) => filterIgnoredFiles(files, options.ignoreFiles);

  let diffText: string | undefined;
  let sourceError: SourceUnavailableError | undefined;
  try {
    diffText = (await diffSource.getDiff()).text;
  } catch (error) {
    if (!(error instanceof SourceUnavailableError)) {
      throw error;
    }
    sourceError = error;
  }

  let savedText: string | undefined;
  if (!options.fresh) {
    try {
      savedText = await storage.read();
    } catch (error) {
      if (!(error instanceof PersistenceError && error.reason === "missing")) {
        throw error;
      }
    }
  }

  if (savedText === undefined) {
    if (diffText === undefined) {
      throw sourceError ?? new SourceUnavailableError(diffSource.description, "no diff");
    }
    const session = SessionDocument.create({
      diffText,
      source: diffSource.description,
      clock,
      filterFiles,
    });
    const engine = new ReconciliationEngine({ session, storage, source: diffSource, clock });
    await engine.requestSave();
    logger.info(`Started review session ${storage.location} (${diffSource.description})`);
    return { engine, session, storage, diffSource, origin: "created" };
  }

  const persisted = parseSessionText(savedText, storage.location, clock);
  if (diffText === undefined) {
    logger.warn(
      `${sourceError?.message ?? "Diff source unavailable"}; resuming from the diff saved in ${storage.location}`,
    );
  }
  let session: SessionDocument;
  try {
    session = SessionDocument.fromPersisted(persisted, {
      diffText: diffText ?? persisted.diffText,
      clock,
      filterFiles,
    });
  } catch (error) {
    if (!(error instanceof MalformedDiffError) || diffText === undefined) {
      throw error;
    }
    logger.warn(`${describeError(error)}; resuming from the diff saved in ${storage.location}`);
    diffText = undefined;
    session = SessionDocument.fromPersisted(persisted, { diffText: persisted.diffText, clock, filterFiles });
  }
  const engine = new ReconciliationEngine({
    session,
    storage,
    source: diffSource,
    clock,
    base: persisted,
    loadedText: savedText,
  });
  const origin: SessionOrigin = diffText === undefined ? "resumed" : "loaded";
  // Anchors were resolved against the fresh diff, or ids were assigned; persist the result.
  if ((diffText !== undefined && diffText !== persisted.diffText) || session.idsAssigned > 0) {
    await engine.requestSave();
  }
  logger.info(`Opened review session ${storage.location} (${session.comments.count} comments)`);
  return { engine, session, storage, diffSource, origin };
}
