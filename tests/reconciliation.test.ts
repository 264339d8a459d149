import assert from "node:assert/strict";
import test from "node:test";

import { fileAddress, resolveLine } from "../src/addressModel.js";
import { InvalidAnchorError, MalformedDiffError, PersistenceError } from "../src/errors.js";
import { type ReloadResult, ReconciliationEngine, mergeSessions } from "../src/reconciliation.js";
import { SessionDocument, parseSessionText } from "../src/sessionDocument.js";
import type { LineAddress } from "../src/types.js";
import {
  B_PY_DIFF,
  MemorySessionStorage,
  StubDiffSource,
  TWO_FILE_DIFF,
  editStoredSession,
  steppingClock,
} from "./helpers.js";

class GatedStorage extends MemorySessionStorage {
  started = 0;
  private release: (() => void) | undefined;

  override async write(text: string): Promise<void> {
    this.started++;
    await new Promise<void>((resolve) => {
      this.release = resolve;
    });
    await super.write(text);
  }

  open(): void {
    this.release?.();
    this.release = undefined;
  }
}

async function until(check: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 100 && !check(); attempt++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  assert.ok(check());
}

function lineOf(session: SessionDocument, path: string, lineNumber: number, side: "old" | "new" = "new"): LineAddress {
  const address = resolveLine(session.index, path, lineNumber, side);
  assert.ok(address);
  return address;
}

function setup(options: { source?: StubDiffSource; storage?: MemorySessionStorage } = {}) {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const storage = options.storage ?? new MemorySessionStorage();
  const engine = new ReconciliationEngine({ session, storage, source: options.source, clock });
  return { clock, session, storage, engine };
}

test("a response written externally is adopted without moving the comment", async () => {
  const { session, storage, engine } = setup({ source: new StubDiffSource(TWO_FILE_DIFF) });
  await engine.requestSave();
  const anchor = lineOf(session, "a.py", 11);
  engine.addComment(anchor, "reviewer", "Is eleven right?", "issue");
  await engine.requestSave();
  assert.equal(storage.writes.length, 2);

  editStoredSession(storage, (document) => {
    document.files["a.py"].comments[0].llm_response = "Yes, eleven is intended.";
  });
  const states: string[] = [];
  const results: ReloadResult[] = [];
  engine.on("state", (state: string) => states.push(state));
  engine.on("reloaded", (result: ReloadResult) => results.push(result));
  await engine.reload();

  const comments = session.comments.forFile("a.py");
  assert.equal(comments.length, 1);
  assert.equal(comments[0].response, "Yes, eleven is intended.");
  assert.deepEqual(comments[0].anchor, anchor);
  assert.deepEqual(states, ["loading", "merging", "idle"]);
  assert.deepEqual(results, [
    { matched: 1, inserted: 0, responsesAdopted: 1, skippedDeleted: 0, idsAssigned: 0, diffChanged: false },
  ]);
  assert.equal(storage.writes.length, 2);
});

test("an unsaved local comment and a new external comment both survive the merge", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const saved = session.comments.addComment(lineOf(session, "a.py", 11), "reviewer", "saved", "note");
  const base = session.toPersisted();

  const document = JSON.parse(session.serialize());
  document.files["b.py"].comments.push({
    author: "Agent (Test/1)",
    category: "ai_analysis",
    content: "Five was unused.",
    line_no: 5,
    is_deleted_line: true,
  });
  const external = parseSessionText(JSON.stringify(document), "session.json", clock);

  const unsaved = session.comments.addComment(lineOf(session, "a.py", 10), "reviewer", "unsaved", "note");
  const summary = mergeSessions(session, external, base, clock);

  assert.deepEqual(summary, { matched: 1, inserted: 1, responsesAdopted: 0, skippedDeleted: 0, idsAssigned: 1 });
  assert.equal(session.comments.count, 3);
  assert.ok(session.comments.get(saved.id));
  assert.ok(session.comments.get(unsaved.id));
  assert.equal(session.comments.forFile("b.py")[0].content, "Five was unused.");

  const again = mergeSessions(session, external, external, clock);
  assert.deepEqual(again, { matched: 2, inserted: 0, responsesAdopted: 0, skippedDeleted: 0, idsAssigned: 0 });
  assert.equal(session.comments.count, 3);
  assert.equal(new Set(session.comments.list().map((comment) => comment.id)).size, 3);
});

test("the local response wins when both sides have one", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const answered = session.comments.addComment(lineOf(session, "a.py", 10), "reviewer", "one", "note");
  const open = session.comments.addComment(lineOf(session, "a.py", 12), "reviewer", "two", "note");
  session.comments.setResponse(answered.id, "local answer");

  const document = JSON.parse(session.serialize());
  for (const comment of document.files["a.py"].comments) {
    comment.llm_response = "external answer";
    comment.responded_at = "2026-03-01T00:00:00.000Z";
  }
  const summary = mergeSessions(session, parseSessionText(JSON.stringify(document), "session.json"), undefined);

  assert.equal(summary.responsesAdopted, 1);
  assert.equal(answered.response, "local answer");
  assert.equal(open.response, "external answer");
  assert.equal(open.respondedAt, "2026-03-01T00:00:00.000Z");
});

test("comments deleted locally since the last save stay deleted", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const comment = session.comments.addComment(lineOf(session, "a.py", 11), "reviewer", "drop me", "note");
  const text = session.serialize();
  const base = parseSessionText(text, "session.json");

  session.comments.deleteComment(comment.id);
  const summary = mergeSessions(session, parseSessionText(text, "session.json"), base);

  assert.equal(summary.skippedDeleted, 1);
  assert.equal(session.comments.count, 0);
});

test("agent comments without ids are matched by content and not resurrected once deleted", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const document = JSON.parse(session.serialize());
  document.files["a.py"].comments.push({ author: "agent", category: "note", content: "Looks fine", line_no: 12 });
  const text = JSON.stringify(document);

  const first = parseSessionText(text, "session.json", clock);
  assert.equal(mergeSessions(session, first, undefined).inserted, 1);
  assert.equal(mergeSessions(session, parseSessionText(text, "session.json", clock), first).matched, 1);
  assert.equal(session.comments.count, 1);

  session.comments.deleteComment(session.comments.list()[0].id);
  const summary = mergeSessions(session, parseSessionText(text, "session.json", clock), first);
  assert.equal(summary.skippedDeleted, 1);
  assert.equal(session.comments.count, 0);
});

test("a copied comment that keeps an existing id is kept as a new comment", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const original = session.comments.addComment(lineOf(session, "a.py", 11), "reviewer", "original", "note");
  const base = session.toPersisted();

  const document = JSON.parse(session.serialize());
  const comments = document.files["a.py"].comments;
  comments.push({ ...comments[0], content: "new agent comment" });
  const summary = mergeSessions(session, parseSessionText(JSON.stringify(document), "session.json", clock), base, clock);

  assert.deepEqual(summary, { matched: 1, inserted: 1, responsesAdopted: 0, skippedDeleted: 0, idsAssigned: 1 });
  const merged = session.comments.list();
  assert.deepEqual(
    merged.map((comment) => comment.content),
    ["original", "new agent comment"],
  );
  assert.equal(merged[0].id, original.id);
  assert.notEqual(merged[1].id, original.id);
});

test("external comments repeating one id get distinct ids", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  const document = JSON.parse(session.serialize());
  document.files["b.py"].comments.push(
    { id: "dup", author: "agent", category: "note", content: "first", line_no: 5, is_deleted_line: true },
    { id: "dup", author: "agent", category: "note", content: "second", line_no: null },
  );
  const summary = mergeSessions(session, parseSessionText(JSON.stringify(document), "session.json", clock), undefined, clock);

  assert.deepEqual(summary, { matched: 0, inserted: 2, responsesAdopted: 0, skippedDeleted: 0, idsAssigned: 1 });
  const ids = session.comments.list().map((comment) => comment.id);
  assert.equal(new Set(ids).size, 2);
  assert.equal(session.comments.get("dup")?.content, "first");
});

test("ids assigned to agent comments are written back", async () => {
  const { session, storage, engine } = setup();
  await engine.requestSave();
  editStoredSession(storage, (document) => {
    document.files["a.py"].comments.push({ author: "agent", category: "note", content: "Looks fine", line_no: 12 });
  });

  await engine.reload();

  assert.equal(storage.writes.length, 2);
  const [agentComment] = session.comments.forFile("a.py");
  const saved = JSON.parse(storage.text ?? "").files["a.py"].comments;
  assert.equal(saved.length, 1);
  assert.equal(saved[0].id, agentComment.id);
  assert.equal(engine.dirty, false);
});

test("toggleReviewed rejects paths the session does not know", async () => {
  const { engine } = setup();
  assert.throws(() => engine.toggleReviewed("typo.py"), InvalidAnchorError);
  assert.equal(engine.dirty, false);
  assert.equal(engine.toggleReviewed("b.py"), true);
  await engine.close();
});

test("reviewed flags prefer the local value and extras merge with external on top", () => {
  const clock = steppingClock();
  const session = SessionDocument.create({ diffText: TWO_FILE_DIFF, source: "uncommitted", clock });
  session.reviewed.set("a.py", false);
  session.extra = { theme: "local", kept: true };

  const document = JSON.parse(session.serialize());
  document.files["a.py"].reviewed = true;
  document.files["b.py"].reviewed = true;
  document.theme = "external";
  mergeSessions(session, parseSessionText(JSON.stringify(document), "session.json"), undefined);

  assert.equal(session.reviewed.isReviewed("a.py"), false);
  assert.equal(session.reviewed.isReviewed("b.py"), true);
  assert.deepEqual(session.extra, { theme: "external", kept: true });
});

test("a file that left the diff keeps its comments at file level", async () => {
  const source = new StubDiffSource(TWO_FILE_DIFF);
  const { session, storage, engine } = setup({ source });
  const comment = engine.addComment(lineOf(session, "a.py", 11), "reviewer", "Why eleven?", "issue");
  await engine.requestSave();

  let diffChanges = 0;
  engine.on("diffChanged", () => diffChanges++);
  source.text = `${B_PY_DIFF}\n`;
  await engine.refreshDiff();

  assert.equal(diffChanges, 1);
  assert.deepEqual(comment.anchor, fileAddress("a.py"));
  const document = JSON.parse(storage.text ?? "");
  assert.deepEqual(Object.keys(document.files), ["b.py", "a.py"]);
  assert.equal(document.files["a.py"].comments[0].line_no, null);
  assert.equal(document.files["a.py"].comments[0].content, "Why eleven?");
  assert.equal(document.diff_context, `${B_PY_DIFF}\n`);
});

test("the engine's own writes are not merged again", async () => {
  const { storage, engine } = setup();
  await engine.requestSave();

  let reloads = 0;
  engine.on("reloaded", () => reloads++);
  await engine.reload();

  assert.equal(reloads, 0);
  assert.equal(storage.reads, 1);
  assert.equal(engine.state, "idle");
});

test("a malformed session file pauses the engine without losing local edits", async () => {
  const { session, storage, engine } = setup();
  const comment = engine.addComment(lineOf(session, "a.py", 11), "reviewer", "first", "note");
  await engine.requestSave();
  const goodText = storage.text;

  const errors: Error[] = [];
  engine.on("error", (error: Error) => errors.push(error));
  storage.text = "{ broken";
  await engine.reload();

  assert.equal(engine.state, "error");
  const [failure] = errors;
  assert.ok(failure instanceof PersistenceError);
  assert.equal(failure.reason, "format");
  assert.equal(session.comments.count, 1);

  engine.editComment(comment.id, "edited while broken");
  await engine.requestSave();
  assert.equal(storage.text, "{ broken");
  assert.equal(engine.dirty, true);

  storage.text = goodText;
  await engine.retry();

  assert.equal(engine.state, "idle");
  assert.equal(engine.dirty, false);
  const document = JSON.parse(storage.text ?? "");
  assert.equal(document.files["a.py"].comments[0].content, "edited while broken");
});

test("a deleted session file is recreated by the next save", async () => {
  const { storage, engine } = setup();
  await engine.requestSave();

  storage.text = undefined;
  await engine.reload();
  assert.equal(engine.state, "error");
  const failure = engine.lastError;
  assert.ok(failure instanceof PersistenceError);
  assert.equal(failure.reason, "missing");

  assert.equal(engine.toggleReviewed("a.py"), true);
  await engine.requestSave();

  assert.equal(engine.state, "idle");
  assert.equal(JSON.parse(storage.text ?? "").files["a.py"].reviewed, true);
});

test("a failed write leaves the session dirty", async () => {
  const storage = new MemorySessionStorage();
  const { session, engine } = setup({ storage });
  storage.failWrites = true;

  engine.addComment(lineOf(session, "b.py", 5, "old"), "reviewer", "x", "note");
  await engine.requestSave();

  assert.equal(engine.state, "error");
  assert.equal(engine.dirty, true);
  assert.equal(storage.text, undefined);
});

test("saves requested during a save collapse into one more save", async () => {
  const storage = new GatedStorage();
  const { engine } = setup({ storage });

  const first = engine.requestSave();
  await until(() => storage.started === 1);
  const second = engine.requestSave();
  const third = engine.requestSave();
  assert.equal(second, third);
  assert.notEqual(first, second);

  storage.open();
  await first;
  await until(() => storage.started === 2);
  storage.open();
  await third;

  assert.equal(storage.writes.length, 2);
  const reload = engine.reload();
  assert.equal(engine.reload(), reload);
  await reload;
});

test("close finishes the running save and abandons queued loads", async () => {
  const storage = new GatedStorage();
  const { engine } = setup({ storage });

  const save = engine.requestSave();
  await until(() => storage.started === 1);
  const reload = engine.reload();
  const closing = engine.close();
  storage.open();
  await Promise.all([save, reload, closing]);

  assert.equal(storage.writes.length, 1);
  assert.equal(storage.reads, 0);
  assert.equal(engine.state, "idle");
});

test("a malformed diff keeps the previous diff and reports the error", async () => {
  const source = new StubDiffSource(TWO_FILE_DIFF);
  const { session, engine } = setup({ source });

  source.text = "--- a/a.py\n+++ b/a.py\n@@ -1,x +1 @@\n";
  await engine.refreshDiff();

  assert.equal(engine.state, "error");
  assert.ok(engine.lastError instanceof MalformedDiffError);
  assert.equal(session.diffText, TWO_FILE_DIFF);
  assert.equal(session.files.length, 2);
});

test("an unavailable diff source keeps the current diff during a reload", async () => {
  const source = new StubDiffSource(TWO_FILE_DIFF);
  const { session, storage, engine } = setup({ source });
  const comment = engine.addComment(lineOf(session, "a.py", 10), "reviewer", "?", "note");
  await engine.requestSave();

  source.text = undefined;
  editStoredSession(storage, (document) => {
    document.files["a.py"].comments[0].llm_response = "ok";
  });
  await engine.reload();

  assert.equal(engine.state, "idle");
  assert.equal(comment.response, "ok");
  assert.equal(session.diffText, TWO_FILE_DIFF);
});

test("sources that do not follow the working tree are never asked again", async () => {
  const source = new StubDiffSource(TWO_FILE_DIFF, { type: "commit", sha: "abc1234def" });
  const { storage, engine } = setup({ source });
  await engine.requestSave();

  editStoredSession(storage, (document) => {
    document.reviewer_note = "checked";
  });
  await engine.reload();
  await engine.refreshDiff();

  assert.equal(source.calls, 0);
  assert.equal(engine.session.extra.reviewer_note, "checked");
});
