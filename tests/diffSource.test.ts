import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { parseUnifiedDiff } from "../src/diffParser.js";
import {
  buildNewFileSection,
  createDiffSource,
  describeSource,
  isLiveSource,
  parseSourceDescription,
} from "../src/diffSource.js";
import { SourceUnavailableError } from "../src/errors.js";
import { TWO_FILE_DIFF } from "./helpers.js";

test("source descriptions are short and parse back", () => {
  assert.equal(describeSource({ type: "uncommitted" }), "uncommitted");
  assert.equal(describeSource({ type: "staged" }), "staged");
  assert.equal(describeSource({ type: "branch", base: "main" }), "branch:main");
  assert.equal(describeSource({ type: "commit", sha: "abc1234def5678" }), "commit:abc1234");
  assert.equal(describeSource({ type: "pr", number: 42 }), "pr:42");

  assert.deepEqual(parseSourceDescription("staged"), { type: "staged" });
  assert.deepEqual(parseSourceDescription("branch:release/2.0"), { type: "branch", base: "release/2.0" });
  assert.deepEqual(parseSourceDescription("commit:abc1234"), { type: "commit", sha: "abc1234" });
  assert.deepEqual(parseSourceDescription("pr:7"), { type: "pr", number: 7 });
  assert.equal(parseSourceDescription("pr:0"), undefined);
  assert.equal(parseSourceDescription("branch:"), undefined);
  assert.equal(parseSourceDescription("tag:v1"), undefined);
});

test("only working-tree sources are live", () => {
  assert.equal(isLiveSource({ type: "uncommitted" }), true);
  assert.equal(isLiveSource({ type: "staged" }), true);
  assert.equal(isLiveSource({ type: "branch", base: "main" }), true);
  assert.equal(isLiveSource({ type: "commit", sha: "abc1234" }), false);
  assert.equal(isLiveSource({ type: "pr", number: 1 }), false);
  assert.equal(isLiveSource({ type: "file", path: "x.diff" }), false);
});

test("untracked files are rendered as new-file sections", () => {
  const section = buildNewFileSection("notes/todo.txt", "one\ntwo\n");
  assert.equal(
    section,
    [
      "diff --git a/notes/todo.txt b/notes/todo.txt",
      "new file mode 100644",
      "--- /dev/null",
      "+++ b/notes/todo.txt",
      "@@ -0,0 +1,2 @@",
      "+one",
      "+two",
      "",
    ].join("\n"),
  );

  const [file] = parseUnifiedDiff(section);
  assert.equal(file.change, "added");
  assert.deepEqual(
    file.hunks[0].lines.map((line) => line.newLine),
    [1, 2],
  );

  assert.equal(
    buildNewFileSection("empty.txt", ""),
    "diff --git a/empty.txt b/empty.txt\nnew file mode 100644\n",
  );
});

test("a diff file source reads the file relative to the repository", async () => {
  const repo = await mkdtemp(path.join(os.tmpdir(), "annodiff-source-"));
  try {
    await writeFile(path.join(repo, "change.diff"), TWO_FILE_DIFF, "utf8");
    const source = createDiffSource(repo, { type: "file", path: "change.diff" });

    assert.equal(source.live, false);
    assert.deepEqual(await source.getDiff(), { text: TWO_FILE_DIFF, description: "file:change.diff" });

    const missing = createDiffSource(repo, { type: "file", path: "missing.diff" });
    await assert.rejects(missing.getDiff(), SourceUnavailableError);
  } finally {
    await rm(repo, { recursive: true, force: true });
  }
});
