import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { spawnSync } from "node:child_process";
import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";

const projectRoot = fileURLToPath(new URL("..", import.meta.url));

function runCli(baseDir: string) {
  return spawnSync(
    process.execPath,
    ["--import", "tsx", "src/index.ts", "run", "--base-dir", baseDir],
    { cwd: projectRoot, env: {}, encoding: "utf-8", timeout: 60_000 },
  );
}

describe("mood-digest run", () => {
  let dir = "";

  beforeEach(() => {
    dir = join(
      tmpdir(),
      `mood-digest-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
    );
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    try {
      rmSync(dir, { recursive: true });
    } catch {
      // ignore
    }
  });

  it("exits with 1 when there is no debug input", () => {
    const result = runCli(dir);
    assert.equal(result.status, 1);
  });

  it("exits with 0 and writes the grouped conversations", () => {
    mkdirSync(join(dir, "debug"));
    writeFileSync(
      join(dir, "debug", "conversation_history.txt"),
      "U01: hello there (timestamp: 2025-02-28 07:57:11)\n" +
        "U02: hi (timestamp: 2025-02-28 08:00:00)\n" +
        "U01: good morning (timestamp: 2025-03-01 09:00:00)",
      "utf-8",
    );

    const result = runCli(dir);

    assert.equal(result.status, 0);
    assert.equal(
      readFileSync(join(dir, "debug", "result.txt"), "utf-8"),
      "=== 日付ごとの会話データ ===\n" +
        "\nDate: 2025-02-28\nU01: hello there\nU02: hi\n" +
        "\nDate: 2025-03-01\nU01: good morning\n",
    );
  });
});
