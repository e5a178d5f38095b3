/**
 * Tests for for_each: the executor state machine, argument parsing and the
 * failure manifest.
 *
 * Run: node --import tsx src/foreach/executor.test.ts
 *
 * Most cases drive the executor with an in-memory ScriptRunner; the last
 * section runs a real Node script per record.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { BlobStore } from "../channel/index.js";
import type { ForEachDefaults } from "../config/index.js";
import {
  ChildProcessScriptRunner,
  resolveScript,
  type RecordInvocation,
  type ResolvedScript,
  type ScriptOutcome,
  type ScriptRunner,
} from "../external/index.js";
import { createLogger } from "../logging/index.js";
import { OperationArgumentError, ResolutionError, type FailureEntry } from "../pipeline/index.js";
import { createObjectList, type ObjectList } from "../records/index.js";
import {
  ForEachExecutor,
  createForEachOperation,
  failuresToObjectList,
  formatFailureSummary,
  parseForEachArgs,
  summarizeBatch,
  type ExecutorState,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

type Behaviour = (invocation: RecordInvocation, signal?: AbortSignal) => Promise<ScriptOutcome>;

class FakeRunner implements ScriptRunner {
  public readonly calls: RecordInvocation[] = [];
  public active = 0;
  public maxActive = 0;
  private readonly behave: Behaviour;

  constructor(behave: Behaviour) {
    this.behave = behave;
  }

  async run(invocation: RecordInvocation, signal?: AbortSignal): Promise<ScriptOutcome> {
    this.calls.push(invocation);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.behave(invocation, signal);
    } finally {
      this.active--;
    }
  }
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const SCRIPT: ResolvedScript = { path: "/scripts/process.py", command: "python3", prefixArgs: [] };

function ids(...values: string[]): ObjectList {
  return createObjectList(values.map((id) => ({ id })));
}

function idOf(invocation: RecordInvocation): string {
  const id = invocation.record.id;
  return typeof id === "string" ? id : "";
}

/** Succeeds with {id, done: true}; ids starting with "bad" exit 3 */
const echo: Behaviour = async (invocation) => {
  const id = idOf(invocation);
  if (id.startsWith("bad")) {
    return { kind: "failure", reason: `exit code 3: cannot process ${id}`, exitCode: 3, partial: [] };
  }
  return { kind: "success", output: createObjectList([{ id, done: true }]) };
};

const logger = createLogger({ file: false });

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTOR
// ═══════════════════════════════════════════════════════════════════════════

section("Aggregation");

await test("outputs are concatenated in input order", async () => {
  const runner = new FakeRunner(echo);
  const result = await new ForEachExecutor(runner).run(ids("a", "b", "c"), SCRIPT);
  assert.deepEqual(result.output, [
    { id: "a", done: true },
    { id: "b", done: true },
    { id: "c", done: true },
  ]);
  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.state, { kind: "done" });
  assert.deepEqual(runner.calls.map((call) => [call.index, call.total]), [[0, 3], [1, 3], [2, 3]]);
});

await test("a record may yield zero or several outputs", async () => {
  const runner = new FakeRunner(async (invocation) => {
    const id = idOf(invocation);
    const output = id === "two" ? [{ id, n: 1 }, { id, n: 2 }] : [];
    return { kind: "success", output: createObjectList(output) };
  });
  const result = await new ForEachExecutor(runner).run(ids("none", "two"), SCRIPT);
  assert.deepEqual(result.output, [
    { id: "two", n: 1 },
    { id: "two", n: 2 },
  ]);
});

await test("with concurrency, order follows the input, not completion", async () => {
  const runner = new FakeRunner(async (invocation) => {
    await delay((5 - invocation.index) * 15);
    return echo(invocation);
  });
  const result = await new ForEachExecutor(runner, { concurrency: 3 }).run(ids("0", "1", "2", "3", "4"), SCRIPT);
  assert.deepEqual(
    result.output.map((record) => record.id),
    ["0", "1", "2", "3", "4"]
  );
  assert.equal(runner.maxActive, 3);
});

await test("an empty list runs nothing and succeeds", async () => {
  const runner = new FakeRunner(echo);
  const result = await new ForEachExecutor(runner).run([], SCRIPT);
  assert.equal(runner.calls.length, 0);
  assert.deepEqual(result.output, []);
  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.state, { kind: "done" });
});

await test("fixed arguments and pass mode reach every invocation", async () => {
  const runner = new FakeRunner(echo);
  await new ForEachExecutor(runner, { passMode: "args" }).run(ids("a", "b"), SCRIPT, ["--dry-run"]);
  assert.deepEqual(
    runner.calls.map((call) => [call.fixedArgs, call.passMode]),
    [
      [["--dry-run"], "args"],
      [["--dry-run"], "args"],
    ]
  );
});

section("Failure isolation");

await test("continue-on-error records failures and keeps going", async () => {
  const runner = new FakeRunner(echo);
  const result = await new ForEachExecutor(runner).run(ids("a", "bad1", "c"), SCRIPT);
  assert.deepEqual(result.output, [
    { id: "a", done: true },
    { id: "c", done: true },
  ]);
  assert.deepEqual(result.failures, [
    { index: 1, identity: { id: "bad1" }, status: "failed", reason: "exit code 3: cannot process bad1", exitCode: 3 },
  ]);
  assert.equal(result.exitCode, 1);
  assert.deepEqual(result.state, { kind: "done" });
  assert.deepEqual([result.total, result.succeeded, result.failed, result.skipped], [3, 2, 1, 0]);
});

await test("every record failing exits 2", async () => {
  const result = await new ForEachExecutor(new FakeRunner(echo)).run(ids("bad1", "bad2"), SCRIPT);
  assert.equal(result.exitCode, 2);
  assert.deepEqual(result.output, []);
  assert.deepEqual(result.state, { kind: "done" });
});

await test("fail-fast stops scheduling and skips the rest", async () => {
  const runner = new FakeRunner(echo);
  const result = await new ForEachExecutor(runner, { failFast: true }).run(ids("a", "bad1", "c", "d"), SCRIPT);
  assert.equal(runner.calls.length, 2);
  assert.deepEqual(result.state, { kind: "failed", index: 1 });
  assert.equal(result.exitCode, 2);
  assert.deepEqual(result.output, [{ id: "a", done: true }]);
  assert.deepEqual(
    result.failures.map((entry) => [entry.index, entry.status, entry.reason]),
    [
      [1, "failed", "exit code 3: cannot process bad1"],
      [2, "skipped", "fail-fast"],
      [3, "skipped", "fail-fast"],
    ]
  );
});

await test("fail-fast lets in-flight invocations finish and keeps their output", async () => {
  const runner = new FakeRunner(async (invocation) => {
    await delay(idOf(invocation) === "slow" ? 60 : 5);
    return echo(invocation);
  });
  const result = await new ForEachExecutor(runner, { failFast: true, concurrency: 2 }).run(
    ids("slow", "bad1", "c"),
    SCRIPT
  );
  assert.deepEqual(result.output, [{ id: "slow", done: true }]);
  assert.deepEqual(result.state, { kind: "failed", index: 1 });
  assert.deepEqual(
    result.failures.map((entry) => [entry.index, entry.status]),
    [
      [1, "failed"],
      [2, "skipped"],
    ]
  );
});

await test("partial output of a failed record is kept only with keepPartial", async () => {
  const behave: Behaviour = async () => ({
    kind: "failure",
    reason: "exit code 1: half done",
    exitCode: 1,
    partial: createObjectList([{ id: "p" }]),
  });
  const dropped = await new ForEachExecutor(new FakeRunner(behave)).run(ids("a"), SCRIPT);
  const kept = await new ForEachExecutor(new FakeRunner(behave), { keepPartial: true }).run(ids("a"), SCRIPT);
  assert.deepEqual(dropped.output, []);
  assert.deepEqual(kept.output, [{ id: "p" }]);
});

await test("a record whose blob is gone fails without running the script", async () => {
  const runner = new FakeRunner(echo);
  const list = createObjectList([{ id: "a", content: { $blob: "/nonexistent/graphpipe/a.bin" } }]);
  const result = await new ForEachExecutor(runner).run(list, SCRIPT);
  assert.equal(runner.calls.length, 0);
  assert.equal(result.failures[0]?.reason, "missing blob: /nonexistent/graphpipe/a.bin");
});

await test("a runner that throws fails only that record", async () => {
  const runner = new FakeRunner(async (invocation) => {
    if (idOf(invocation) === "b") throw new Error("spawn exploded");
    return echo(invocation);
  });
  const result = await new ForEachExecutor(runner).run(ids("a", "b", "c"), SCRIPT);
  assert.equal(result.output.length, 2);
  assert.equal(result.failures[0]?.reason, "runner error: spawn exploded");
  assert.equal(result.exitCode, 1);
});

section("State machine");

await test("transitions: idle, running per record, done", async () => {
  const states: ExecutorState[] = [];
  const executor = new ForEachExecutor(new FakeRunner(echo), { onTransition: (state) => states.push(state) });
  assert.deepEqual(executor.state, { kind: "idle" });
  await executor.run(ids("a", "b"), SCRIPT);
  assert.deepEqual(states, [
    { kind: "running", index: 0, total: 2 },
    { kind: "running", index: 1, total: 2 },
    { kind: "done" },
  ]);
  assert.deepEqual(executor.state, { kind: "done" });
});

await test("an executor runs a single batch", async () => {
  const executor = new ForEachExecutor(new FakeRunner(echo));
  await executor.run(ids("a"), SCRIPT);
  await assert.rejects(executor.run(ids("a"), SCRIPT), /already used \(state: done\)/);
});

await test("cancellation marks interrupted and unscheduled records", async () => {
  const controller = new AbortController();
  const runner = new FakeRunner(
    (_invocation, signal) =>
      new Promise((resolve) => {
        signal?.addEventListener("abort", () => resolve({ kind: "cancelled" }), { once: true });
      })
  );
  setTimeout(() => controller.abort(), 20);
  const result = await new ForEachExecutor(runner).run(ids("a", "b", "c"), SCRIPT, [], controller.signal);
  assert.deepEqual(result.state, { kind: "cancelled" });
  assert.equal(result.exitCode, 130);
  assert.equal(runner.calls.length, 1);
  assert.deepEqual(
    result.failures.map((entry) => [entry.index, entry.status, entry.reason]),
    [
      [0, "skipped", "interrupted"],
      [1, "skipped", "not started"],
      [2, "skipped", "not started"],
    ]
  );
});

await test("cancelling after 2 of 5 records keeps their output and skips the rest", async () => {
  const controller = new AbortController();
  const runner = new FakeRunner(async (invocation, signal) => {
    if (invocation.index < 2) {
      return echo(invocation, signal);
    }
    // The third child is running when the interrupt arrives
    controller.abort();
    return { kind: "cancelled" };
  });
  const result = await new ForEachExecutor(runner).run(ids("a", "b", "c", "d", "e"), SCRIPT, [], controller.signal);
  assert.deepEqual(result.state, { kind: "cancelled" });
  assert.equal(result.exitCode, 130);
  assert.equal(runner.calls.length, 3);
  assert.deepEqual(result.output, [
    { id: "a", done: true },
    { id: "b", done: true },
  ]);
  assert.equal(result.succeeded, 2);
  assert.deepEqual(
    result.failures.map((entry) => [entry.index, entry.status, entry.reason]),
    [
      [2, "skipped", "interrupted"],
      [3, "skipped", "not started"],
      [4, "skipped", "not started"],
    ]
  );
  assert.equal(result.failures.some((entry) => entry.status === "failed"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENTS AND OPERATION
// ═══════════════════════════════════════════════════════════════════════════

section("for_each arguments");

const defaults: ForEachDefaults = { concurrency: 1, failFast: false, passMode: "stdin", killGraceMs: 100 };

await test("options come before the script; the rest belongs to the script", async () => {
  assert.deepEqual(
    parseForEachArgs(
      ["--fail-fast", "--concurrency", "4", "--pass=env", "--keep-partial", "--", "process.py", "--x", "y"],
      defaults
    ),
    {
      failFast: true,
      concurrency: 4,
      passMode: "env",
      keepPartial: true,
      script: "process.py",
      scriptArgs: ["--x", "y"],
    }
  );
});

await test("flags after the script are passed through", async () => {
  const parsed = parseForEachArgs(["process.py", "--fail-fast"], defaults);
  assert.equal(parsed.failFast, false);
  assert.deepEqual(parsed.scriptArgs, ["--fail-fast"]);
});

await test("configured defaults apply and can be overridden", async () => {
  const configured: ForEachDefaults = { concurrency: 2, failFast: true, passMode: "args", killGraceMs: 100 };
  const parsed = parseForEachArgs(["--no-fail-fast", "x.py"], configured);
  assert.deepEqual([parsed.concurrency, parsed.failFast, parsed.passMode], [2, false, "args"]);
});

await test("bad options are argument errors", async () => {
  const message = (args: string[]): string => {
    try {
      parseForEachArgs(args, defaults);
    } catch (err) {
      assert.ok(err instanceof OperationArgumentError);
      return err.message;
    }
    throw new Error("expected OperationArgumentError");
  };
  assert.equal(message(["--bogus", "x.py"]), "unknown for_each option: --bogus");
  assert.equal(message(["--fail-fast"]), "missing script: for_each needs a script to run per record");
  assert.equal(message(["--concurrency=0", "x.py"]), "--concurrency must be a positive integer, got: 0");
  assert.equal(message(["--pass", "pipe", "x.py"]), "--pass must be one of stdin, args, env; got: pipe");
  assert.equal(message(["--concurrency"]), "option --concurrency needs a value");
});

section("for_each operation");

const tempRoot = mkdtempSync(join(tmpdir(), "graphpipe-foreach-"));
const upper = join(tempRoot, "upper.mjs");
writeFileSync(
  upper,
  `let text = "";
for await (const chunk of process.stdin) text += chunk;
const [record] = JSON.parse(text).records;
if (record.name === "bad") {
  process.stderr.write("bad record\\n");
  process.exitCode = 3;
} else {
  process.stdout.write(JSON.stringify([{ ...record, upper: record.name.toUpperCase() }]));
}
`
);

const ctx = {
  stageIndex: 2,
  signal: new AbortController().signal,
  logger,
  blobs: new BlobStore(join(tempRoot, "blobs")),
  runId: "20240101-abcdef",
};

await test("validation resolves the script", async () => {
  const operation = createForEachOperation({ defaults, createRunner: () => new FakeRunner(echo) });
  assert.equal(operation.input, "required");
  assert.throws(() => operation.validate([join(tempRoot, "missing.py")]), ResolutionError);
  operation.validate([upper, "--anything"]);
});

await test("the operation reports status and failures from the batch", async () => {
  const operation = createForEachOperation({ defaults, createRunner: () => new FakeRunner(echo) });
  const result = await operation.run([upper], ids("a", "bad1"), ctx);
  assert.equal(result.status, 1);
  assert.deepEqual(result.output, [{ id: "a", done: true }]);
  assert.equal(result.failures?.length, 1);
});

await test("a real script runs once per record", async () => {
  const executor = new ForEachExecutor(new ChildProcessScriptRunner({ runId: ctx.runId }), { concurrency: 2 });
  const list = createObjectList([{ name: "ada" }, { name: "bad" }, { name: "bob" }]);
  const result = await executor.run(list, resolveScript(upper));
  assert.deepEqual(result.output, [
    { name: "ada", upper: "ADA" },
    { name: "bob", upper: "BOB" },
  ]);
  assert.deepEqual(result.failures, [
    { index: 1, identity: { name: "bad" }, status: "failed", reason: "exit code 3: bad record", exitCode: 3 },
  ]);
  assert.equal(result.exitCode, 1);
});

rmSync(tempRoot, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// MANIFEST
// ═══════════════════════════════════════════════════════════════════════════

section("Failure manifest");

const entries: FailureEntry[] = [
  { index: 1, identity: { id: "b" }, status: "failed", reason: "exit code 3: bad", exitCode: 3, stageIndex: 2 },
  { index: 2, identity: { index: 2 }, status: "skipped", reason: "fail-fast" },
];

await test("summary lists every failed and skipped record", async () => {
  assert.equal(
    formatFailureSummary(entries),
    [
      "Record failures: 1 failed, 1 skipped",
      "  ✗ [stage 2] #1 id=b: exit code 3: bad",
      "  ○ #2 index=2: skipped (fail-fast)",
    ].join("\n")
  );
  assert.equal(formatFailureSummary([]), "No record failures.");
});

await test("batch summary line", async () => {
  assert.equal(
    summarizeBatch({ total: 3, succeeded: 1, failed: 1, skipped: 1 }),
    "1 of 3 records succeeded, 1 failed, 1 skipped"
  );
});

await test("the manifest is itself an object list", async () => {
  assert.deepEqual(failuresToObjectList(entries), [
    { index: 1, status: "failed", reason: "exit code 3: bad", exitCode: 3, stage: 2, record: { id: "b" } },
    { index: 2, status: "skipped", reason: "fail-fast", exitCode: null, stage: null, record: { index: 2 } },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
