/**
 * Tests for external scripts: record passing, script resolution, the
 * per-record runner and script stages.
 *
 * Run: node --import tsx src/external/external.test.ts
 *
 * Process-level tests run small Node scripts written to a temporary
 * directory, so they need nothing beyond the running node binary.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { BlobStore, ChannelDecodeError } from "../channel/index.js";
import { createLogger } from "../logging/index.js";
import {
  OperationRegistry,
  ResolutionError,
  StageFailedError,
  parsePipelineArgv,
  resolvePipeline,
  runPipeline,
  type OperationContext,
  type PipelineResult,
} from "../pipeline/index.js";
import { createObjectList } from "../records/index.js";
import {
  ChildProcessScriptRunner,
  RECORD_ENV,
  createScriptStageFactory,
  describeExit,
  fieldEnvName,
  fieldToText,
  lastLine,
  passRecord,
  resolveScript,
  type RecordInvocation,
  type ResolvedScript,
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

const tempRoot = mkdtempSync(join(tmpdir(), "graphpipe-external-"));
const logger = createLogger({ file: false });
const RUN_ID = "20240101-abcdef";

function script(name: string, source: string): string {
  const path = join(tempRoot, name);
  writeFileSync(path, source);
  return path;
}

const readStdin = `let text = "";\nfor await (const chunk of process.stdin) text += chunk;\n`;

const upper = script(
  "upper.mjs",
  `${readStdin}const [record] = JSON.parse(text).records;
if (record.name === "bad") {
  process.stderr.write("warming up\\nbad record\\n");
  process.exitCode = 3;
} else {
  const out = { ...record, upper: record.name.toUpperCase() };
  process.stdout.write(JSON.stringify({ format: "graphpipe/objectlist", version: 1, records: [out] }));
}
`
);

const argsScript = script("args.mjs", `process.stdout.write(JSON.stringify([{ argv: process.argv.slice(2) }]));\n`);

const envScript = script(
  "env.mjs",
  `const e = process.env;
process.stdout.write(JSON.stringify([{
  record: e.GRAPHPIPE_RECORD ?? null,
  name: e.GRAPHPIPE_FIELD_NAME ?? null,
  index: e.GRAPHPIPE_RECORD_INDEX ?? null,
  count: e.GRAPHPIPE_RECORD_COUNT ?? null,
  runId: e.GRAPHPIPE_RUN_ID ?? null,
}]));
`
);

const garbage = script("garbage.mjs", `process.stdout.write("not json");\n`);
const sleeper = script("sleep.mjs", `setTimeout(() => {}, 30000);\n`);
const latin1 = script("latin1.mjs", `process.stdout.write(Buffer.from([0x5b, 0x7b, 0x22, 0x6e, 0x22, 0x3a, 0x22, 0xe9, 0x22, 0x7d, 0x5d]));\n`);

const stage = script(
  "stage.mjs",
  `${readStdin}const records = text.trim() === "" ? [] : JSON.parse(text).records;
process.stdout.write(JSON.stringify([{ count: records.length, args: process.argv.slice(2) }]));
process.exitCode = Number(process.argv[2] ?? "0");
`
);

function invocation(path: string, record: Record<string, unknown>, overrides: Partial<RecordInvocation> = {}): RecordInvocation {
  const [validated] = createObjectList([record]);
  assert.ok(validated);
  return {
    script: resolveScript(path),
    fixedArgs: [],
    record: validated,
    index: 0,
    total: 1,
    passMode: "stdin",
    ...overrides,
  };
}

function context(signal: AbortSignal = new AbortController().signal): OperationContext {
  return {
    stageIndex: 0,
    signal,
    logger,
    blobs: new BlobStore(join(tempRoot, "blobs")),
    runId: RUN_ID,
  };
}

const runner = new ChildProcessScriptRunner({ runId: RUN_ID, killGraceMs: 500, logger });

// ═══════════════════════════════════════════════════════════════════════════
// RECORD PASSING
// ═══════════════════════════════════════════════════════════════════════════

section("Record passing");

const sample = createObjectList([
  { name: "ada", size: 3, tags: ["a"], content: { $blob: "/tmp/x" }, note: null },
])[0];
assert.ok(sample);

await test("stdin mode sends a one-record list", async () => {
  const passing = passRecord(sample, "stdin");
  assert.deepEqual(passing.args, []);
  assert.deepEqual(passing.env, {});
  assert.deepEqual(JSON.parse(passing.stdin).records, [sample]);
});

await test("args mode appends --key=value per field", async () => {
  assert.deepEqual(passRecord(sample, "args").args, [
    "--name=ada",
    "--size=3",
    '--tags=["a"]',
    "--content=/tmp/x",
    "--note=",
  ]);
});

await test("env mode exports the record and its scalar fields", async () => {
  const { env, stdin } = passRecord(sample, "env");
  assert.equal(stdin, "");
  assert.deepEqual(JSON.parse(env[RECORD_ENV] ?? "").records, [sample]);
  assert.equal(env.GRAPHPIPE_FIELD_NAME, "ada");
  assert.equal(env.GRAPHPIPE_FIELD_SIZE, "3");
  assert.equal(env.GRAPHPIPE_FIELD_CONTENT, "/tmp/x");
  assert.equal(env.GRAPHPIPE_FIELD_NOTE, "");
  assert.equal(env.GRAPHPIPE_FIELD_TAGS, undefined);
});

await test("field text and variable names", async () => {
  assert.equal(fieldToText(true), "true");
  assert.equal(fieldToText({ a: 1 }), '{"a":1}');
  assert.equal(fieldEnvName("file-name.ext"), "GRAPHPIPE_FIELD_FILE_NAME_EXT");
});

// ═══════════════════════════════════════════════════════════════════════════
// SCRIPT RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Script resolution");

await test("interpreters are chosen by extension", async () => {
  const py = script("tool.py", "");
  const ts = script("tool.ts", "");
  const sh = script("tool.sh", "");
  const bin = script("tool", "");

  assert.deepEqual(resolveScript(py, { python: "py3" }), { path: py, command: "py3", prefixArgs: [] });
  assert.deepEqual(resolveScript(upper), { path: upper, command: process.execPath, prefixArgs: [] });
  assert.deepEqual(resolveScript(ts), { path: ts, command: process.execPath, prefixArgs: ["--import", "tsx"] });
  assert.deepEqual(resolveScript(sh), { path: sh, command: "sh", prefixArgs: [] });
  assert.deepEqual(resolveScript(bin), { path: bin, command: bin, prefixArgs: [] });
});

await test("a missing script is a resolution error", async () => {
  assert.throws(
    () => resolveScript(join(tempRoot, "missing.py")),
    (err: unknown) => err instanceof ResolutionError && err.message.startsWith("script not found: ")
  );
});

await test("a directory is not a script", async () => {
  assert.throws(() => resolveScript(tempRoot), ResolutionError);
});

await test("failure reasons use the last stderr line", async () => {
  assert.equal(lastLine("first\nsecond\n\n"), "second");
  assert.equal(describeExit(3, null, "warming up\nbad record\n"), "exit code 3: bad record");
  assert.equal(describeExit(null, "SIGKILL", ""), "killed by SIGKILL");
});

// ═══════════════════════════════════════════════════════════════════════════
// PER-RECORD RUNNER
// ═══════════════════════════════════════════════════════════════════════════

section("Per-record runner");

await test("stdin mode: the script's output list is decoded", async () => {
  const outcome = await runner.run(invocation(upper, { name: "ada" }));
  assert.deepEqual(outcome, { kind: "success", output: [{ name: "ada", upper: "ADA" }] });
});

await test("a non-zero exit is a failure with the stderr reason", async () => {
  const outcome = await runner.run(invocation(upper, { name: "bad" }));
  assert.deepEqual(outcome, { kind: "failure", reason: "exit code 3: bad record", exitCode: 3, partial: [] });
});

await test("args mode appends fields after the fixed arguments", async () => {
  const outcome = await runner.run(
    invocation(argsScript, { name: "ada", n: 1 }, { passMode: "args", fixedArgs: ["--verbose"] })
  );
  assert.deepEqual(outcome, { kind: "success", output: [{ argv: ["--verbose", "--name=ada", "--n=1"] }] });
});

await test("env mode exposes the record, its position and the run id", async () => {
  const outcome = await runner.run(invocation(envScript, { name: "ada" }, { passMode: "env", index: 2, total: 5 }));
  assert.equal(outcome.kind, "success");
  if (outcome.kind !== "success") return;
  const [row] = outcome.output;
  assert.ok(row);
  assert.equal(row.name, "ada");
  assert.equal(row.index, "2");
  assert.equal(row.count, "5");
  assert.equal(row.runId, RUN_ID);
  assert.equal(typeof row.record, "string");
});

await test("undecodable output on exit 0 is a record failure", async () => {
  const outcome = await runner.run(invocation(garbage, { name: "ada" }));
  assert.equal(outcome.kind, "failure");
  if (outcome.kind !== "failure") return;
  assert.ok(outcome.reason.startsWith("ChannelDecodeError: Malformed or truncated channel input"));
  assert.equal(outcome.exitCode, 0);
});

await test("a command that cannot start is a failure", async () => {
  const missing: ResolvedScript = { path: upper, command: join(tempRoot, "no-such-interpreter"), prefixArgs: [] };
  const outcome = await runner.run({ ...invocation(upper, { name: "ada" }), script: missing });
  assert.equal(outcome.kind, "failure");
  if (outcome.kind !== "failure") return;
  assert.ok(outcome.reason.startsWith(`could not run ${missing.command}: `));
});

await test("aborting terminates the child and reports cancellation", async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 200);
  const started = Date.now();
  const outcome = await runner.run(invocation(sleeper, { name: "ada" }), controller.signal);
  assert.deepEqual(outcome, { kind: "cancelled" });
  assert.ok(Date.now() - started < 10_000);
});

await test("an already aborted signal starts nothing", async () => {
  const controller = new AbortController();
  controller.abort();
  assert.deepEqual(await runner.run(invocation(sleeper, { name: "ada" }), controller.signal), { kind: "cancelled" });
});

// ═══════════════════════════════════════════════════════════════════════════
// SCRIPT STAGES
// ═══════════════════════════════════════════════════════════════════════════

section("Script stages");

const factory = createScriptStageFactory({ killGraceMs: 500 });

await test("names that are not files are left to the registry", async () => {
  assert.equal(factory("search_emails"), undefined);
});

await test("a script stage gets the whole list on stdin", async () => {
  const operation = factory(stage);
  assert.ok(operation);
  const result = await operation.run([], createObjectList([{ a: 1 }, { a: 2 }]), context());
  assert.deepEqual(result, { output: [{ count: 2, args: [] }], status: 0 });
});

await test("status 1 keeps the decoded output", async () => {
  const operation = factory(stage);
  assert.ok(operation);
  const result = await operation.run(["1"], createObjectList([{ a: 1 }]), context());
  assert.deepEqual(result, { output: [{ count: 1, args: ["1"] }], status: 1 });
});

await test("other statuses discard the output", async () => {
  const operation = factory(stage);
  assert.ok(operation);
  const result = await operation.run(["4"], undefined, context());
  assert.deepEqual(result, { output: [], status: 4 });
});

await test("output that is not UTF-8 is a decode error", async () => {
  const operation = factory(latin1);
  assert.ok(operation);
  await assert.rejects(operation.run([], undefined, context()), (err: unknown) => {
    return err instanceof ChannelDecodeError && err.message.startsWith("Channel input is not valid UTF-8: ");
  });
});

function runStage(args: string[]): Promise<PipelineResult> {
  const registry = new OperationRegistry(factory);
  return runPipeline(resolvePipeline(parsePipelineArgv(args), registry), {
    logger,
    blobs: new BlobStore(join(tempRoot, "blobs")),
    runId: RUN_ID,
  });
}

await test("a script exiting 3 fails the pipeline with exit 2", async () => {
  const result = await runStage([stage, "3"]);
  assert.equal(result.exitCode, 2);
  assert.equal(result.failedStage, 0);
  assert.equal(result.stages[0]?.status, 3);
  assert.deepEqual(result.output, []);
});

await test("a script exiting 130 on its own is a failure, not a cancellation", async () => {
  const result = await runStage([stage, "130"]);
  assert.equal(result.cancelled, false);
  assert.equal(result.exitCode, 2);
  assert.equal(result.failedStage, 0);
});

await test("undecodable script output fails the reading stage", async () => {
  await assert.rejects(runStage([latin1]), (err: unknown) => {
    return err instanceof StageFailedError && err.stageIndex === 0 && err.cause instanceof ChannelDecodeError;
  });
});

rmSync(tempRoot, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
