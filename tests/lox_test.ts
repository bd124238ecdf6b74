import assert from "node:assert/strict";
import { test } from "node:test";
import { ExitCode, Lox } from "../src/lox.ts";
import { run, session } from "./helpers.ts";

const program = `
  var greeting = "hello";
  fun shout(s) { return s + "!"; }
  print shout(greeting);
`;

test("Lox: re-running against fresh globals gives identical output", () => {
  const first = run(program);
  const second = run(program);
  assert.deepEqual(first.output, ["hello!"]);
  assert.deepEqual(second, first);
});

test("Lox: nothing survives between sessions", () => {
  const { lox } = session();
  assert.equal(lox.run("var a = 1;"), "ok");

  const fresh = session();
  assert.equal(fresh.lox.run("print a;"), "runtime-error");
  assert.deepEqual(fresh.errors, [
    "[line 1, column 7] Runtime error: Undefined variable 'a'.",
  ]);
});

test("Lox: one session keeps its globals across runs", () => {
  const { lox, output, errors } = session();
  lox.run("var a = 1;");
  lox.run("print a");
  lox.run("a = a + 1;");
  lox.run("print a;");
  assert.deepEqual(output, ["2"]);
  assert.deepEqual(errors, [
    "[line 1, column 8] Error at end: Expect ';' after value.",
  ]);
  assert.equal(lox.globals.has("a"), true);
});

test("Lox: a static error skips execution", () => {
  const parseFailure = run("print 1; print ;");
  assert.equal(parseFailure.status, "static-error");
  assert.deepEqual(parseFailure.output, []);

  const scanFailure = run("print 1; @");
  assert.equal(scanFailure.status, "static-error");
  assert.deepEqual(scanFailure.output, []);
  assert.deepEqual(scanFailure.errors, [
    "[line 1, column 10] Error: Unexpected character '@'.",
  ]);
});

test("Lox: a session recovers after an error", () => {
  const { lox, output } = session();
  assert.equal(lox.run("print nope;"), "runtime-error");
  assert.equal(lox.run("print 1;"), "ok");
  assert.deepEqual(output, ["1"]);
});

test("Lox: exit codes", () => {
  assert.equal(Lox.exitCode("ok"), ExitCode.OK);
  assert.equal(Lox.exitCode("static-error"), 65);
  assert.equal(Lox.exitCode("runtime-error"), 70);
  assert.equal(ExitCode.USAGE, 64);
});

test("Lox: host limits map to the static and runtime exit codes", () => {
  const nested = run(`print ${"-".repeat(200000)}1;`);
  assert.equal(nested.status, "static-error");
  assert.equal(Lox.exitCode(nested.status), ExitCode.STATIC_ERROR);

  const grown = run('var s = "a"; while (true) s = s + s;');
  assert.equal(grown.status, "runtime-error");
  assert.equal(Lox.exitCode(grown.status), ExitCode.RUNTIME_ERROR);
});
