import assert from "node:assert/strict";
import { test } from "node:test";
import { run } from "./helpers.ts";

const outputOf = (src: string): string[] => {
  const { output, errors } = run(src);
  assert.deepEqual(errors, []);
  return output;
};

test("Classes: fields, methods and representation", () => {
  const src = `
    class Point {
      init(x, y) {
        this.x = x;
        this.y = y;
      }
      sum() { return this.x + this.y; }
    }
    var p = Point(1, 2);
    print p.sum();
    print p;
    print Point;
    print p.sum;
  `;
  assert.deepEqual(outputOf(src), ["3", "Point instance", "Point", "<fn sum>"]);
});

test("Classes: constructor call always yields the instance", () => {
  const src = `
    class A {
      init() {
        this.v = 1;
        return;
      }
    }
    var a = A();
    print a.init() == a;
    print a.v;
  `;
  assert.deepEqual(outputOf(src), ["true", "1"]);
});

test("Classes: fields shadow methods", () => {
  const src = `
    class A { m() { return "method"; } }
    var a = A();
    print a.m();
    a.m = "field";
    print a.m;
  `;
  assert.deepEqual(outputOf(src), ["method", "field"]);
});

test("Classes: bound methods remember their instance", () => {
  const src = `
    class A {
      init(n) { this.n = n; }
      get() { return this.n; }
    }
    var g = A(7).get;
    print g();
  `;
  assert.deepEqual(outputOf(src), ["7"]);
});

test("Classes: instances are shared by reference", () => {
  const src = `
    class Box {}
    var a = Box();
    var b = a;
    print b.v = 3;
    print a.v;
  `;
  assert.deepEqual(outputOf(src), ["3", "3"]);
});

test("Classes: methods are inherited and init arity follows the chain", () => {
  const src = `
    class A {
      init(x) { this.x = x; }
      describe() { return "x=" + this.x; }
    }
    class B < A {}
    print B("4").describe();
  `;
  assert.deepEqual(outputOf(src), ["x=4"]);
});

test("Classes: super resolves from the defining class", () => {
  const src = `
    class A {
      method() { print "A method"; }
    }
    class B < A {
      method() { print "B method"; }
      test() { super.method(); }
    }
    class C < B {}
    C().test();
  `;
  assert.deepEqual(outputOf(src), ["A method"]);
});

test("Classes: super chains across three levels", () => {
  const src = `
    class A { name() { return "A"; } }
    class B < A { name() { return "B>" + super.name(); } }
    class C < B { name() { return "C>" + super.name(); } }
    print C().name();
  `;
  assert.deepEqual(outputOf(src), ["C>B>A"]);
});

test("Classes: class arity is checked", () => {
  assert.deepEqual(run("class A {} A(1);").errors, [
    "[line 1, column 15] Runtime error: Expected 0 arguments but got 1.",
  ]);
});

test("Classes: superclass must be a class", () => {
  assert.deepEqual(run("var x = 1; class B < x {}").errors, [
    "[line 1, column 22] Runtime error: Superclass must be a class.",
  ]);
});

test("Classes: undefined property", () => {
  assert.deepEqual(run("class A {} print A().nope;").errors, [
    "[line 1, column 22] Runtime error: Undefined property 'nope'.",
  ]);
});

test("Classes: only instances have properties", () => {
  assert.deepEqual(run('var s = "x"; print s.len;').errors, [
    "[line 1, column 22] Runtime error: Only instances have properties.",
  ]);
  assert.deepEqual(run('var s = "x"; s.len = 1;').errors, [
    "[line 1, column 16] Runtime error: Only instances have fields.",
  ]);
});
