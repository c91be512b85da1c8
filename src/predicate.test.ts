import { describe, expect, test } from "vitest";
import { InvalidArgumentError } from "./errors.ts";
import {
  isEqual,
  isGreaterThan,
  isNotNull,
  isNull,
  UNDEFINED,
  type IsTest,
} from "./is.ts";
import {
  ACCEPT_ALL,
  DENY_ALL,
  PathExpressionPredicate,
  ROOT_OBJ_KEY,
  rootArgs,
} from "./predicate.ts";
import { isolatedCompiler, Person } from "./test-utils.ts";

const { compiler } = isolatedCompiler();

function predicate(when: string, is: IsTest, than = "") {
  return PathExpressionPredicate.of(when, is, than, DENY_ALL, compiler);
}

// -- Construction --

describe("of", () => {
  test("an empty predicate is the default", () => {
    expect(PathExpressionPredicate.of("", UNDEFINED, "", ACCEPT_ALL, compiler)).toBe(ACCEPT_ALL);
    expect(PathExpressionPredicate.of("  ", UNDEFINED, "", null, compiler)).toBeNull();
  });

  test.each([
    [
      "",
      isNull,
      "",
      "The [is] predicate cannot be defined if the [when] path expression is not specified.",
    ],
    [
      "",
      UNDEFINED,
      "name",
      "The [than] path expression cannot be specified if the [when] path expression is not specified.",
    ],
    [
      "name",
      UNDEFINED,
      "",
      "The [is] predicate cannot be undefined if the [when] path expression is specified.",
    ],
    [
      "name",
      isEqual,
      "",
      "The [than] path expression must be specified because the [EQUAL] predicate requires two values.",
    ],
    [
      "name",
      isNotNull,
      "name",
      "The [than] path expression cannot be specified because the [NOT_NULL] predicate requires only one value.",
    ],
  ] as const)("rejects when=%j is=%o than=%j", (when, is, than, message) => {
    const build = () => PathExpressionPredicate.of(when, is, than, DENY_ALL, compiler);
    expect(build).toThrow(InvalidArgumentError);
    expect(build).toThrow(message);
  });

  test("compiles both sides with the given compiler", () => {
    const p = predicate("name", isEqual, "home.state");
    expect(p.when).toBe(compiler.compile("name"));
    expect(p.than).toBe(compiler.compile("home.state"));
  });
});

// -- Evaluation --

describe("test", () => {
  test("ACCEPT_ALL and DENY_ALL ignore their roots", () => {
    expect(ACCEPT_ALL.test(null)).toBe(true);
    expect(DENY_ALL.test(new Person())).toBe(false);
  });

  test("unary tests look at the first root only", () => {
    const p = predicate("home", isNull);
    expect(p.test(new Person())).toBe(true);
    const person = new Person();
    person.home = Person.ADDRESS;
    expect(p.test(person, new Person())).toBe(false);
  });

  test("binary tests compare the two roots", () => {
    const p = predicate("name", isEqual, "name");
    expect(p.test(new Person("Ada"), new Person("Ada"))).toBe(true);
    expect(p.test(new Person("Ada"), new Person("Lin"))).toBe(false);
    expect(p.test(new Person("Ada"))).toBe(true);
  });

  test("a static side ignores its root", () => {
    const p = predicate("name", isEqual, "class(example.Person)NAME");
    expect(p.test(new Person("foo"))).toBe(true);
    expect(p.test(new Person("bar"))).toBe(false);
  });

  test("a class as the root reads static members", () => {
    const p = predicate("NAME", isEqual, "getDefaultName()");
    expect(p.test(Person)).toBe(true);
  });

  test("missing values reach the test as null", () => {
    const p = predicate("home.state", isGreaterThan, "name");
    expect(p.test(new Person(), new Person("Ada"))).toBe(false);
    expect(predicate("home.state", isNull).test(new Person())).toBe(true);
  });

  test("rootObj receives the root of its side", () => {
    const p = predicate("class(example.Person)lowercaseName(rootObj)", isEqual, "name");
    expect(p.needsArguments).toBe(true);
    expect(p.hasOnlyRootObjKey()).toBe(true);
    expect(p.test(new Person("ADA"), new Person("ada"))).toBe(true);
    expect(p.test(new Person("ADA"), new Person("Ada"))).toBe(false);
  });

  test("an explicit argument map replaces the injected root", () => {
    const p = predicate("class(example.Person)lowercaseName(rootObj)", isEqual, "name");
    const args = { [ROOT_OBJ_KEY]: new Person("LIN") };
    expect(p.test(new Person("ADA"), new Person("lin"), args)).toBe(true);
  });

  test("other argument keys come from the argument map", () => {
    const p = predicate("greet(g)", isEqual, "name");
    expect(p.hasOnlyRootObjKey()).toBe(false);
    expect(p.test(new Person("Ada"), new Person("Hi, Ada"), { g: "Hi" })).toBe(true);
  });
});

test("rootArgs", () => {
  const root = new Person();
  expect(rootArgs(compiler.compile("lowercaseName(rootObj)"), root, undefined)).toEqual({
    rootObj: root,
  });
  expect(rootArgs(compiler.compile("name"), root, undefined)).toBeUndefined();
  const args = { g: 1 };
  expect(rootArgs(compiler.compile("lowercaseName(rootObj)"), root, args)).toBe(args);
});

// -- Identity --

test("equals and toString", () => {
  const a = predicate("name", isEqual, "class(example.Person)NAME");
  const b = predicate("name", isEqual, "class(example.Person)NAME");
  expect(a.equals(b)).toBe(true);
  expect(a.equals(predicate("name", isNotNull))).toBe(false);
  expect(ACCEPT_ALL.equals(DENY_ALL)).toBe(false);
  expect(String(a)).toBe("PathExpressionPredicate(name EQUAL class(example.Person)NAME)");
  expect(String(predicate("name", isNull))).toBe("PathExpressionPredicate(name NULL)");
  expect(String(ACCEPT_ALL)).toBe("PathExpressionPredicate(true)");
});
