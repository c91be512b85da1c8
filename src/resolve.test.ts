import { expect, test } from "vitest";
import { InstantiationError, MemberNotFoundError } from "./errors.ts";
import { defaultResolver, memberType } from "./resolve.ts";
import { Address, Person, Strict } from "./test-utils.ts";
import { arrayOf } from "./types.ts";

// -- Fields --

test("declared field: type from @field, reads and writes the instance", () => {
  const person = new Person("Ada");
  const member = defaultResolver.resolveField(Person, "name", "instance");
  expect(member).toMatchObject({
    kind: "field",
    name: "name",
    owner: Person,
    type: String,
    static: false,
    declared: true,
  });
  expect(member.get(person)).toBe("Ada");
  member.set(person, "Grace");
  expect(person.name).toBe("Grace");
});

test("declared array field reports its array type", () => {
  const member = defaultResolver.resolveField(Person, "addresses", "instance");
  expect(member.type).toBe(arrayOf(Address));
});

test("undeclared instance property resolves as Object only with an instance", () => {
  expect(() => defaultResolver.resolveField(Person, "nickname", "instance")).toThrow(
    MemberNotFoundError,
  );
  const member = defaultResolver.resolveField(Person, "nickname", "instance", new Person());
  expect(member.type).toBe(Object);
  expect(member.declared).toBe(false);
});

test("static fields live on the constructor", () => {
  const declared = defaultResolver.resolveField(Person, "ADDRESS", "static");
  expect(declared.type).toBe(Address);
  expect(declared.get(Person)).toBe(Person.ADDRESS);

  const undeclared = defaultResolver.resolveField(Person, "count", "static");
  expect(undeclared.type).toBe(Object);
  expect(undeclared.static).toBe(true);
});

test("a static field is not an instance field", () => {
  expect(() => defaultResolver.resolveField(Person, "NAME", "instance")).toThrow(
    "Field not found: Person.NAME",
  );
});

test("a method is not a field", () => {
  expect(() =>
    defaultResolver.resolveField(Person, "greet", "instance", new Person()),
  ).toThrow("Field not found: Person.greet (is a method)");
});

test("JS builtins are never members", () => {
  const person = new Person();
  for (const name of ["constructor", "__proto__", "prototype"]) {
    expect(() => defaultResolver.resolveField(Person, name, "instance", person)).toThrow(
      MemberNotFoundError,
    );
  }
  expect(() =>
    defaultResolver.resolveMethod(Person, "constructor", [], "instance", person),
  ).toThrow(MemberNotFoundError);
});

test("plain records and the open type accept any field", () => {
  const record = { a: 1 };
  expect(defaultResolver.resolveField(Object, "b", "instance", record).get(record)).toBe(
    undefined,
  );
  expect(defaultResolver.resolveField(Object, "anything", "instance").type).toBe(Object);
});

test("missing field on a class instance", () => {
  expect(() =>
    defaultResolver.resolveField(Address, "zip", "instance", new Address()),
  ).toThrow("Field not found: Address.zip");
});

// -- Methods --

test("declared method: return type and schema-checked invocation", () => {
  const person = new Person("Ada");
  const member = defaultResolver.resolveMethod(Person, "greet", ["Hi"], "instance", person);
  expect(member.returnType).toBe(String);
  expect(member.declared).toBe(true);
  expect(member.invoke(person, ["Hi"])).toBe("Hi, Ada");
});

test("arguments that fail the schemas do not match", () => {
  expect(() =>
    defaultResolver.resolveMethod(Person, "greet", [42], "instance", new Person()),
  ).toThrow(
    "Method not found: Person.greet (no match for (42): arg0: Expected string, received number)",
  );
});

test("undeclared method returns Object", () => {
  const person = new Person();
  const member = defaultResolver.resolveMethod(Person, "setName", ["Lin"], "instance", person);
  expect(member.returnType).toBe(Object);
  member.invoke(person, ["Lin"]);
  expect(person.name).toBe("Lin");
});

test("static methods are invoked on the constructor", () => {
  const member = defaultResolver.resolveMethod(Person, "lowercaseName", [null], "static");
  expect(member.static).toBe(true);
  expect(member.invoke(Person, [new Person("ADA")])).toBe("ada");
});

test("methods of primitives resolve through their wrapper", () => {
  const member = defaultResolver.resolveMethod(String, "toUpperCase", [], "instance", "abc");
  expect(member.invoke("abc", [])).toBe("ABC");
});

test("open type without an instance defers the method lookup", () => {
  const member = defaultResolver.resolveMethod(Object, "greet", ["Yo"], "instance");
  expect(member.returnType).toBe(Object);
  expect(member.invoke(new Person("Bo"), ["Yo"])).toBe("Yo, Bo");
});

test("missing method", () => {
  expect(() => defaultResolver.resolveMethod(Address, "format", [], "instance")).toThrow(
    "Method not found: Address.format",
  );
});

// -- Enumeration and construction --

test("listMembers: declared and inherited members, sorted by name", () => {
  class Employee extends Person {
    badge(): string {
      return "E";
    }
  }
  const names = defaultResolver.listMembers(Employee).map((m) => m.name);
  expect(names).toEqual([
    "addresses",
    "badge",
    "getName",
    "getPhones",
    "greet",
    "hasPhone",
    "home",
    "name",
    "primaryAddress",
    "setName",
    "setPhones",
  ]);
});

test("listMembers: static scope skips function builtins", () => {
  const members = defaultResolver.listMembers(Person, "static");
  expect(members.map((m) => m.name)).toEqual([
    "ADDRESS",
    "NAME",
    "NULL",
    "count",
    "getDefaultName",
    "lowercaseName",
    "setDefaultName",
  ]);
  expect(members.find((m) => m.name === "ADDRESS")?.kind).toBe("field");
});

test("memberType", () => {
  expect(memberType(defaultResolver.resolveField(Person, "home", "instance"))).toBe(Address);
  expect(
    memberType(defaultResolver.resolveMethod(Person, "primaryAddress", [], "instance")),
  ).toBe(Address);
});

test("construct wraps constructor failures", () => {
  expect(defaultResolver.construct(Address)).toBeInstanceOf(Address);
  expect(() => defaultResolver.construct(Strict)).toThrow(InstantiationError);
  expect(() => defaultResolver.construct(Strict)).toThrow(
    "Could not create an instance of Strict: id is required",
  );
});
