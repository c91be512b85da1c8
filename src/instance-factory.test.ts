import { expect, test } from "vitest";
import { InstantiationError } from "./errors.ts";
import {
  createDefaultInstanceFactory,
  defaultInstanceFactory,
  DelegatedInstanceFactory,
  produce,
} from "./instance-factory.ts";
import { Address, Person, Strict } from "./test-utils.ts";
import { arrayOf } from "./types.ts";

test("falls back to the default constructor", () => {
  const factory = new DelegatedInstanceFactory();
  expect(factory.get(Address)).toBeInstanceOf(Address);
  expect(factory.get(Address)).not.toBe(factory.get(Address));
});

test("unregistered array types produce an empty array", () => {
  expect(new DelegatedInstanceFactory().get(arrayOf(Address))).toEqual([]);
});

test("put registers a producer, last one wins", () => {
  const factory = new DelegatedInstanceFactory()
    .put(Person, () => new Person("first"))
    .put(Person, () => new Person("second"));
  expect(factory.has(Person)).toBe(true);
  expect(factory.get(Person)).toEqual(new Person("second"));
});

test("producers receive the argument map", () => {
  const factory = new DelegatedInstanceFactory().put(Person, (args) => {
    const name = args?.name;
    return new Person(typeof name === "string" ? name : null);
  });
  expect(factory.get(Person, { name: "Ada" })).toEqual(new Person("Ada"));
});

test("remove reverts to default construction", () => {
  const factory = new DelegatedInstanceFactory().put(Address, () => null);
  expect(factory.get(Address)).toBeNull();
  factory.remove(Address);
  expect(factory.has(Address)).toBe(false);
  expect(factory.get(Address)).toBeInstanceOf(Address);
});

test("default factory yields zero values for primitive wrappers", () => {
  expect(defaultInstanceFactory.get(Number)).toBe(0);
  expect(defaultInstanceFactory.get(Boolean)).toBe(false);
  expect(defaultInstanceFactory.get(String)).toBe("");
});

test("default factories are independent", () => {
  const factory = createDefaultInstanceFactory().put(Number, () => 1);
  expect(factory.get(Number)).toBe(1);
  expect(defaultInstanceFactory.get(Number)).toBe(0);
});

test("a throwing constructor surfaces as InstantiationError", () => {
  const factory = new DelegatedInstanceFactory();
  expect(() => factory.get(Strict)).toThrow(InstantiationError);
});

test("produce attributes producer failures to the requested type", () => {
  const cause = new Error("pool exhausted");
  const factory = new DelegatedInstanceFactory().put(Address, () => {
    throw cause;
  });
  let error: unknown;
  try {
    produce(factory, Address, undefined);
  } catch (err) {
    error = err;
  }
  expect(error).toBeInstanceOf(InstantiationError);
  expect(error).toMatchObject({
    code: "INSTANTIATION_FAILURE",
    typeName: "Address",
    message: "Could not create an instance of Address: pool exhausted",
    cause,
  });
});
