import { expect, test } from "vitest";
import { z } from "zod";
import {
  arrayOf,
  compile,
  createCompiler,
  createDefaultInstanceFactory,
  DENY_ALL,
  field,
  getAll,
  InstantiationError,
  isGreaterThan,
  isNotNull,
  method,
  named,
  PathExpressionPredicate,
  setAll,
  UnsupportedWriteError,
} from "./index.ts";

// -- Test model --

@named("shop.LineItem")
class LineItem {
  @field(String) sku: string | null = null;
  @field(Number) quantity = 0;
}

@named("shop.Customer")
class Customer {
  @field(String) email: string | null = null;
  @field(arrayOf(String)) tags: string[] | null = null;
}

@named("shop.Order")
class Order {
  @field(String) static CURRENCY = "EUR";

  @field(String) id: string | null = null;
  @field(Customer) customer: Customer | null = null;
  @field(arrayOf(LineItem)) items: (LineItem | null)[] | null = null;

  @method(LineItem, z.string())
  item(sku: string): LineItem | null {
    return this.items?.find((item) => item?.sku === sku) ?? null;
  }
}

const factory = createDefaultInstanceFactory().put(arrayOf(LineItem), () => [null, null]);

function buildOrder(): Order {
  return setAll(
    new Order(),
    {
      id: "A-1",
      "customer.email": "buyer@example.test",
      "items[0].sku": "X",
      "items[0].quantity": 2,
      "items[1].sku": "Y",
    },
    { factory },
  );
}

// -- Tests --

test("flat entries build the object graph", () => {
  const order = buildOrder();
  expect(order.customer).toBeInstanceOf(Customer);
  expect(order.items).toHaveLength(2);
  expect(order.items?.[0]).toEqual(Object.assign(new LineItem(), { sku: "X", quantity: 2 }));
  expect(order.items?.[1]?.quantity).toBe(0);
});

test("getAll reads the graph back", () => {
  const values = getAll(buildOrder(), ["id", "customer.email", "items[1].sku", "customer.tags[0]"]);
  expect([...values]).toEqual([
    ["id", "A-1"],
    ["customer.email", "buyer@example.test"],
    ["items[1].sku", "Y"],
    ["customer.tags[0]", null],
  ]);
});

test("method nodes take their arguments by key", () => {
  const order = buildOrder();
  const quantity = compile("item(sku).quantity");
  expect(quantity.getValue(order, { args: { sku: "X" } })).toBe(2);
  quantity.setValue(order, 5, { args: { sku: "Y" } });
  expect(order.items?.[1]?.quantity).toBe(5);
  expect(() => compile("item(sku)").setValue(order, null, { args: { sku: "X" } })).toThrow(
    UnsupportedWriteError,
  );
});

test("static expressions read class members", () => {
  const currency = compile(Order, "CURRENCY");
  expect(currency.source).toBe("class(shop.Order)CURRENCY");
  expect(currency.getStaticValue()).toBe("EUR");
  expect(compile("class(shop.Order)CURRENCY")).toBe(currency);
});

test("type walks follow declared types", () => {
  expect(compile("items[0].sku").getLastMember(Order)).toMatchObject({
    owner: LineItem,
    type: String,
  });
  expect(compile("customer.tags[0]").getLastMember(Order)).toMatchObject({
    owner: Customer,
    type: arrayOf(String),
  });
});

test("predicates compare two orders", () => {
  const larger = PathExpressionPredicate.of(
    "items[0].quantity",
    isGreaterThan,
    "items[0].quantity",
    DENY_ALL,
  );
  const big = buildOrder();
  const small = buildOrder();
  compile("items[0].quantity").setValue(small, 1);
  expect(larger.test(big, small)).toBe(true);
  expect(larger.test(small, big)).toBe(false);

  const hasEmail = PathExpressionPredicate.of("customer.email", isNotNull, "", DENY_ALL);
  expect(hasEmail.test(big)).toBe(true);
  expect(hasEmail.test(new Order())).toBe(false);
});

test("a compiler with strict writes and a log", () => {
  const log: string[] = [];
  const compiler = createCompiler({
    strictWrites: true,
    factory: createDefaultInstanceFactory().put(Customer, () => null),
  });
  compiler.on("autovivify", (info) => log.push(`autovivify ${info.expression} ${info.type}`));
  compiler.on("abandonedWrite", (info) =>
    log.push(`abandonedWrite ${info.expression} ${info.type}`),
  );

  const order = new Order();
  compiler.compile("items[0].sku").setValue(order, "Z");
  expect(() => compiler.compile("customer.email").setValue(order, "x")).toThrow(
    InstantiationError,
  );
  expect(log).toEqual([
    "autovivify items[0].sku LineItem",
    "abandonedWrite customer.email Customer",
  ]);
  expect(order.items).toHaveLength(1);
});
