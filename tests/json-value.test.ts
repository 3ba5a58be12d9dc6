import {
  fromJsonValue,
  jsonArray,
  jsonEquals,
  jsonNumber,
  jsonObject,
  jsonString,
  parseJsonValue,
  toJsonValue,
  writeJson,
} from "../src/json/value.js";

describe("toJsonValue", () => {
  it("tags every node with its kind", () => {
    const v = toJsonValue({ a: 1, b: [true, null, "x"] });
    expect(v.kind).toBe("object");
    if (v.kind !== "object") return;
    expect(v.entries.get("a")).toEqual({ kind: "number", value: 1 });
    const b = v.entries.get("b");
    expect(b?.kind).toBe("array");
    if (b?.kind !== "array") return;
    expect(b.items.map((i) => i.kind)).toEqual(["bool", "null", "string"]);
  });

  it("rejects undefined members with their location", () => {
    expect(() => toJsonValue({ a: undefined })).toThrow("json: unsupported undefined at $.a");
  });

  it("rejects non-finite numbers", () => {
    expect(() => toJsonValue([1, Number.NaN])).toThrow("json: non-finite number at $[1]");
  });

  it("rejects cycles", () => {
    const node: Record<string, unknown> = {};
    node.self = node;
    expect(() => toJsonValue(node)).toThrow("json: cyclic structure at $.self");
  });

  it("accepts shared but acyclic references", () => {
    const shared = { x: 1 };
    expect(() => toJsonValue({ a: shared, b: shared })).not.toThrow();
  });

  it("jsonNumber refuses infinity", () => {
    expect(() => jsonNumber(Infinity)).toThrow(/finite/);
  });
});

describe("jsonEquals", () => {
  it("ignores object key order", () => {
    expect(jsonEquals(parseJsonValue('{"a":1,"b":2}'), parseJsonValue('{"b":2,"a":1}'))).toBe(true);
  });

  it("respects array order", () => {
    expect(jsonEquals(parseJsonValue("[1,2]"), parseJsonValue("[2,1]"))).toBe(false);
  });

  it("never equates a number with its string form", () => {
    expect(jsonEquals(jsonNumber(8000), jsonString("8000"))).toBe(false);
  });

  it("compares nested structures", () => {
    const a = jsonObject([["list", jsonArray([jsonNumber(1), jsonString("x")])]]);
    const b = parseJsonValue('{"list":[1,"x"]}');
    expect(jsonEquals(a, b)).toBe(true);
  });
});

describe("fromJsonValue", () => {
  it("round-trips through JSON text", () => {
    const text = '{"a":[1,true,null],"b":{"c":"d"}}';
    expect(JSON.stringify(fromJsonValue(parseJsonValue(text)))).toBe(text);
  });

  it("keeps a literal __proto__ key as data", () => {
    const plain = fromJsonValue(parseJsonValue('{"__proto__":{"x":1}}'));
    expect(JSON.stringify(plain)).toBe('{"__proto__":{"x":1}}');
  });
});

describe("object entries", () => {
  it("cannot be modified after construction", () => {
    const v = jsonObject([["a", jsonNumber(1)]]);
    expect(v.entries instanceof Map).toBe(false);
    expect("set" in v.entries).toBe(false);
    expect(Object.isFrozen(v.entries)).toBe(true);
    expect([...v.entries.keys()]).toEqual(["a"]);
    expect(v.entries.size).toBe(1);
  });
});

describe("writeJson", () => {
  it("writes members in insertion order", () => {
    expect(writeJson(parseJsonValue('{"b":1,"a":[true,null,"x\\"y"]}'))).toBe('{"b":1,"a":[true,null,"x\\"y"]}');
  });

  it("stops shortly after the limit", () => {
    expect(writeJson(parseJsonValue("[1,2,3,4,5]"), 4)).toBe("[1,2,");
  });
});

describe("deep nesting", () => {
  const DEPTH = 50000;
  const text = "[".repeat(DEPTH) + "1" + "]".repeat(DEPTH);

  it("converts, compares and writes 50000 levels", () => {
    const value = parseJsonValue(text);
    expect(jsonEquals(value, parseJsonValue(text))).toBe(true);
    expect(jsonEquals(value, parseJsonValue("[".repeat(DEPTH) + "2" + "]".repeat(DEPTH)))).toBe(false);
    expect(writeJson(value)).toBe(text);
  });

  it("rebuilds the plain value", () => {
    let plain = fromJsonValue(parseJsonValue(text));
    let depth = 0;
    while (Array.isArray(plain)) {
      plain = plain[0];
      depth += 1;
    }
    expect(depth).toBe(DEPTH);
    expect(plain).toBe(1);
  });

  it("locates errors deep inside", () => {
    let input: unknown = [undefined];
    for (let i = 0; i < 3; i++) input = { k: input };
    expect(() => toJsonValue(input)).toThrow("json: unsupported undefined at $.k.k.k[0]");
  });
});

