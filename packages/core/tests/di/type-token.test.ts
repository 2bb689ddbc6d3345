import { describe, it, expect } from "vitest";
import { token, typeToken, toTypeToken, isTypeToken, Primitive } from "../../src/di/type-token";
import { bindingKey } from "../../src/di/binding-key";
import { named } from "../../src/di/qualifier";

class Repository {}
class SqlRepository extends Repository {}

describe("token", () => {
  it("uses the id as identity and label", () => {
    const Config = token<{ port: number }>("app.Config");

    expect(Config.id).toBe("app.Config");
    expect(Config.label).toBe("app.Config");
  });

  it("accepts any present value without a guard", () => {
    const Config = token<{ port: number }>("app.Config");

    expect(Config.is({ port: 1 })).toBe(true);
    expect(Config.is(0)).toBe(true);
    expect(Config.is(null)).toBe(false);
    expect(Config.is(undefined)).toBe(false);
  });

  it("uses a supplied guard", () => {
    const Port = token<number>("app.Port", (v): v is number => typeof v === "number");

    expect(Port.is(8080)).toBe(true);
    expect(Port.is("8080")).toBe(false);
  });

  it("rejects an empty id", () => {
    expect(() => token("")).toThrow(TypeError);
  });
});

describe("typeToken", () => {
  it("derives identity from the class name", () => {
    expect(typeToken(Repository).id).toBe("Repository");
    expect(typeToken(Repository, "app.data").id).toBe("app.data.Repository");
    expect(typeToken(Repository, "app.data").label).toBe("Repository");
  });

  it("checks values with instanceof", () => {
    const type = typeToken(Repository);

    expect(type.is(new SqlRepository())).toBe(true);
    expect(type.is({})).toBe(false);
  });

  it("yields interchangeable tokens for repeated calls", () => {
    expect(bindingKey(typeToken(Repository))).toBe(bindingKey(typeToken(Repository)));
  });

  it("gives distinct classes that share a name distinct ids", () => {
    const defineSettings = () =>
      class Settings {
        constructor(readonly source: string) {}
      };
    const LocalSettings = defineSettings();
    const RemoteSettings = defineSettings();

    const local = typeToken(LocalSettings);
    const remote = typeToken(RemoteSettings);

    expect(local.id).toBe("Settings");
    expect(remote.id).toBe("Settings#2");
    expect(remote.label).toBe("Settings");
    expect(typeToken(LocalSettings).id).toBe("Settings");
    expect(typeToken(RemoteSettings).id).toBe("Settings#2");
    expect(typeToken(RemoteSettings, "app").id).toBe("app.Settings");
  });
});

describe("toTypeToken / isTypeToken", () => {
  it("passes tokens through and converts classes", () => {
    const Config = token("app.Config");

    expect(toTypeToken(Config)).toBe(Config);
    expect(toTypeToken(Repository).id).toBe("Repository");
  });

  it("recognises token-shaped values", () => {
    expect(isTypeToken(token("a"))).toBe(true);
    expect(isTypeToken({ id: "a" })).toBe(false);
    expect(isTypeToken(Repository)).toBe(false);
  });
});

describe("Primitive", () => {
  it("guards with typeof", () => {
    expect(Primitive.String.is("a")).toBe(true);
    expect(Primitive.String.is(1)).toBe(false);
    expect(Primitive.Number.is(1)).toBe(true);
    expect(Primitive.Boolean.is(false)).toBe(true);
    expect(Primitive.BigInt.is(1n)).toBe(true);
    expect(Primitive.Symbol.is(Symbol("s"))).toBe(true);
    expect(Primitive.Function.is(() => 1)).toBe(true);
    expect(Primitive.Object.is({})).toBe(true);
    expect(Primitive.Object.is(null)).toBe(false);
  });
});

describe("bindingKey", () => {
  it("joins the type id and qualifier", () => {
    expect(bindingKey(token("app.Repo"))).toBe("app.Repo:");
    expect(bindingKey(token("app.Repo"), named("main"))).toBe("app.Repo:main");
  });
});
