// Exercises the public entry point the way an application wires itself:
// a core module, a feature module composed from it, and resolution with
// parameters, qualifiers and providers.
import { describe, it, expect } from "vitest";
import {
  module,
  named,
  token,
  typeToken,
  Primitive,
  BindingNotFoundError,
  ParameterError,
} from "../src/index";
import type { Provider } from "../src/index";

// -- Fixtures -----------------------------------------------------------------

class Repository {
  private readonly rows = new Map<string, string>();

  save(id: string, value: string): void {
    this.rows.set(id, value);
  }

  find(id: string): string | undefined {
    return this.rows.get(id);
  }
}

class Counter {
  value = 0;

  next(): number {
    this.value += 1;
    return this.value;
  }
}

class UseCase {
  constructor(
    readonly repository: Repository,
    readonly id: string,
  ) {}
}

class ViewModel {
  constructor(
    readonly counter: Counter,
    readonly useCases: Provider<UseCase>,
  ) {}
}

const ApiUrl = token<string>("config.ApiUrl", (v): v is string => typeof v === "string");
const RepositoryToken = typeToken(Repository, "app.data");

// -- Modules ------------------------------------------------------------------

const coreModule = module(
  (b) => {
    b.singleton(Repository, () => new Repository());
    b.singleton(Counter, () => new Counter());
    b.factory(ApiUrl, named("primary"), () => "https://primary.example.test");
    b.factory(ApiUrl, named("fallback"), () => "https://fallback.example.test");
  },
  { name: "core" },
);

const appModule = module(
  [coreModule],
  (b) => {
    b.factory(UseCase, (params, scope) =>
      new UseCase(scope.instance(Repository), params.get(Primitive.String)),
    );
    b.factory(ViewModel, (_params, scope) =>
      new ViewModel(scope.instance(Counter), scope.providerOf(UseCase, undefined, "from-view")),
    );
  },
  { name: "app" },
);

// -- Tests --------------------------------------------------------------------

describe("application wiring", () => {
  it("resolves a parameterised factory against an inherited singleton", () => {
    const useCase = appModule.instance(UseCase, "exampleId");

    expect(useCase.id).toBe("exampleId");
    expect(useCase.repository).toBe(appModule.instance(Repository));
  });

  it("creates a fresh view model around the shared counter", () => {
    const first = appModule.instance(ViewModel);
    const second = appModule.instance(ViewModel);

    expect(first).not.toBe(second);
    expect(first.counter).toBe(second.counter);
    expect(first.counter.next()).toBe(1);
    expect(second.counter.next()).toBe(2);
  });

  it("hands out a provider that builds use cases on demand", () => {
    const viewModel = appModule.instance(ViewModel);

    const useCase = viewModel.useCases.get();

    expect(useCase.id).toBe("from-view");
    expect(viewModel.useCases.get()).not.toBe(useCase);
  });

  it("resolves qualified configuration values", () => {
    expect(appModule.instance(ApiUrl, named("primary"))).toBe("https://primary.example.test");
    expect(appModule.instance(ApiUrl, named("fallback"))).toBe("https://fallback.example.test");
    expect(() => appModule.instance(ApiUrl)).toThrow(BindingNotFoundError);
  });

  it("reports a missing parameter from the producer", () => {
    expect(() => appModule.instance(UseCase)).toThrow(ParameterError);
  });

  it("keeps the core module unaware of feature bindings", () => {
    expect(coreModule.has(UseCase)).toBe(false);
    expect(appModule.has(UseCase)).toBe(true);
  });

  it("keys namespaced class tokens separately from plain class tokens", () => {
    const m = module([coreModule], (b) => {
      b.singleton(RepositoryToken, () => new Repository());
    });

    expect(m.keys()).toContain("app.data.Repository:");
    expect(m.instance(RepositoryToken)).not.toBe(m.instance(Repository));
  });

  it("lists the bindings of the finished module", () => {
    expect(appModule.keys()).toEqual([
      "Counter:",
      "Repository:",
      "UseCase:",
      "ViewModel:",
      "config.ApiUrl:fallback",
      "config.ApiUrl:primary",
    ]);
  });
});
