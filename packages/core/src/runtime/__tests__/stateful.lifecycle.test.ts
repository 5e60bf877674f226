import { assert, describe, expectTrellisError, test } from "@trellis-ui/testkit";
import { defineInherited, defineStateful, defineStateless } from "../../widgets/define.js";
import type { StateHandle } from "../../widgets/types.js";
import { createHarness, defineProbe } from "./helpers.js";

describe("stateful lifecycle", () => {
  test("setState rebuilds the element once per flush", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    const root = h.mount(Probe({ label: "a" }));
    h.log.take();

    handle("a").setState();
    handle("a").setState();
    assert.equal(h.owner.dirtyCount(), 1);
    root.flush();

    assert.deepEqual(h.log.take(), ["build:a"]);
    assert.equal(h.owner.dirtyCount(), 0);
  });

  test("the setState callback runs before the element is marked dirty", () => {
    const h = createHarness();
    let count = 0;
    const saved: StateHandle<object>[] = [];
    const Counter = defineStateful("Counter", () => ({
      initState: (state: StateHandle<object>) => {
        saved.push(state);
      },
      build: () => h.memory.Leaf({ label: String(count) }),
    }));
    const root = h.mount(Counter({}));
    assert.equal(h.memory.describe(), "root(leaf:0)");

    const state = saved[0];
    if (state === undefined) throw new Error("initState did not run");
    state.setState(() => {
      count++;
    });
    root.flush();

    assert.equal(h.memory.describe(), "root(leaf:1)");
  });

  test("state lifecycle moves from ready to defunct", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    const root = h.mount(Probe({ label: "a" }));
    const state = handle("a");
    assert.equal(state.lifecycle, "ready");
    assert.equal(state.mounted, true);

    root.update(null);

    assert.equal(state.lifecycle, "defunct");
    assert.equal(state.mounted, false);
    assert.deepEqual(h.log.all().filter((e) => e.startsWith("dispose")), ["dispose:a"]);
  });

  test("setState after dispose is rejected", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    const root = h.mount(Probe({ label: "a" }));
    const state = handle("a");
    root.update(null);

    expectTrellisError(() => state.setState(), "TRELLIS_INVALID_STATE");
    expectTrellisError(() => state.props, "TRELLIS_INVALID_STATE");
  });

  test("a setState callback returning a promise is rejected", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    h.mount(Probe({ label: "a" }));

    const error = expectTrellisError(() => handle("a").setState(async () => undefined), "TRELLIS_ASYNC_CALLBACK");
    assert.equal(error.message.startsWith("setState callback() of Probe#2 returned a promise."), true);
    assert.equal(h.owner.dirtyCount(), 0);
  });

  test("an async initState is rejected", () => {
    const h = createHarness();
    const Eager = defineStateful("Eager", () => ({
      initState: async () => undefined,
      build: () => null,
    }));
    expectTrellisError(() => h.mount(Eager({})), "TRELLIS_ASYNC_CALLBACK");
  });

  test("reading inherited data from initState is rejected", () => {
    const h = createHarness();
    const Theme = defineInherited<Readonly<{ color: string }>>("Theme", (a, b) => a.color !== b.color);
    const Early = defineStateful("Early", () => ({
      initState: (state: StateHandle<object>) => {
        Theme.of(state.context);
      },
      build: () => null,
    }));
    expectTrellisError(
      () => h.mount(Theme({ color: "red", child: Early({}) })),
      "TRELLIS_INVALID_STATE",
    );
  });

  test("didChangeDependencies runs after initState and again when a provider changes", () => {
    const h = createHarness();
    const Theme = defineInherited<Readonly<{ color: string }>>("Theme", (a, b) => a.color !== b.color);
    const Themed = defineStateful("Themed", () => ({
      didChangeDependencies: (state: StateHandle<object>) => {
        h.log.push(`deps:${Theme.of(state.context)?.color ?? "none"}`);
      },
      build: (state: StateHandle<object>) => h.memory.Leaf({ label: Theme.of(state.context)?.color ?? "none" }),
    }));
    const child = Themed({});
    const root = h.mount(Theme({ color: "red", child }));
    root.update(Theme({ color: "blue", child }));

    assert.deepEqual(h.log.take(), ["deps:red", "deps:blue"]);
    assert.equal(h.memory.describe(), "root(leaf:blue)");
  });

  test("a state whose initState throws is unmounted without deactivate or dispose", () => {
    const h = createHarness();
    const saved: StateHandle<object>[] = [];
    const Broken = defineStateful("Broken", () => ({
      initState: (state: StateHandle<object>) => {
        saved.push(state);
        throw new Error("init failed");
      },
      deactivate: () => h.log.push("deactivate:broken"),
      dispose: () => h.log.push("dispose:broken"),
      build: () => null,
    }));
    const Shell = defineStateless("Shell", () => Broken({}));
    h.mount(h.memory.List({ children: [Shell({}), h.memory.Leaf({ label: "ok" })] }));

    assert.deepEqual(h.log.all(), []);
    assert.equal(h.memory.describe(), "root(list(error,leaf:ok))");
    assert.equal(h.errors[0]?.context, "while building Shell#3");
    const state = saved[0];
    assert.equal(state?.lifecycle, "defunct");
    assert.equal(state?.mounted, false);
    assert.equal(h.owner.internals.elements.size, 5);
  });
});
