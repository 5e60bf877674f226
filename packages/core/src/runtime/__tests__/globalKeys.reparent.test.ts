import { assert, describe, expectTrellisError, test } from "@trellis-ui/testkit";
import { globalKey, valueKey } from "../../keys/keys.js";
import { createHarness, defineProbe } from "./helpers.js";

describe("global keys", () => {
  test("a global-keyed element moves to a new parent with its state", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    const { Box, List } = h.memory;
    const g = globalKey("probe");
    const root = h.mount(
      List({
        children: [
          Box({ key: valueKey("l"), label: "l" }),
          Box({ key: valueKey("r"), label: "r", child: Probe({ key: g, label: "p" }) }),
        ],
      }),
    );
    const state = handle("p");
    h.log.take();
    h.memory.resetCounts();

    root.update(
      List({
        children: [
          Box({ key: valueKey("l"), label: "l", child: Probe({ key: g, label: "p" }) }),
          Box({ key: valueKey("r"), label: "r" }),
        ],
      }),
    );

    assert.deepEqual(h.log.take(), ["deactivate:p", "activate:p", "update:p->p", "build:p"]);
    assert.equal(handle("p"), state);
    assert.equal(state.lifecycle, "ready");
    assert.equal(h.memory.describe(), "root(list(box:l(leaf:p),box:r))");
    assert.deepEqual(h.memory.ops, ["remove leaf:p", "insert leaf:p into box:l"]);
    assert.equal(h.memory.counts.created, 0);
    assert.equal(h.owner.globalKeyCount(), 1);
  });

  test("the owner finds the element behind a global key", () => {
    const h = createHarness();
    const { Probe, handle } = defineProbe(h);
    const g = globalKey();
    h.mount(h.memory.Box({ child: Probe({ key: g, label: "p" }) }));

    assert.equal(h.owner.currentContext(g), handle("p").context);
    assert.equal(h.owner.currentWidget(g), handle("p").widget);
    assert.equal(h.owner.currentState(g) !== null, true);
    assert.equal(h.owner.currentContext(globalKey()), null);
  });

  test("the key is released when its element is unmounted", () => {
    const h = createHarness();
    const { Probe } = defineProbe(h);
    const g = globalKey();
    const root = h.mount(Probe({ key: g, label: "p" }));
    assert.equal(h.owner.globalKeyCount(), 1);

    root.update(null);

    assert.equal(h.owner.globalKeyCount(), 0);
    assert.equal(h.owner.currentContext(g), null);
  });

  test("handing a key to a widget of another type within one pass is allowed", () => {
    const h = createHarness();
    const { Probe } = defineProbe(h);
    const g = globalKey();
    const root = h.mount(Probe({ key: g, label: "p" }));
    h.log.take();

    root.update(h.memory.Leaf({ key: g, label: "leaf" }));

    assert.deepEqual(h.log.take(), ["deactivate:p", "dispose:p"]);
    assert.equal(h.owner.currentWidget(g)?.kind, "leafRender");
    assert.equal(h.memory.describe(), "root(leaf:leaf)");
  });

  test("two live widgets with one key fail at the end of the pass", () => {
    const h = createHarness();
    const { Probe } = defineProbe(h);
    const g = globalKey("dup");
    const error = expectTrellisError(
      () => h.mount(h.memory.List({ children: [Probe({ key: g, label: "a" }), Probe({ key: g, label: "b" })] })),
      "TRELLIS_DUPLICATE_GLOBAL_KEY",
    );
    assert.equal(
      error.message,
      `Duplicate GlobalKeys detected in widget tree: [GlobalKey#${String(g.id)} dup]. ` +
        "Each key was used by more than one live widget.",
    );
    // Both were built: detection waits for finalizeTree.
    assert.deepEqual(h.log.all().filter((e) => e.startsWith("init")), ["init:a", "init:b"]);
  });

  test("a key claimed by two parents in one update fails", () => {
    const h = createHarness();
    const { Probe } = defineProbe(h);
    const { Box, List } = h.memory;
    const g = globalKey("dup");
    const root = h.mount(List({ children: [Box({ key: valueKey("l") }), Box({ key: valueKey("r") })] }));

    expectTrellisError(
      () =>
        root.update(
          List({
            children: [
              Box({ key: valueKey("l"), child: Probe({ key: g, label: "a" }) }),
              Box({ key: valueKey("r"), child: Probe({ key: g, label: "b" }) }),
            ],
          }),
        ),
      "TRELLIS_DUPLICATE_GLOBAL_KEY",
    );
  });

  test("moving a global-keyed element into its own subtree is a cycle", () => {
    const h = createHarness();
    const { Probe } = defineProbe(h);
    const { Box } = h.memory;
    const g = globalKey("self");
    const root = h.mount(Probe({ key: g, label: "g", child: Box({ label: "inner" }) }));

    const error = expectTrellisError(
      () => root.update(Probe({ key: g, label: "g", child: Box({ label: "inner", child: Probe({ key: g, label: "g" }) }) })),
      "TRELLIS_INVARIANT",
    );
    assert.equal(error.message.startsWith("cycle: Probe-"), true);
    assert.equal(error.message.endsWith("#2 cannot be reparented into its own subtree"), true);
    assert.equal(h.owner.building, false);
  });
});
