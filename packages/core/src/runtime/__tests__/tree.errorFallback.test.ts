import { assert, describe, expectTrellisError, test } from "@trellis-ui/testkit";
import { TrellisError } from "../../errors.js";
import { defineLeafRender, defineStateless } from "../../widgets/define.js";
import { isErrorBox } from "../../widgets/errorWidget.js";
import { createHarness } from "./helpers.js";

describe("build failures", () => {
  test("a throwing build is replaced by an error stand-in and reported", () => {
    const h = createHarness();
    const Bad = defineStateless("Bad", () => {
      throw new Error("boom");
    });
    const { Leaf, List } = h.memory;
    h.mount(List({ children: [Bad({}), Leaf({ label: "ok" })] }));

    assert.equal(h.memory.describe(), "root(list(error,leaf:ok))");
    assert.equal(h.errors.length, 1);
    const details = h.errors[0];
    assert.equal(details?.context, "while building Bad#3");
    assert.equal(details?.chain, "Bad ← List ← [root]");
    assert.equal(details?.error instanceof Error ? details.error.message : null, "boom");

    const list = h.memory.nodeOf(h.memory.root.children[0] ?? {});
    const box = list?.children[0];
    assert.equal(box !== undefined && isErrorBox(box) ? box.message : null, "Error: boom");
  });

  test("the subtree recovers on the next successful build", () => {
    const h = createHarness();
    const Flaky = defineStateless<Readonly<{ fail: boolean }>>("Flaky", (props) => {
      if (props.fail) throw new Error("flaky");
      return h.memory.Leaf({ label: "fine" });
    });
    const { Leaf, List } = h.memory;
    const root = h.mount(List({ children: [Flaky({ fail: true }), Leaf({ label: "ok" })] }));
    assert.equal(h.memory.describe(), "root(list(error,leaf:ok))");

    root.update(List({ children: [Flaky({ fail: false }), Leaf({ label: "ok" })] }));

    assert.equal(h.memory.describe(), "root(list(leaf:fine,leaf:ok))");
    assert.equal(h.errors.length, 1);
  });

  test("without dev mode the stand-in carries no message", () => {
    const h = createHarness({ devMode: false });
    const Bad = defineStateless("Bad", () => {
      throw new Error("secret");
    });
    h.mount(Bad({}));
    const box = h.memory.root.children[0];
    assert.equal(box !== undefined && isErrorBox(box) ? box.message : null, "");
  });

  test("a builder returning null leaves the subtree empty", () => {
    const h = createHarness({ errorWidgetBuilder: () => null });
    const Bad = defineStateless("Bad", () => {
      throw new Error("boom");
    });
    h.mount(h.memory.Box({ child: Bad({}) }));
    assert.equal(h.memory.describe(), "root(box)");
    assert.equal(h.errors.length, 1);
  });

  test("a non-Error throw is wrapped before it is reported", () => {
    const h = createHarness();
    const Bad = defineStateless("Bad", () => {
      throw "plain text";
    });
    h.mount(Bad({}));
    const box = h.memory.root.children[0];
    assert.equal(
      box !== undefined && isErrorBox(box) ? box.message : null,
      "TrellisError: Non-Error value thrown from user code: plain text",
    );
  });

  test("a failing render node below a component is contained at that component", () => {
    const h = createHarness();
    const Fragile = defineLeafRender<Readonly<{ label: string }>, object>("Fragile", {
      createBackingNode: () => {
        throw new Error("no node");
      },
    });
    const Wrapper = defineStateless("Wrapper", () => Fragile({ label: "x" }));
    h.mount(h.memory.List({ children: [Wrapper({}), h.memory.Leaf({ label: "ok" })] }));

    assert.equal(h.memory.describe(), "root(list(error,leaf:ok))");
    assert.equal(h.errors[0]?.context, "while building Wrapper#3");
  });

  test("a stand-in that fails to build aborts the pass", () => {
    const h = createHarness({
      errorWidgetBuilder: () => Exploding({}),
    });
    const Exploding = defineLeafRender<object, object>("Exploding", {
      createBackingNode: () => {
        throw new Error("stand-in failed");
      },
    });
    const Bad = defineStateless("Bad", () => {
      throw new Error("boom");
    });
    expectTrellisError(() => h.mount(Bad({})), "TRELLIS_USER_CODE_THROW");
    assert.equal(h.owner.building, false);
  });

  test("contract violations are not replaced by a stand-in", () => {
    const h = createHarness();
    const Nested = defineStateless("Nested", (_props, context) => {
      h.owner.runBuildScope(context, () => undefined);
      return null;
    });
    expectTrellisError(() => h.mount(Nested({})), "TRELLIS_REENTRANT_CALL");
    assert.equal(h.errors.length, 0);
  });

  test("an onError reporter that throws aborts the pass", () => {
    const h = createHarness({
      onError: () => {
        throw new Error("reporter down");
      },
    });
    const Bad = defineStateless("Bad", () => {
      throw new Error("boom");
    });
    const error = expectTrellisError(() => h.mount(Bad({})), "TRELLIS_USER_CODE_THROW");
    assert.equal(error.message, "reporting the build failure of Bad#2 failed");
    const cause = error instanceof TrellisError ? error.detail?.error : undefined;
    assert.equal(cause instanceof Error ? cause.message : null, "reporter down");
    assert.equal(h.owner.building, false);
  });

  test("an error widget builder that throws aborts the pass", () => {
    const h = createHarness({
      errorWidgetBuilder: () => {
        throw "no stand-in";
      },
    });
    const Bad = defineStateless("Bad", () => {
      throw new Error("boom");
    });
    const error = expectTrellisError(() => h.mount(h.memory.Box({ child: Bad({}) })), "TRELLIS_USER_CODE_THROW");
    assert.equal(error.message, "reporting the build failure of Bad#3 failed");
    assert.equal(h.errors.length, 1);
  });
});
