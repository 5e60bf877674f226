import { assert, describe, test } from "@trellis-ui/testkit";
import { createDefaultErrorWidgetBuilder, normalizeBuildOwnerOptions } from "../config.js";
import { createBuildOwner } from "../runtime/owner.js";
import { attachRootWidget } from "../runtime/root.js";
import { createMemoryHost } from "../testing/memoryHost.js";
import { errorMessageFor, errorWidgetDefinition } from "../widgets/errorWidget.js";

describe("normalizeBuildOwnerOptions", () => {
  test("fills every trace flag", () => {
    const options = normalizeBuildOwnerOptions({ trace: { rebuild: true } });
    assert.deepEqual(options.trace, {
      scheduleBuild: false,
      buildScope: false,
      rebuild: true,
      globalKeyLifecycle: false,
    });
    assert.equal(Object.isFrozen(options), true);
    assert.equal(Object.isFrozen(options.trace), true);
  });

  test("keeps callbacks it is given", () => {
    const onBuildScheduled = (): void => {};
    const traceSink = (_line: string): void => {};
    const options = normalizeBuildOwnerOptions({ onBuildScheduled, traceSink, devMode: false });
    assert.equal(options.onBuildScheduled, onBuildScheduled);
    assert.equal(options.traceSink, traceSink);
    assert.equal(options.devMode, false);
  });

  test("leaves onBuildScheduled unset by default", () => {
    assert.equal(normalizeBuildOwnerOptions().onBuildScheduled, null);
  });
});

describe("errorMessageFor", () => {
  test("shows the error text in dev mode", () => {
    assert.equal(errorMessageFor(new TypeError("bad prop"), true), "TypeError: bad prop");
    assert.equal(errorMessageFor("plain", true), "plain");
  });

  test("hides it otherwise", () => {
    assert.equal(errorMessageFor(new Error("secret"), false), "");
  });
});

describe("default error widget builder", () => {
  test("builds an ErrorWidget with a unique key", () => {
    const memory = createMemoryHost();
    const root = attachRootWidget(createBuildOwner(), null, memory.host);
    const build = createDefaultErrorWidgetBuilder(false);
    const details = { error: new Error("boom"), context: "while building X#2", element: root.context, chain: "X" };

    const first = build(details);
    const second = build(details);
    assert.equal(first?.definition, errorWidgetDefinition);
    assert.equal(first?.kind, "leafRender");
    assert.notEqual(first?.key, second?.key);
  });
});

describe("trace output", () => {
  test("scheduled rebuilds are written to the trace sink", () => {
    const lines: string[] = [];
    const memory = createMemoryHost();
    const owner = createBuildOwner({ trace: { scheduleBuild: true }, traceSink: (line) => lines.push(line) });
    const root = attachRootWidget(owner, memory.Leaf({ label: "a" }), memory.host);
    root.context.visitChildElements((child) => owner.markNeedsBuild(child));
    assert.deepEqual(lines, ["[trellis][schedule] Leaf#2 (1 dirty)"]);
  });
});
