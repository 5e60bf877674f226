import { type EventLog, createEventLog } from "@trellis-ui/testkit";
import type { BuildErrorDetails, BuildOwnerOptions } from "../../config.js";
import { type MemoryHost, createMemoryHost } from "../../testing/memoryHost.js";
import { defineStateful, defineStateless } from "../../widgets/define.js";
import type { BuildContext, StateHandle, Widget } from "../../widgets/types.js";
import type { ElementNode } from "../element.js";
import { type BuildOwner, createBuildOwner } from "../owner.js";
import { type RootHandle, attachRootWidget } from "../root.js";

export type Harness = Readonly<{
  memory: MemoryHost;
  owner: BuildOwner;
  errors: BuildErrorDetails[];
  log: EventLog;
  mount: (widget: Widget | null) => RootHandle;
  elementOf: (context: BuildContext) => ElementNode | undefined;
}>;

/** Owner in dev mode with errors collected instead of printed. */
export function createHarness(options: BuildOwnerOptions = {}): Harness {
  const memory = createMemoryHost();
  const errors: BuildErrorDetails[] = [];
  const owner = createBuildOwner({
    devMode: true,
    onError: (details) => {
      errors.push(details);
    },
    ...options,
  });
  return Object.freeze({
    memory,
    owner,
    errors,
    log: createEventLog(),
    mount: (widget: Widget | null) => attachRootWidget(owner, widget, memory.host),
    elementOf: (context: BuildContext) => owner.internals.elements.get(context.instanceId),
  });
}

export type ProbeProps = Readonly<{ label: string; child?: Widget | undefined }>;

/**
 * Stateful widget that logs every lifecycle hook as `<hook>:<label>` and
 * renders its child, or a Leaf with its label.
 */
export function defineProbe(harness: Harness) {
  const { log, memory } = harness;
  const handles = new Map<string, StateHandle<ProbeProps>>();
  const Probe = defineStateful<ProbeProps>("Probe", () => ({
    initState: (state) => {
      handles.set(state.props.label, state);
      log.push(`init:${state.props.label}`);
    },
    didChangeDependencies: (state) => log.push(`deps:${state.props.label}`),
    didUpdateWidget: (state, oldProps) => log.push(`update:${oldProps.label}->${state.props.label}`),
    reassemble: (state) => log.push(`reassemble:${state.props.label}`),
    activate: (state) => log.push(`activate:${state.props.label}`),
    deactivate: (state) => log.push(`deactivate:${state.props.label}`),
    dispose: (state) => log.push(`dispose:${state.props.label}`),
    build: (state) => {
      log.push(`build:${state.props.label}`);
      return state.props.child ?? memory.Leaf({ label: state.props.label });
    },
  }));
  const handle = (label: string): StateHandle<ProbeProps> => {
    const found = handles.get(label);
    if (found === undefined) throw new Error(`no Probe state labelled ${label}`);
    return found;
  };
  return { Probe, handle };
}

/** Stateless widget that records its build context under `label`. */
export function defineContextProbe(harness: Harness) {
  const contexts = new Map<string, BuildContext>();
  const Capture = defineStateless<Readonly<{ label: string }>>("Capture", (props, context) => {
    contexts.set(props.label, context);
    return harness.memory.Leaf({ label: props.label });
  });
  const context = (label: string): BuildContext => {
    const found = contexts.get(label);
    if (found === undefined) throw new Error(`no Capture context labelled ${label}`);
    return found;
  };
  return { Capture, context };
}
