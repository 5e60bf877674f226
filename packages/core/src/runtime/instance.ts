/**
 * packages/core/src/runtime/instance.ts — Element handles.
 *
 * Elements never hold each other directly: parent, children, providers and the
 * global-key registry all refer to elements through numeric handles resolved in
 * the owner's arena.
 */

export type InstanceId = number;

export type InstanceIdAllocator = Readonly<{
  allocate: () => InstanceId;
}>;

export function createInstanceIdAllocator(start = 1): InstanceIdAllocator {
  let next = start;
  return Object.freeze({
    allocate: () => {
      const id = next;
      next++;
      return id;
    },
  });
}
