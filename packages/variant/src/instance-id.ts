/**
 * Instance identity - generation-stamped handles for live objects.
 *
 * The table only tracks slot generations, never the objects themselves, so a
 * Variant can tell that a reference went stale without owning it.
 */

export type InstanceId = {
  readonly index: number;
  readonly generation: number;
};

/**
 * Anything that carries a stable instance identity.
 */
export type Identifiable = {
  readonly instanceId: InstanceId;
};

type Slot = {
  generation: number;
  alive: boolean;
};

const slots: Slot[] = [];
const freeSlots: number[] = [];

/**
 * Allocate a fresh id. Released slots are reused with a bumped generation.
 */
export const allocateInstanceId = (): InstanceId => {
  const reused = freeSlots.pop();
  if (reused !== undefined) {
    const slot = slots[reused];
    if (slot) {
      slot.generation += 1;
      slot.alive = true;
      return { index: reused, generation: slot.generation };
    }
  }

  const index = slots.length;
  slots.push({ generation: 1, alive: true });
  return { index, generation: 1 };
};

/**
 * Invalidate an id. Returns false when it was already released.
 */
export const releaseInstanceId = (id: InstanceId): boolean => {
  if (!isInstanceAlive(id)) {
    return false;
  }
  const slot = slots[id.index];
  if (!slot) {
    return false;
  }
  slot.alive = false;
  freeSlots.push(id.index);
  return true;
};

export const isInstanceAlive = (id: InstanceId): boolean => {
  const slot = slots[id.index];
  return slot !== undefined && slot.alive && slot.generation === id.generation;
};

export const sameInstance = (a: InstanceId, b: InstanceId): boolean =>
  a.index === b.index && a.generation === b.generation;

export const formatInstanceId = (id: InstanceId): string =>
  `#${id.index}:${id.generation}`;

export const isIdentifiable = (value: unknown): value is Identifiable => {
  if (typeof value !== "object" || value === null) return false;
  if (!("instanceId" in value)) return false;
  const id = value.instanceId;
  return (
    typeof id === "object" &&
    id !== null &&
    "index" in id &&
    "generation" in id &&
    typeof id.index === "number" &&
    typeof id.generation === "number"
  );
};
