/**
 * Target resolution.
 *
 * An action may target a single entity, any iterable collection of
 * entities, or nothing at all. The distinction is made once, when the
 * action is applied, and captured in a TargetAdapter so per-frame code
 * never re-inspects the target's shape.
 */

/** Anything an action can be applied to. `null` means "no target". */
export type ActionTarget = object | null;

/** Uniform view over a resolved target. */
export interface TargetAdapter {
  readonly kind: "none" | "single" | "many";
  readonly target: ActionTarget;
  /** Current members. Collections are read live, so later additions are seen. */
  entities(): Iterable<unknown>;
  /** Whether `entity` is the target or one of its members. */
  contains(entity: object): boolean;
  describe(): string;
}

/** Whether a value can be iterated with `for...of`. Strings are not targets. */
export function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === "function";
}

function nameOf(value: object): string {
  return value.constructor?.name || "Object";
}

const NO_TARGET: TargetAdapter = {
  kind: "none",
  target: null,
  entities: () => [],
  contains: () => false,
  describe: () => "none",
};

/** Resolve a target into its adapter. */
export function adaptTarget(target: ActionTarget): TargetAdapter {
  if (target === null) {
    return NO_TARGET;
  }

  if (isIterable(target)) {
    const collection = target;
    return {
      kind: "many",
      target,
      entities: () => collection,
      contains: (entity) => {
        for (const member of collection) {
          if (member === entity) {
            return true;
          }
        }
        return false;
      },
      describe: () => `${nameOf(collection)}(${Array.from(collection).length})`,
    };
  }

  return {
    kind: "single",
    target,
    entities: () => [target],
    contains: (entity) => entity === target,
    describe: () => nameOf(target),
  };
}
