import { cloneDeepWith, isPlainObject } from "es-toolkit";
import type { EventIsolation } from "../../config/types";

function isBuiltinContainer(value: object): boolean {
    return (
        Array.isArray(value) ||
        ArrayBuffer.isView(value) ||
        value instanceof ArrayBuffer ||
        value instanceof Map ||
        value instanceof Set ||
        value instanceof Date ||
        value instanceof RegExp
    );
}

/** Instances of user classes: anything that is neither plain data nor a builtin container. */
function isClassInstance(value: unknown): value is object {
    if (typeof value !== "object" || value === null || isBuiltinContainer(value)) return false;
    return !isPlainObject(value);
}

/**
 * Copy of an event value for one reader.
 *
 * `"clone"` deep-copies plain objects, arrays, maps, sets, dates and typed
 * arrays, so a reader's writes never reach anyone else. Class instances are
 * shared, frozen shallowly: copying them would drop `#private` state.
 */
export function isolateEvent<T>(value: T, mode: EventIsolation): T {
    if (mode === "none") return value;
    return cloneDeepWith(value, (child) => {
        if (!isClassInstance(child)) return undefined;
        return Object.freeze(child);
    });
}
