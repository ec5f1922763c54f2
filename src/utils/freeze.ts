/**
 * Recursively freezes plain objects and arrays. Returns the same reference.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
    if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
        return value;
    }

    Object.freeze(value);
    for (const child of Object.values(value)) {
        deepFreeze(child);
    }
    return value;
}
