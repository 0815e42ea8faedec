/**
 * Replace bigints with decimal strings, recursively.
 */
export function toJsonSafe(value: unknown): unknown {
	if (typeof value === "bigint") return value.toString();
	if (Array.isArray(value)) return value.map(toJsonSafe);
	if (value !== null && typeof value === "object") {
		return Object.fromEntries(
			Object.entries(value).map(([key, inner]) => [key, toJsonSafe(inner)]),
		);
	}
	return value;
}
