/**
 * JSON with object keys sorted at every depth, so that two equal option
 * graphs always print the same text. Shared subtrees are printed at every
 * place they occur; a value that contains itself prints a marker instead.
 */
export function stableStringify(
	value: unknown,
	options?: { space?: number },
): string {
	const visiting = new WeakSet<object>();
	return JSON.stringify(sort(value, visiting), null, options?.space);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sort(value: unknown, visiting: WeakSet<object>): unknown {
	if (value === null || value === undefined) return value;

	if (Array.isArray(value)) {
		if (visiting.has(value)) return { __mkelvis_circular: true };
		visiting.add(value);
		const out = value.map((v) => sort(v, visiting));
		visiting.delete(value);
		return out;
	}

	if (isRecord(value)) {
		if (visiting.has(value)) return { __mkelvis_circular: true };
		visiting.add(value);

		const out: Record<string, unknown> = {};
		for (const key of Object.keys(value).sort()) {
			out[key] = sort(value[key], visiting);
		}

		visiting.delete(value);
		return out;
	}

	return value;
}
