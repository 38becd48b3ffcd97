/** Order in which variables are declared, parsed and documented. */
export const BUCKET_ORDER = [
	"bool",
	"enum",
	"list",
	"anything",
	"special",
] as const;

export type Bucket = (typeof BUCKET_ORDER)[number];

/**
 * Stable partition into buckets: items keep their relative order inside a
 * bucket.
 */
export function partitionByBucket<T>(
	items: readonly T[],
	bucket: (item: T) => Bucket,
): Record<Bucket, T[]> {
	const out: Record<Bucket, T[]> = {
		bool: [],
		enum: [],
		list: [],
		anything: [],
		special: [],
	};
	for (const item of items) {
		out[bucket(item)].push(item);
	}
	return out;
}

export function inBucketOrder<T>(
	items: readonly T[],
	bucket: (item: T) => Bucket,
): T[] {
	const partition = partitionByBucket(items, bucket);
	return BUCKET_ORDER.flatMap((name) => partition[name]);
}
