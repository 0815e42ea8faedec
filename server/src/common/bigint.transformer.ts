import { ValueTransformer } from "typeorm";

/**
 * Stores bigints as decimal text; SQLite integers stop at 64 bits.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined): string | null | undefined =>
		value === null || value === undefined ? value : value.toString(),
	from: (value: string | null): bigint | null =>
		value === null ? null : BigInt(value),
};
