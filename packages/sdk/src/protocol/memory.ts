/**
 * In-memory collaborators
 *
 * Reference implementations of the collaborator interfaces. They keep all
 * state in process and can take part in a {@link MemoryAtomicScope}.
 */

import { LoanError } from "../core/errors.js";
import { Address } from "../core/types.js";
import { Mutex } from "../utils/mutex.js";
import {
	AtomicScope,
	CapabilityRegistry,
	FeeSource,
	NonceRevocation,
	PositionToken,
	Snapshottable,
} from "./types.js";

/**
 * Position token with ids assigned from 1 upwards. Burned ids are never
 * reused.
 */
export class MemoryPositionToken implements PositionToken, Snapshottable {
	private owners: Map<number, Address> = new Map();
	private lastId = 0;

	async mint(owner: Address): Promise<number> {
		this.lastId += 1;
		this.owners.set(this.lastId, owner);
		return this.lastId;
	}

	async burn(id: number): Promise<void> {
		if (!this.owners.delete(id)) {
			throw new LoanError(`Position token ${id} not found`, "NOT_FOUND", {
				id,
			});
		}
	}

	async ownerOf(id: number): Promise<Address | null> {
		return this.owners.get(id) ?? null;
	}

	/**
	 * Move a position to a new holder.
	 */
	async transfer(id: number, from: Address, to: Address): Promise<void> {
		const owner = this.owners.get(id);
		if (owner === undefined) {
			throw new LoanError(`Position token ${id} not found`, "NOT_FOUND", {
				id,
			});
		}
		if (owner !== from) {
			throw new LoanError(
				`Position token ${id} is not owned by ${from}`,
				"UNAUTHORIZED",
				{ id, from },
			);
		}
		this.owners.set(id, to);
	}

	checkpoint(): () => void {
		const owners = new Map(this.owners);
		const lastId = this.lastId;
		return () => {
			this.owners = owners;
			this.lastId = lastId;
		};
	}
}

/**
 * Fee source with a settable rate.
 */
export class StaticFeeSource implements FeeSource {
	constructor(
		private feeBps: bigint,
		private collector: Address,
	) {}

	async fee(): Promise<bigint> {
		return this.feeBps;
	}

	async feeCollector(): Promise<Address> {
		return this.collector;
	}

	setFee(feeBps: bigint): void {
		this.feeBps = feeBps;
	}

	setFeeCollector(collector: Address): void {
		this.collector = collector;
	}
}

export class MemoryCapabilityRegistry implements CapabilityRegistry {
	private tags: Map<Address, Set<string>> = new Map();

	async hasTag(address: Address, tag: string): Promise<boolean> {
		return this.tags.get(address)?.has(tag) ?? false;
	}

	grant(address: Address, tag: string): void {
		const tags = this.tags.get(address) ?? new Set<string>();
		tags.add(tag);
		this.tags.set(address, tags);
	}

	revoke(address: Address, tag: string): void {
		this.tags.get(address)?.delete(tag);
	}
}

export class MemoryNonceRevocation implements NonceRevocation, Snapshottable {
	private spaces: Map<Address, bigint> = new Map();
	private revoked: Set<string> = new Set();

	async isNonceUsable(
		owner: Address,
		nonceSpace: bigint,
		nonce: bigint,
	): Promise<boolean> {
		if ((await this.currentNonceSpace(owner)) !== nonceSpace) return false;
		return !this.revoked.has(nonceKey(owner, nonceSpace, nonce));
	}

	async revokeNonce(
		owner: Address,
		nonceSpace: bigint,
		nonce: bigint,
	): Promise<void> {
		const key = nonceKey(owner, nonceSpace, nonce);
		if (this.revoked.has(key)) {
			throw new LoanError("Nonce already revoked", "NONCE_NOT_USABLE", {
				owner,
				nonceSpace: nonceSpace.toString(),
				nonce: nonce.toString(),
			});
		}
		this.revoked.add(key);
	}

	async currentNonceSpace(owner: Address): Promise<bigint> {
		return this.spaces.get(owner) ?? 0n;
	}

	async revokeNonceSpace(owner: Address): Promise<bigint> {
		const next = (await this.currentNonceSpace(owner)) + 1n;
		this.spaces.set(owner, next);
		return next;
	}

	checkpoint(): () => void {
		const spaces = new Map(this.spaces);
		const revoked = new Set(this.revoked);
		return () => {
			this.spaces = spaces;
			this.revoked = revoked;
		};
	}
}

function nonceKey(owner: Address, nonceSpace: bigint, nonce: bigint): string {
	return `${owner}:${nonceSpace}:${nonce}`;
}

/**
 * Atomic scope over in-memory participants.
 *
 * Operations are serialized; a failing operation restores every
 * participant to its state before the operation started.
 */
export class MemoryAtomicScope implements AtomicScope {
	private readonly mutex = new Mutex();

	constructor(private readonly participants: Snapshottable[]) {}

	run<T>(fn: () => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(async () => {
			const rollbacks = this.participants.map((p) => p.checkpoint());
			try {
				return await fn();
			} catch (err) {
				for (const rollback of rollbacks.reverse()) rollback();
				throw err;
			}
		});
	}
}
