// src/kernel-core/L1/Ownership.ts
import type { Address } from '../L0/Primitives.js';
import { enforce, OwnerGuard, AddressGuard } from '../L0/Guards.js';
import type { Emit } from '../L2/State.js';

/**
 * Contract-level administration. Distinct from the per-entity owner or
 * creator fields each ledger keeps on its records.
 */
export interface Ownable {
    owner: Address;
}

export const OWNERSHIP_TRANSFERRED = 'OwnershipTransferred';

export function onlyOwner(target: Readonly<Ownable>, actor: Address): void {
    enforce(OwnerGuard({ actor, owner: target.owner, subject: 'contract' }));
}

export function transferOwnership(target: Ownable, actor: Address, newOwner: Address, emit: Emit): void {
    onlyOwner(target, actor);
    enforce(AddressGuard({ address: newOwner, role: 'new owner' }));

    const previousOwner = target.owner;
    target.owner = newOwner;
    emit(OWNERSHIP_TRANSFERRED, { previousOwner, newOwner });
}
