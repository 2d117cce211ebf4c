import { OwnableInvalidOwner, OwnableUnauthorizedAccount } from '../errors';
import { JournaledValue } from '../state/JournaledMap';
import { Network } from '../state/Network';
import { normalizeAddress, ZeroAddress } from '../state/address';

/** Single-owner access control, journaled like the rest of the token state. */
export class Ownable {
  private readonly ownerSlot: JournaledValue<string>;

  constructor(
    private readonly network: Network,
    initialOwner: string,
  ) {
    this.ownerSlot = new JournaledValue(network, normalizeAddress(initialOwner));
  }

  owner(): string {
    return this.ownerSlot.get();
  }

  checkOwner(caller: string): void {
    if (normalizeAddress(caller) !== this.owner()) throw new OwnableUnauthorizedAccount(caller);
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.network.transaction(() => {
      this.checkOwner(caller);
      const next = normalizeAddress(newOwner);
      if (next === ZeroAddress) throw new OwnableInvalidOwner(next);
      this.ownerSlot.set(next);
    });
  }
}
