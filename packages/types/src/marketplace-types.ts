import type { Identity } from './common';

export interface Participant {
  identity: Identity;
  displayName: string;
  registered: boolean;
  /** Sale proceeds awaiting withdrawal, pooled across listings */
  pendingBalance: bigint;
}

export interface Listing {
  id: number;
  name: string;
  description: string;
  price: bigint;
  available: boolean;
  owner: Identity;
}
