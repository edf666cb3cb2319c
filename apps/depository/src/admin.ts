/**
 * Administrator capability — who may create and close markets and change
 * reward settings. Principals are hex Ed25519 public keys.
 */

export interface AdministratorCheck {
  isAdministrator(principal: string): boolean;
}

export class SingleAdministrator implements AdministratorCheck {
  private readonly pubkey: string;

  constructor(pubkey: string) {
    this.pubkey = pubkey.toLowerCase();
  }

  isAdministrator(principal: string): boolean {
    return this.pubkey.length > 0 && principal === this.pubkey;
  }
}
