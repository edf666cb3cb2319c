/**
 * Token registry — resolves a 64-char hex address to its TokenAsset.
 */

import type { TokenAsset } from "./types.js";

export class TokenRegistry {
  private readonly tokens = new Map<string, TokenAsset>();

  constructor(tokens: Iterable<TokenAsset> = []) {
    for (const token of tokens) this.register(token);
  }

  register(token: TokenAsset): void {
    this.tokens.set(token.address, token);
  }

  get(address: string): TokenAsset | undefined {
    return this.tokens.get(address);
  }

  has(address: string): boolean {
    return this.tokens.has(address);
  }

  addresses(): string[] {
    return [...this.tokens.keys()];
  }
}
