/**
 * Signed request check for mutating routes.
 *
 * Body: { signer, sig, payload }. sig is Ed25519 over canonical(payload);
 * payload.timestamp must be within maxAgeSec of the clock either way, and
 * each authentic { signer, payload } is accepted once.
 */

import {
  digestObject,
  verifyRequestSignature,
  type Digest,
  type RequestPayload,
  type SignedRequest,
} from "@curvebond/primitives";
import type { Clock } from "./clock.js";

export const INVALID_SIGNATURE = "invalid_signature";
export const DUPLICATE_REQUEST = "duplicate_request";

/**
 * Digests of accepted requests, each kept until its timestamp leaves the
 * window; past that the window check alone rejects a replay.
 */
export class ReplayGuard {
  private readonly seen = new Map<Digest, number>();

  constructor(private readonly maxAgeSec: number) {}

  /** false if `digest` was already accepted. */
  claim(digest: Digest, timestamp: number, now: number): boolean {
    this.prune(now);
    if (this.seen.has(digest)) return false;
    this.seen.set(digest, timestamp + this.maxAgeSec);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [digest, expiresAt] of this.seen) {
      if (expiresAt < now) this.seen.delete(digest);
    }
  }
}

export interface SignatureCheck {
  clock: Clock;
  maxAgeSec: number;
  replay: ReplayGuard;
}

export interface SignedRejection {
  status: 401 | 409;
  error: string;
  detail: string;
}

/** null when the request is authentic and new, else why it is refused. */
export function signatureProblem<P extends RequestPayload>(
  body: SignedRequest<P>,
  check: SignatureCheck,
): SignedRejection | null {
  const now = check.clock.now();
  if (Math.abs(now - body.payload.timestamp) > check.maxAgeSec) {
    return { status: 401, error: INVALID_SIGNATURE, detail: "timestamp outside allowed window" };
  }
  if (!verifyRequestSignature(body.signer, body.sig, body.payload)) {
    return { status: 401, error: INVALID_SIGNATURE, detail: "signature does not verify" };
  }
  const digest = digestObject({ signer: body.signer, payload: body.payload });
  if (!check.replay.claim(digest, body.payload.timestamp, now)) {
    return { status: 409, error: DUPLICATE_REQUEST, detail: "request already accepted" };
  }
  return null;
}
