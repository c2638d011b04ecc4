import type { AuthorizationConfig, AuthorizationPolicy, PublicKeyLike } from "./types.js";

export type LedgerAction = "create" | "end";

export const DEFAULT_CREATE_POLICY: AuthorizationPolicy = "open";
export const DEFAULT_END_POLICY: AuthorizationPolicy = "owner_only";

/**
 * Decides which callers may create and settle campaigns. The authority is
 * admitted under every policy.
 */
export class Authorizer {
  private readonly authority: PublicKeyLike;
  private readonly policies: Record<LedgerAction, AuthorizationPolicy>;
  private readonly allowlist: ReadonlySet<PublicKeyLike>;

  constructor(config: AuthorizationConfig) {
    this.authority = config.authority;
    this.policies = { create: config.createPolicy, end: config.endPolicy };
    this.allowlist = new Set(config.allowlist);
  }

  getAuthority(): PublicKeyLike {
    return this.authority;
  }

  policyFor(action: LedgerAction): AuthorizationPolicy {
    return this.policies[action];
  }

  isAuthorized(action: LedgerAction, caller: PublicKeyLike): boolean {
    switch (this.policies[action]) {
      case "open":
        return true;
      case "owner_only":
        return caller === this.authority;
      case "allowlist":
        return caller === this.authority || this.allowlist.has(caller);
    }
  }
}
