/**
 * resolver.ts - Which customers' data may a user see?
 *
 * Admins see everything and never need a grant lookup. Everyone else
 * (analyst, reviewer, viewer) sees exactly the customers they hold a grant
 * for, at any access level. An unknown user is a non-admin with no grants.
 */

import type { AccessStore } from "../store/types";

export type AccessScope =
  | { kind: "all" }
  | { kind: "customers"; customerIds: string[] };

export class AccessResolver {
  constructor(private readonly store: AccessStore) {}

  async isAdmin(userId: string): Promise<boolean> {
    const user = await this.store.getUser(userId);
    return user?.role === "admin";
  }

  async authorizedCustomers(userId: string): Promise<Set<string>> {
    const grants = await this.store.listGrants(userId);
    return new Set(grants.map((grant) => grant.customerId));
  }

  /**
   * Resolves the tenancy scope for a user. Customer ids come back sorted so
   * the same user always produces the same query.
   */
  async resolveScope(userId: string): Promise<AccessScope> {
    if (await this.isAdmin(userId)) {
      return { kind: "all" };
    }
    const customers = await this.authorizedCustomers(userId);
    return { kind: "customers", customerIds: [...customers].sort() };
  }
}
