// ============================================
// Access Guard
//
// Capability check applied at the boundary of every public engine
// operation. `admin` holds every role.
// ============================================

import { createLogger, UnauthorizedError, ValidationError } from "@idleflow/common";

const logger = createLogger("engine:access");

export type Role = "admin" | "operator" | "keeper" | "guardian" | "depositor";

export const ROLES: readonly Role[] = ["admin", "operator", "keeper", "guardian", "depositor"];

export class AccessGuard {
  private grants = new Map<string, Set<Role>>();

  constructor(admins: readonly string[] = []) {
    for (const admin of admins) this.grant(admin, "admin");
  }

  grant(principal: string, role: Role): void {
    if (!principal) throw new ValidationError("principal is required");
    const roles = this.grants.get(principal) ?? new Set<Role>();
    roles.add(role);
    this.grants.set(principal, roles);
    logger.info(`Granted ${role} to ${principal}`);
  }

  revoke(principal: string, role: Role): void {
    this.grants.get(principal)?.delete(role);
    logger.info(`Revoked ${role} from ${principal}`);
  }

  hasRole(principal: string, role: Role): boolean {
    const roles = this.grants.get(principal);
    if (!roles) return false;
    return roles.has("admin") || roles.has(role);
  }

  require(principal: string, role: Role): void {
    if (!this.hasRole(principal, role)) {
      logger.warn(`Rejected ${principal}: missing role ${role}`);
      throw new UnauthorizedError(principal, role);
    }
  }

  rolesOf(principal: string): Role[] {
    return ROLES.filter((role) => this.grants.get(principal)?.has(role) ?? false);
  }
}
