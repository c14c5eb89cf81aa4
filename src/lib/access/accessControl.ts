/**
 * Role-based access control.
 *
 * Each actor carries a set of roles; every mutating entry point asks
 * `requireRole(actor, role)` before touching state.
 */

import { ErrorCode, TradingError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('AccessControl');

export type Role = 'admin' | 'ai' | 'emergency' | 'keeper';

export const ALL_ROLES: readonly Role[] = ['admin', 'ai', 'emergency', 'keeper'];

export class AccessControl {
  private grants: Map<string, Set<Role>> = new Map();

  /** The initial admin holds every role, as the deployer would. */
  constructor(admin: string) {
    if (!admin) {
      throw new TradingError(ErrorCode.INVALID_ADDRESS, 'Admin actor must be a non-empty id');
    }
    this.grants.set(admin, new Set(ALL_ROLES));
  }

  hasRole(actor: string, role: Role): boolean {
    return this.grants.get(actor)?.has(role) ?? false;
  }

  requireRole(actor: string, role: Role): void {
    if (!this.hasRole(actor, role)) {
      throw new TradingError(ErrorCode.UNAUTHORIZED, `Actor ${actor} is missing role ${role}`, { actor, role });
    }
  }

  grantRole(caller: string, role: Role, actor: string): void {
    this.requireRole(caller, 'admin');
    if (!actor) {
      throw new TradingError(ErrorCode.INVALID_ADDRESS, 'Actor must be a non-empty id');
    }

    const roles = this.grants.get(actor) ?? new Set<Role>();
    roles.add(role);
    this.grants.set(actor, roles);
    log.info({ caller, actor, role }, 'Role granted');
  }

  revokeRole(caller: string, role: Role, actor: string): void {
    this.requireRole(caller, 'admin');

    const roles = this.grants.get(actor);
    if (!roles?.delete(role)) return;
    if (roles.size === 0) this.grants.delete(actor);
    log.info({ caller, actor, role }, 'Role revoked');
  }

  rolesOf(actor: string): Role[] {
    return [...(this.grants.get(actor) ?? [])];
  }
}
