import { Injectable } from '@nestjs/common';
import { isStaffRole, type MemberRole } from '@shared/order';
import type { AuthenticatedUser } from '../auth/bearer-auth.guard';
import { notAMember, tenantNotFound, tenantRequired } from '../common/api-errors';
import { AppLogger } from '../common/app-logger';
import { bindTenantToLogContext } from '../common/log-context';
import { TenantsRepository, type ProfileRecord } from './tenants.repository';

export type TenantContext = {
  tenantId: string;
  userId: string;
  email?: string;
  role: MemberRole;
  isStaff: boolean;
};

const LEGACY_STAFF_ROLES: readonly MemberRole[] = [
  'manager',
  'kitchen',
  'delivery',
];

/** Role given to a user joining a tenant implicitly. */
export function roleFromLegacyProfile(legacyRole: string | null | undefined): MemberRole {
  const normalized = legacyRole?.trim().toLowerCase();
  const match = LEGACY_STAFF_ROLES.find((role) => role === normalized);
  return match ?? 'customer';
}

@Injectable()
export class TenantContextService {
  private readonly logger = new AppLogger(TenantContextService.name);

  constructor(private readonly tenants: TenantsRepository) {}

  async resolve(
    user: AuthenticatedUser,
    requestedTenantId?: string,
  ): Promise<TenantContext> {
    const profile = await this.tenants.findProfile(user.id);
    const tenantId = await this.resolveTenantId(
      user.id,
      profile,
      requestedTenantId,
    );

    bindTenantToLogContext(tenantId);

    const tenant = await this.tenants.findTenant(tenantId);
    if (!tenant || !tenant.isActive) {
      throw tenantNotFound(tenantId);
    }

    let membership = await this.tenants.findMembership(tenantId, user.id);
    if (membership && !membership.isActive) {
      this.logger.warn(
        `inactive membership user=${user.id} tenant=${tenantId}`,
      );
      throw notAMember();
    }

    if (!membership) {
      const role = roleFromLegacyProfile(profile?.legacyRole);
      membership = await this.tenants.createMembership({
        tenantId,
        userId: user.id,
        role,
      });
      this.logger.log(
        `created membership user=${user.id} tenant=${tenantId} role=${membership.role}`,
      );
      if (!membership.isActive) {
        throw notAMember();
      }
    }

    return {
      tenantId,
      userId: user.id,
      email: user.email,
      role: membership.role,
      isStaff: isStaffRole(membership.role),
    };
  }

  private async resolveTenantId(
    userId: string,
    profile: ProfileRecord | null,
    requestedTenantId?: string,
  ): Promise<string> {
    if (requestedTenantId) return requestedTenantId;
    if (profile?.currentTenantId) return profile.currentTenantId;

    const first = await this.tenants.findFirstActiveMembership(userId);
    if (first) return first.tenantId;

    throw tenantRequired();
  }
}
